/**
 * CSV State Machine Module
 *
 * RFC 4180 row splitting: quoted fields, doubled quotes and fields that span
 * several lines. A quote opens a quoted field only at the start of a field;
 * anywhere else it is an ordinary character, so `read"1` is a plain value.
 */

import { DSVParseError } from "../../errors";
import { DEFAULT_QUOTE } from "./constants";
import { CSVParseState, type RowScan } from "./types";

/**
 * Split a row into fields, reporting whether it ends inside a quoted field
 *
 * Characters after a closing quote are kept as part of the field rather than
 * rejected.
 */
export function scanCSVRow(line: string, delimiter: string = ","): RowScan {
  const quote = DEFAULT_QUOTE;
  const fields: string[] = [];
  let currentField = "";
  let state = CSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    switch (state) {
      case CSVParseState.FIELD_START:
        if (char === quote) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote) {
          if (line.charAt(i + 1) === quote) {
            currentField += quote;
            i++; // Skip the second quote of the pair
          } else {
            state = CSVParseState.QUOTE_IN_QUOTED;
          }
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          // Lenient: text after the closing quote joins the field
          currentField += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === CSVParseState.QUOTED_FIELD) {
    return { fields, openQuote: true };
  }
  if (state === CSVParseState.UNQUOTED_FIELD || state === CSVParseState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.endsWith(delimiter)) {
    // Trailing delimiter means empty final field
    fields.push("");
  }

  return { fields, openQuote: false };
}

/**
 * Split one complete row into fields
 *
 * @throws {DSVParseError} If a quoted field is never closed
 */
export function parseCSVRow(line: string, delimiter: string = ","): string[] {
  const { fields, openQuote } = scanCSVRow(line, delimiter);
  if (openQuote) {
    throw new DSVParseError("Unclosed quote in field", undefined, fields.length + 1);
  }
  return fields;
}
