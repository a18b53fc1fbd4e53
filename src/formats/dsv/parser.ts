/**
 * @module formats/dsv/parser
 * @description DSV (Delimiter-Separated Values) parser
 *
 * Line-oriented CSV/TSV parsing with:
 * - RFC 4180 quoting, including fields that span lines
 * - Header row capture and per-row column count checks
 * - Transparent gzip input via the file reader
 */

import { type } from "arktype";
import { DSVParseError, ValidationError } from "../../errors";
import { readToString } from "../../io/file-reader";
import type { FileReaderOptions } from "../../types";
import { DEFAULT_DELIMITERS, MAX_FIELD_LINES, MAX_FIELD_SIZE } from "./constants";
import { scanCSVRow } from "./state-machine";
import type { DSVParserOptions, DSVParserState, DSVRow } from "./types";
import { removeBOM } from "./utils";
import { DSVParserOptionsSchema, validateFieldSize } from "./validation";

/**
 * DSVParser - Core CSV/TSV parser implementation
 *
 * The first non-blank row is kept aside as the header and every later row
 * must match its width. Blank lines outside quoted fields are skipped but
 * still counted, so reported line numbers match the file.
 *
 * @example
 * ```typescript
 * const parser = new CSVParser();
 * for await (const row of parser.parseFile("per_read_pvals.csv")) {
 *   console.log(parser.getHeaders(), row.fields);
 * }
 * ```
 */
export class DSVParser {
  private readonly delimiter: string;
  private headers: string[] | null = null;
  private headerLine: number | null = null;

  constructor(options: DSVParserOptions = {}) {
    const validation = DSVParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV parser options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? DEFAULT_DELIMITERS.csv;
  }

  /**
   * Get the format name for error messages
   */
  getFormatName(): string {
    switch (this.delimiter) {
      case ",":
        return "CSV";
      case "\t":
        return "TSV";
      default:
        return "DSV";
    }
  }

  /**
   * Header fields of the last parse, or `null` if no header row was seen
   */
  getHeaders(): string[] | null {
    return this.headers;
  }

  /**
   * 1-based line the header row started on, or `null` if there was none
   */
  getHeaderLine(): number | null {
    return this.headerLine;
  }

  /**
   * Parse a DSV file from a path
   *
   * @throws {FileError} If the file cannot be read
   * @throws {CompressionError} If gzip content is corrupt
   * @throws {DSVParseError} On quoting errors or ragged rows
   */
  async *parseFile(path: string, readerOptions: FileReaderOptions = {}): AsyncIterable<DSVRow> {
    const text = await readToString(path, readerOptions);
    yield* this.parseString(text);
  }

  /**
   * Parse DSV data from a string
   *
   * @throws {DSVParseError} On quoting errors or ragged rows
   */
  async *parseString(data: string): AsyncIterable<DSVRow> {
    this.headers = null;
    this.headerLine = null;
    const state = this.createInitialState();

    const lines = data.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (line) {
        lines[i] = line.replace(/\0/g, "");
      }
    }
    if (lines[0] !== undefined) {
      lines[0] = removeBOM(lines[0]);
    }

    yield* this.processLines(lines, state);
  }

  private createInitialState(): DSVParserState {
    return {
      accumulatedRow: "",
      rowStartLine: 1,
      inMultiLineField: false,
      linesInCurrentField: 0,
      currentLineNumber: 1,
      headerProcessed: false,
      expectedColumns: 0,
    };
  }

  private *processLines(lines: string[], state: DSVParserState): Iterable<DSVRow> {
    for (const line of lines) {
      if (!state.inMultiLineField && !line.trim()) {
        state.currentLineNumber++;
        continue;
      }

      if (state.inMultiLineField) {
        state.linesInCurrentField++;
        if (state.linesInCurrentField > MAX_FIELD_LINES) {
          throw new DSVParseError(
            `Field exceeds maximum line limit (${MAX_FIELD_LINES})`,
            state.rowStartLine
          );
        }
        state.accumulatedRow += `\n${line}`;
      } else {
        state.accumulatedRow = line;
        state.rowStartLine = state.currentLineNumber;
        state.linesInCurrentField = 1;
      }

      const scan = scanCSVRow(state.accumulatedRow, this.delimiter);
      if (scan.openQuote) {
        state.inMultiLineField = true;
      } else {
        state.inMultiLineField = false;
        const row = this.completeRow(state, scan.fields);
        if (row) {
          yield row;
        }
        state.accumulatedRow = "";
        state.linesInCurrentField = 0;
      }

      state.currentLineNumber++;
    }

    if (state.inMultiLineField) {
      throw new DSVParseError(
        `Unclosed quote in field starting at line ${state.rowStartLine}`,
        state.rowStartLine
      );
    }
  }

  /**
   * Check a split row; returns `null` when it was the header
   */
  private completeRow(state: DSVParserState, fields: string[]): DSVRow | null {
    for (const [index, field] of fields.entries()) {
      try {
        validateFieldSize(field, MAX_FIELD_SIZE);
      } catch (error) {
        if (error instanceof DSVParseError) {
          throw new DSVParseError(error.reason, state.rowStartLine, index + 1);
        }
        throw error;
      }
    }

    if (!state.headerProcessed) {
      this.headers = fields;
      this.headerLine = state.rowStartLine;
      state.expectedColumns = fields.length;
      state.headerProcessed = true;
      return null;
    }

    if (fields.length !== state.expectedColumns) {
      throw new DSVParseError(
        `Row has ${fields.length} columns, expected ${state.expectedColumns}`,
        state.rowStartLine
      );
    }

    return { fields, lineNumber: state.rowStartLine };
  }
}

/**
 * CSVParser - Convenience class for CSV files
 */
export class CSVParser extends DSVParser {
  constructor() {
    super({ delimiter: "," });
  }
}

/**
 * TSVParser - Convenience class for TSV files
 */
export class TSVParser extends DSVParser {
  constructor() {
    super({ delimiter: "\t" });
  }
}
