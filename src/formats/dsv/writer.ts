/**
 * @module formats/dsv/writer
 * @description DSV (Delimiter-Separated Values) writer implementation
 *
 * RFC 4180 output: fields are quoted only when they contain the delimiter, a
 * quote or a line break, and every line ends in "\n".
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { writeString } from "../../io/file-writer";
import { DEFAULT_QUOTE, LINE_ENDING } from "./constants";
import type { DSVValue, DSVWriterOptions } from "./types";
import { DSVWriterOptionsSchema } from "./validation";

/**
 * DSVWriter - Core CSV/TSV writer implementation
 *
 * @example
 * ```typescript
 * const writer = new CSVWriter();
 * writer.formatTable(["pos_0b", "covg"], [[0, 3], [1, 2]]);
 * // "pos_0b,covg\n0,3\n1,2\n"
 * ```
 */
export class DSVWriter {
  private readonly delimiter: string;
  private readonly missingValue: string;

  constructor(options: DSVWriterOptions = {}) {
    const validation = DSVWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV writer options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? "\t";
    this.missingValue = options.missingValue ?? "";
  }

  /**
   * Format a single field with proper escaping
   */
  private formatField(value: DSVValue): string {
    if (value === null || value === undefined) return this.missingValue;
    if (typeof value === "number" && Number.isNaN(value)) return this.missingValue;

    const field = String(value);

    const needsQuoting =
      field.includes(this.delimiter) ||
      field.includes(DEFAULT_QUOTE) ||
      field.includes("\n") ||
      field.includes("\r");

    if (needsQuoting) {
      const escaped = field.split(DEFAULT_QUOTE).join(DEFAULT_QUOTE + DEFAULT_QUOTE);
      return DEFAULT_QUOTE + escaped + DEFAULT_QUOTE;
    }

    return field;
  }

  /**
   * Format a row of fields
   */
  formatRow(fields: readonly DSVValue[]): string {
    return fields.map((field) => this.formatField(field)).join(this.delimiter);
  }

  /**
   * Format a header and data rows, each line terminated by the line ending
   */
  formatTable(header: readonly string[], rows: Iterable<readonly DSVValue[]>): string {
    const lines: string[] = [this.formatRow(header)];

    for (const row of rows) {
      lines.push(this.formatRow(row));
    }

    return lines.join(LINE_ENDING) + LINE_ENDING;
  }

  /**
   * Write a table to a file
   *
   * Compression is chosen from the file extension (`.gz`).
   *
   * @throws {FileError} If the file cannot be written
   */
  async writeFile(
    path: string,
    header: readonly string[],
    rows: Iterable<readonly DSVValue[]>
  ): Promise<void> {
    const content = this.formatTable(header, rows);

    await writeString(path, content);
  }
}

/**
 * CSVWriter - Convenience class for CSV files
 */
export class CSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: "," });
  }
}

/**
 * TSVWriter - Convenience class for TSV files
 */
export class TSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: "\t" });
  }
}
