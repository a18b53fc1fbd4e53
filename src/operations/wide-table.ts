/**
 * Loading per-read p-value tables
 *
 * The source is a delimited table whose header names 0-based positions and
 * whose first column holds read ids:
 *
 * ```
 * read_id,0,1,2
 * r1,0.01,,0.5
 * r2,0.9,0.02,
 * ```
 *
 * Empty cells (and the usual missing-value spellings) mean "not tested" and
 * are kept absent, never read as zero.
 *
 * @module operations/wide-table
 */

import { type } from "arktype";
import { DSVParseError, DuplicateKeyError, MalformedInputError } from "../errors";
import { DSVParser, delimiterForPath } from "../formats/dsv";
import type { DSVRow } from "../formats/dsv";
import type { FileReaderOptions, WideTable } from "../types";
import { PositionSchema, PValueSchema } from "../types";

/**
 * Cell spellings read as "not tested"
 */
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  "",
  "#N/A",
  "#N/A N/A",
  "#NA",
  "-1.#IND",
  "-1.#QNAN",
  "-NaN",
  "-nan",
  "1.#IND",
  "1.#QNAN",
  "<NA>",
  "N/A",
  "NA",
  "NULL",
  "NaN",
  "None",
  "n/a",
  "nan",
  "null",
]);

const POSITION_LABEL = /^\d+$/;
const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface WideTableOptions {
  /** Field delimiter; for files, chosen from the extension when omitted */
  readonly delimiter?: string;
  readonly readerOptions?: FileReaderOptions;
}

/**
 * Parse a wide p-value table from text
 *
 * @throws {MalformedInputError} On a bad header, ragged rows or bad cells
 */
export async function parseWideTable(
  text: string,
  options: WideTableOptions = {}
): Promise<WideTable> {
  const parser = new DSVParser({ delimiter: options.delimiter ?? "," });
  return collectWideTable(parser, parser.parseString(text));
}

/**
 * Load a wide p-value table from a file, gzip-compressed or not
 *
 * @throws {FileError} If the file cannot be read
 * @throws {CompressionError} If gzip content is corrupt
 * @throws {MalformedInputError} On a bad header, ragged rows or bad cells
 *
 * @example
 * ```typescript
 * const table = await loadWideTable("per_read_pvals.tsv.gz");
 * table.positions; // [0, 1, 2]
 * ```
 */
export async function loadWideTable(
  path: string,
  options: WideTableOptions = {}
): Promise<WideTable> {
  const parser = new DSVParser({ delimiter: options.delimiter ?? delimiterForPath(path) });
  return collectWideTable(parser, parser.parseFile(path, options.readerOptions), path);
}

/**
 * Fail if any read id labels more than one row
 *
 * @throws {DuplicateKeyError} Naming the first repeated read id
 */
export function assertUniqueReadIds(table: WideTable): void {
  const firstRow = new Map<string, number>();

  table.readIds.forEach((readId, row) => {
    const previous = firstRow.get(readId);
    if (previous === undefined) {
      firstRow.set(readId, row);
      return;
    }

    const lines = [table.lineNumbers?.[previous], table.lineNumbers?.[row]].filter(
      (line): line is number => line !== undefined
    );
    throw DuplicateKeyError.forReadId(readId, lines);
  });
}

async function collectWideTable(
  parser: DSVParser,
  rows: AsyncIterable<DSVRow>,
  filePath?: string
): Promise<WideTable> {
  const readIds: string[] = [];
  const cells: Array<Array<number | undefined>> = [];
  const lineNumbers: number[] = [];
  let positions: number[] | undefined;

  try {
    for await (const row of rows) {
      positions ??= parsePositionLabels(parser, filePath);
      const [readId = "", ...values] = row.fields;
      readIds.push(readId);
      cells.push(values.map((raw, i) => parseCell(raw, row.lineNumber, i + 2, filePath)));
      lineNumbers.push(row.lineNumber);
    }
  } catch (error) {
    if (error instanceof DSVParseError) {
      throw MalformedInputError.fromParseError(error, filePath);
    }
    throw error;
  }

  positions ??= parsePositionLabels(parser, filePath);
  return { readIds, positions, cells, lineNumbers };
}

function parsePositionLabels(parser: DSVParser, filePath?: string): number[] {
  const headers = parser.getHeaders();
  const headerLine = parser.getHeaderLine();
  if (headers === null || headerLine === null) {
    throw new MalformedInputError("Input has no header row", filePath, 1);
  }

  const seen = new Set<number>();
  return headers.slice(1).map((label, i) => {
    const column = i + 2;
    const trimmed = label.trim();
    const position = POSITION_LABEL.test(trimmed) ? Number(trimmed) : Number.NaN;

    if (PositionSchema(position) instanceof type.errors || !Number.isSafeInteger(position)) {
      throw new MalformedInputError(
        `Position label "${label}" is not a non-negative integer`,
        filePath,
        headerLine,
        column
      );
    }
    if (seen.has(position)) {
      throw new MalformedInputError(
        `Position label "${label}" repeats position ${position}`,
        filePath,
        headerLine,
        column
      );
    }

    seen.add(position);
    return position;
  });
}

function parseCell(
  raw: string,
  lineNumber: number,
  column: number,
  filePath?: string
): number | undefined {
  const trimmed = raw.trim();
  if (MISSING_VALUE_TOKENS.has(trimmed)) {
    return undefined;
  }

  const value = DECIMAL_NUMBER.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (PValueSchema(value) instanceof type.errors) {
    throw new MalformedInputError(
      `Cell "${raw}" is not a p-value in [0, 1]`,
      filePath,
      lineNumber,
      column
    );
  }
  return value;
}
