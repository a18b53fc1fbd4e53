/**
 * @module formats/dsv
 * @description DSV (Delimiter-Separated Values) format support
 *
 * Parsing and writing of CSV, TSV and other single-character delimited text.
 *
 * @example
 * ```typescript
 * import { CSVParser } from './formats/dsv';
 *
 * const parser = new CSVParser();
 * for await (const row of parser.parseFile('per_read_pvals.csv')) {
 *   console.log(row.lineNumber, row.fields);
 * }
 * ```
 */

export type {
  DSVParserOptions,
  DSVParserState,
  DSVRow,
  DSVValue,
  DSVWriterOptions,
  RowScan,
} from "./types";

export { CSVParseState } from "./types";

export { CSVParser, DSVParser, TSVParser } from "./parser";

export { CSVWriter, DSVWriter, TSVWriter } from "./writer";

export { DSVParserOptionsSchema, DSVWriterOptionsSchema, validateFieldSize } from "./validation";

export { delimiterForPath, removeBOM } from "./utils";

export { parseCSVRow, scanCSVRow } from "./state-machine";

export {
  DEFAULT_DELIMITERS,
  DEFAULT_QUOTE,
  LINE_ENDING,
  MAX_FIELD_LINES,
  MAX_FIELD_SIZE,
} from "./constants";
