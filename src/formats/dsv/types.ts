/**
 * DSV Format Type Definitions
 *
 * Types for the DSV (Delimiter-Separated Values) module: CSV, TSV and other
 * single-character delimited text.
 */

/**
 * A single parsed data row
 */
export interface DSVRow {
  readonly fields: string[];
  /** 1-based line the row starts on */
  readonly lineNumber: number;
}

/**
 * Value accepted by the writer for a single field
 */
export type DSVValue = string | number | boolean | null | undefined;

/**
 * Parser state for CSV/TSV parsing state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * Result of splitting one (possibly partial) row
 */
export interface RowScan {
  /** Completed fields; a field still inside quotes is not included */
  readonly fields: string[];
  /** The row ends inside a quoted field and needs the next line */
  readonly openQuote: boolean;
}

/**
 * DSV parser options
 */
export interface DSVParserOptions {
  /** Single-character field delimiter (default: ",") */
  delimiter?: string;
}

/**
 * DSV writer options for output formatting
 */
export interface DSVWriterOptions {
  /** Single-character field delimiter (default: "\t") */
  delimiter?: string;
  /** Text written for null, undefined and NaN values (default: "") */
  missingValue?: string;
}

/**
 * Parser state for line-by-line DSV parsing
 */
export interface DSVParserState {
  accumulatedRow: string; // Current row being built (may span lines)
  rowStartLine: number; // Line number where current row started
  inMultiLineField: boolean; // Whether currently in a quoted field that spans lines
  linesInCurrentField: number; // Track lines for MAX_FIELD_LINES limit
  currentLineNumber: number; // Current line number being processed
  headerProcessed: boolean; // Whether header row has been processed
  expectedColumns: number; // Expected column count for validation
}
