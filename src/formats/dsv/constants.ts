/**
 * DSV Format Constants
 */

/**
 * Default delimiter for different formats
 */
export const DEFAULT_DELIMITERS = {
  csv: ",",
  tsv: "\t",
} as const;

/**
 * Quote character (RFC 4180: a literal quote inside quotes is doubled)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Maximum field size for memory safety (100MB)
 */
export const MAX_FIELD_SIZE = 100_000_000;

/**
 * Maximum lines a single quoted field can span
 */
export const MAX_FIELD_LINES = 100;

/**
 * Line ending written after every output row
 */
export const LINE_ENDING = "\n";
