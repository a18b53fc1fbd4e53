/**
 * Core type definitions for per-read p-value tables and per-position statistics
 *
 * A run moves through three shapes: the wide table as read from disk, the
 * long-form observations it is reshaped into, and one PositionStats row per
 * covered position.
 */

import { type } from "arktype";

// =============================================================================
// TABLE SHAPES
// =============================================================================

/**
 * Per-read, per-position p-value matrix
 *
 * Rows are reads, columns are 0-based genomic positions. A cell is
 * `undefined` when the read was not tested at that position.
 */
export interface WideTable {
  /** Row labels, one per row of `cells` */
  readonly readIds: readonly string[];
  /** Column labels, one per entry of each row */
  readonly positions: readonly number[];
  /** `cells[row][column]`, absent cells are `undefined` */
  readonly cells: ReadonlyArray<ReadonlyArray<number | undefined>>;
  /** 1-based source line of each row, when the table came from a file */
  readonly lineNumbers?: readonly number[];
}

/**
 * One tested (read, position) pair in long form
 */
export interface Observation {
  readonly readId: string;
  readonly pos0b: number;
  readonly pval: number;
}

/**
 * Modification summary for one genomic position
 *
 * `fValue` and `dValue` are `NaN` when neither bucket has any reads.
 */
export interface PositionStats {
  readonly pos0b: number;
  /** Reads with `pval < lower` (evidence of modification) */
  readonly numBelowLowerThresh: number;
  /** Reads with `pval > upper` (evidence of no modification) */
  readonly numAboveUpperThresh: number;
  /** All reads tested at this position, inconclusive ones included */
  readonly covg: number;
  readonly fracBelowLowerThresh: number;
  readonly fracAboveUpperThresh: number;
  /** below / (below + above) */
  readonly fValue: number;
  /** below / (below + above + 2) */
  readonly dValue: number;
}

/**
 * Bucket a single p-value falls into
 */
export type PValueClass = "below" | "above" | "inconclusive";

/**
 * Classification cut-offs; a p-value equal to either one is inconclusive
 */
export interface Thresholds {
  readonly lower: number;
  readonly upper: number;
}

// =============================================================================
// COMPRESSION
// =============================================================================

/**
 * Compression formats understood on input and output
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Compression detection result with confidence scoring
 */
export interface CompressionDetection {
  readonly format: CompressionFormat;
  /** Detection confidence level (0-1) */
  readonly confidence: number;
  readonly detectionMethod: "magic-bytes" | "extension";
}

/**
 * File writing options
 */
export interface WriteOptions {
  /** Compress based on file extension (default: true) */
  readonly autoCompress?: boolean;
  /** Override compression format detection */
  readonly compressionFormat?: CompressionFormat;
  /** Compression level 1-9 for gzip (default: 6) */
  readonly compressionLevel?: number;
}

/**
 * File reading options
 */
export interface FileReaderOptions {
  /** Decompress gzip input detected by magic bytes (default: true) */
  readonly autoDecompress?: boolean;
  /** Refuse files larger than this many bytes (default: 4GB) */
  readonly maxFileSize?: number;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * A single p-value
 */
export const PValueSchema = type("0<=number<=1");

/**
 * A 0-based genomic position
 */
export const PositionSchema = type("number.integer>=0");

/**
 * Threshold pair, each within [0, 1] and ordered
 */
export const ThresholdsSchema = type({
  lower: "0<=number<=1",
  upper: "0<=number<=1",
}).narrow((thresholds, ctx) => {
  if (thresholds.lower > thresholds.upper) {
    return ctx.reject({
      path: ["lower"],
      expected: `a lower threshold no greater than the upper threshold (${thresholds.upper})`,
      actual: String(thresholds.lower),
    });
  }
  return true;
});

/**
 * File path validation schema
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({
      expected: "a path without null characters",
      actual: JSON.stringify(path),
    });
  }
  return true;
});

export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
  "compressionLevel?": "1<=number.integer<=9",
});

export const FileReaderOptionsSchema = type({
  "autoDecompress?": "boolean",
  "maxFileSize?": "number>0",
});
