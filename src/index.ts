/**
 * fdvalues - per-position f-values and d-values from per-read p-values
 *
 * Reads a wide table of per-read nanopore modification p-values, buckets
 * each p-value against a lower and an upper threshold, and writes one
 * summary row per genomic position.
 */

// Compression infrastructure
export { CompressionDetector, CompressionService, compress, decompress } from './compression';
// Configuration
export {
  DEFAULT_LOWER_THRESH,
  DEFAULT_UPPER_THRESH,
  type PipelineConfig,
  type PipelineConfigInput,
  PipelineConfigSchema,
  resolveConfig,
  STATIC_CONFIG,
} from './config';
// Error types
export {
  CompressionError,
  DSVParseError,
  DuplicateKeyError,
  ERROR_SUGGESTIONS,
  FdValuesError,
  FileError,
  getErrorSuggestion,
  MalformedInputError,
  ParseError,
  ValidationError,
} from './errors';
// DSV format
export { CSVParser, CSVWriter, DSVParser, DSVWriter, TSVParser, TSVWriter } from './formats/dsv';
// File I/O infrastructure
export { exists, readToBytes, readToString } from './io/file-reader';
export { writeBytes, writeString } from './io/file-writer';
// Pipeline stages
export {
  assertUniqueReadIds,
  classifyPValue,
  computeFdValues,
  DEFAULT_THRESHOLDS,
  dampenedFraction,
  formatPositionStats,
  loadWideTable,
  longify,
  modifiedFraction,
  type PipelineSummary,
  parseWideTable,
  positionStatsColumns,
  runPipeline,
  tablesEqual,
  validateThresholds,
  widify,
  writePositionStats,
} from './operations';
// Core types
export type {
  CompressionDetection,
  CompressionFormat,
  FileReaderOptions,
  Observation,
  PositionStats,
  PValueClass,
  Thresholds,
  WideTable,
  WriteOptions,
} from './types';
