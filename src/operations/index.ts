/**
 * p-value table operations
 */

export {
  classifyPValue,
  computeFdValues,
  DAMPENING_PSEUDOCOUNT,
  DEFAULT_THRESHOLDS,
  dampenedFraction,
  modifiedFraction,
  validateThresholds,
} from "./fd-values";
export { type PipelineSummary, runPipeline } from "./pipeline";
export { longify, tablesEqual, widify } from "./reshape";
export {
  formatPositionStats,
  POSITION_STATS_COLUMNS,
  positionStatsColumns,
  type ResultWriterOptions,
  writePositionStats,
} from "./results";
export {
  assertUniqueReadIds,
  loadWideTable,
  MISSING_VALUE_TOKENS,
  parseWideTable,
  type WideTableOptions,
} from "./wide-table";
