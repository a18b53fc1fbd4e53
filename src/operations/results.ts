/**
 * Rendering and writing the per-position summary table
 *
 * @module operations/results
 */

import { DSVWriter, delimiterForPath } from "../formats/dsv";
import type { DSVValue, DSVWriterOptions } from "../formats/dsv";
import type { PositionStats } from "../types";

interface ColumnSpec {
  readonly name: string;
  readonly value: (stats: PositionStats) => DSVValue;
  readonly fraction: boolean;
}

/**
 * Output columns in order; `fraction` columns are optional
 */
export const POSITION_STATS_COLUMNS: readonly ColumnSpec[] = [
  { name: "pos_0b", value: (s) => s.pos0b, fraction: false },
  { name: "num_below_lower_thresh", value: (s) => s.numBelowLowerThresh, fraction: false },
  { name: "num_above_upper_thresh", value: (s) => s.numAboveUpperThresh, fraction: false },
  { name: "covg", value: (s) => s.covg, fraction: false },
  { name: "frac_below_lower_thresh", value: (s) => s.fracBelowLowerThresh, fraction: true },
  { name: "frac_above_upper_thresh", value: (s) => s.fracAboveUpperThresh, fraction: true },
  { name: "f_value", value: (s) => s.fValue, fraction: false },
  { name: "d_value", value: (s) => s.dValue, fraction: false },
];

export interface ResultWriterOptions {
  /** Emit the two fraction columns (default: false) */
  readonly includeFractionFields?: boolean;
  /** Field delimiter (default: comma, or tab for `.tsv`/`.tab` sinks) */
  readonly delimiter?: string;
  /** Text written for `NaN` (default: empty) */
  readonly missingValue?: string;
}

/**
 * Header fields for the chosen column set
 */
export function positionStatsColumns(includeFractionFields: boolean): string[] {
  return selectColumns(includeFractionFields).map((column) => column.name);
}

/**
 * Render the summary table as text, header first, one line per position
 *
 * @example
 * ```typescript
 * formatPositionStats([{ pos0b: 4, numBelowLowerThresh: 0, numAboveUpperThresh: 0,
 *   covg: 1, fracBelowLowerThresh: 0, fracAboveUpperThresh: 0,
 *   fValue: NaN, dValue: NaN }]);
 * // "pos_0b,num_below_lower_thresh,num_above_upper_thresh,covg,f_value,d_value\n4,0,0,1,,\n"
 * ```
 */
export function formatPositionStats(
  stats: readonly PositionStats[],
  options: ResultWriterOptions = {}
): string {
  const columns = selectColumns(options.includeFractionFields ?? false);
  const writer = new DSVWriter(writerOptions(options.delimiter ?? ",", options));

  return writer.formatTable(
    columns.map((column) => column.name),
    stats.map((row) => columns.map((column) => column.value(row)))
  );
}

/**
 * Write the summary table; `.gz` sinks are gzip-compressed
 *
 * The table is fully rendered before the sink is touched, and the sink only
 * appears once completely written.
 *
 * @throws {FileError} If the sink cannot be written
 */
export async function writePositionStats(
  path: string,
  stats: readonly PositionStats[],
  options: ResultWriterOptions = {}
): Promise<void> {
  const columns = selectColumns(options.includeFractionFields ?? false);
  const writer = new DSVWriter(writerOptions(options.delimiter ?? delimiterForPath(path), options));

  await writer.writeFile(
    path,
    columns.map((column) => column.name),
    stats.map((row) => columns.map((column) => column.value(row)))
  );
}

function selectColumns(includeFractionFields: boolean): readonly ColumnSpec[] {
  return includeFractionFields
    ? POSITION_STATS_COLUMNS
    : POSITION_STATS_COLUMNS.filter((column) => !column.fraction);
}

function writerOptions(delimiter: string, options: ResultWriterOptions): DSVWriterOptions {
  return options.missingValue === undefined
    ? { delimiter }
    : { delimiter, missingValue: options.missingValue };
}
