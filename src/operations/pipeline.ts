/**
 * The end-to-end run: load, check read ids, reshape, aggregate, write
 *
 * @module operations/pipeline
 */

import { type } from "arktype";
import type { PipelineConfig } from "../config";
import { PipelineConfigSchema } from "../config";
import { ValidationError } from "../errors";
import { computeFdValues } from "./fd-values";
import { writePositionStats } from "./results";
import { longify } from "./reshape";
import { assertUniqueReadIds, loadWideTable } from "./wide-table";

/**
 * What a completed run processed
 */
export interface PipelineSummary {
  readonly sourcePath: string;
  readonly sinkPath: string;
  /** Rows in the source table */
  readonly reads: number;
  /** Present cells in the source table */
  readonly observations: number;
  /** Rows written to the sink */
  readonly positions: number;
}

/**
 * Run the pipeline once
 *
 * Nothing is written unless every earlier stage succeeds.
 *
 * @throws {ValidationError} On an invalid config
 * @throws {FileError} If the source cannot be read or the sink written
 * @throws {MalformedInputError} If the source is not a well-formed p-value table
 * @throws {DuplicateKeyError} If a read id repeats
 *
 * @example
 * ```typescript
 * const summary = await runPipeline(
 *   resolveConfig({ sourcePath: "per_read_pvals.csv", sinkPath: "fd_values.csv" })
 * );
 * console.log(`${summary.positions} positions written`);
 * ```
 */
export async function runPipeline(config: PipelineConfig): Promise<PipelineSummary> {
  const validation = PipelineConfigSchema(config);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid pipeline config: ${validation.summary}`);
  }

  const table = await loadWideTable(
    config.sourcePath,
    config.delimiter === undefined ? {} : { delimiter: config.delimiter }
  );
  assertUniqueReadIds(table);

  const observations = longify(table);
  const stats = computeFdValues(observations, {
    lower: config.lowerThresh,
    upper: config.upperThresh,
  });

  await writePositionStats(config.sinkPath, stats, {
    includeFractionFields: config.includeFractionFields,
    ...(config.outputDelimiter === undefined ? {} : { delimiter: config.outputDelimiter }),
    ...(config.missingValue === undefined ? {} : { missingValue: config.missingValue }),
  });

  return {
    sourcePath: config.sourcePath,
    sinkPath: config.sinkPath,
    reads: table.readIds.length,
    observations: observations.length,
    positions: stats.length,
  };
}
