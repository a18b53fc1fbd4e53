/**
 * Pipeline configuration
 *
 * Thresholds are never read from module state by the computation; they live
 * here only as defaults that `resolveConfig` copies into each run's config.
 */

import { type } from "arktype";
import { ValidationError } from "./errors";

/** p-values below this count as evidence of modification */
export const DEFAULT_LOWER_THRESH = 0.05;

/** p-values above this count as evidence of no modification */
export const DEFAULT_UPPER_THRESH = 0.4;

/**
 * Everything one pipeline run needs
 */
export interface PipelineConfig {
  readonly sourcePath: string;
  readonly sinkPath: string;
  /** Emit `frac_below_lower_thresh` and `frac_above_upper_thresh` */
  readonly includeFractionFields: boolean;
  readonly lowerThresh: number;
  readonly upperThresh: number;
  /** Source delimiter; chosen from the source extension when omitted */
  readonly delimiter?: string;
  /** Sink delimiter; chosen from the sink extension when omitted */
  readonly outputDelimiter?: string;
  /** Text written for a not-a-number f-value or d-value (default: empty) */
  readonly missingValue?: string;
}

/**
 * Config as supplied by a caller: paths required, the rest defaulted
 */
export type PipelineConfigInput = Pick<PipelineConfig, "sourcePath" | "sinkPath"> &
  Partial<Omit<PipelineConfig, "sourcePath" | "sinkPath">>;

export const PipelineConfigSchema = type({
  sourcePath: "string>0",
  sinkPath: "string>0",
  includeFractionFields: "boolean",
  lowerThresh: "0<=number<=1",
  upperThresh: "0<=number<=1",
  "delimiter?": "string==1",
  "outputDelimiter?": "string==1",
  "missingValue?": "string",
}).narrow((config, ctx) => {
  if (config.lowerThresh > config.upperThresh) {
    return ctx.reject({
      path: ["lowerThresh"],
      expected: `a threshold no greater than upperThresh (${config.upperThresh})`,
      actual: String(config.lowerThresh),
    });
  }
  if (config.sourcePath === config.sinkPath) {
    return ctx.reject({
      path: ["sinkPath"],
      expected: "a path different from sourcePath",
      actual: config.sinkPath,
    });
  }
  return true;
});

/**
 * Configuration of the static front end: fixed paths, fractions left out
 */
export const STATIC_CONFIG: PipelineConfig = {
  sourcePath: "data/per_read_pvals.csv",
  sinkPath: "data/fd_values.csv",
  includeFractionFields: false,
  lowerThresh: DEFAULT_LOWER_THRESH,
  upperThresh: DEFAULT_UPPER_THRESH,
};

/**
 * Fill in defaults and validate
 *
 * @throws {ValidationError} When a threshold is out of range, the thresholds
 * are out of order, or a path is empty
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ sourcePath: "in.csv", sinkPath: "out.csv" });
 * config.lowerThresh; // 0.05
 * ```
 */
export function resolveConfig(input: PipelineConfigInput): PipelineConfig {
  // Optional keys are left out rather than set to undefined
  const config: PipelineConfig = {
    sourcePath: input.sourcePath,
    sinkPath: input.sinkPath,
    includeFractionFields: input.includeFractionFields ?? true,
    lowerThresh: input.lowerThresh ?? DEFAULT_LOWER_THRESH,
    upperThresh: input.upperThresh ?? DEFAULT_UPPER_THRESH,
    ...(input.delimiter === undefined ? {} : { delimiter: input.delimiter }),
    ...(input.outputDelimiter === undefined ? {} : { outputDelimiter: input.outputDelimiter }),
    ...(input.missingValue === undefined ? {} : { missingValue: input.missingValue }),
  };

  const validation = PipelineConfigSchema(config);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid pipeline config: ${validation.summary}`);
  }

  return config;
}
