/**
 * Per-position f-values and d-values
 *
 * Each observation is bucketed against two thresholds. A p-value below the
 * lower threshold is evidence the read is modified at that position, one
 * above the upper threshold is evidence it is not, and anything in between
 * is inconclusive but still counts toward coverage.
 *
 * For a position with `b` reads below and `a` reads above:
 *
 * - f-value `b / (a + b)`: fraction modified among conclusive reads
 * - d-value `b / (a + b + 2)`: the same with two pseudo-reads added to the
 *   denominator, which pulls low-coverage positions toward zero
 *
 * Both are `NaN` when `a + b = 0`.
 *
 * @module operations/fd-values
 */

import { type } from "arktype";
import { DEFAULT_LOWER_THRESH, DEFAULT_UPPER_THRESH } from "../config";
import { ValidationError } from "../errors";
import type { Observation, PositionStats, PValueClass, Thresholds } from "../types";
import { ThresholdsSchema } from "../types";

/** Pseudo-reads added to the d-value denominator */
export const DAMPENING_PSEUDOCOUNT = 2;

export const DEFAULT_THRESHOLDS: Thresholds = {
  lower: DEFAULT_LOWER_THRESH,
  upper: DEFAULT_UPPER_THRESH,
};

/**
 * Check that both thresholds lie in [0, 1] and are ordered
 *
 * @throws {ValidationError} Otherwise
 */
export function validateThresholds(thresholds: Thresholds): Thresholds {
  const validation = ThresholdsSchema(thresholds);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid thresholds: ${validation.summary}`);
  }
  return thresholds;
}

/**
 * Bucket a p-value; values equal to a threshold are inconclusive
 */
export function classifyPValue(pval: number, thresholds: Thresholds): PValueClass {
  if (pval < thresholds.lower) return "below";
  if (pval > thresholds.upper) return "above";
  return "inconclusive";
}

/**
 * `below / (below + above)`, `NaN` when both counts are zero
 */
export function modifiedFraction(below: number, above: number): number {
  return below / (below + above);
}

/**
 * `below / (below + above + 2)`, `NaN` when both counts are zero
 */
export function dampenedFraction(below: number, above: number): number {
  if (below + above === 0) {
    return Number.NaN;
  }
  return below / (below + above + DAMPENING_PSEUDOCOUNT);
}

interface PositionCounts {
  below: number;
  above: number;
  covg: number;
}

/**
 * Aggregate observations into one row per covered position
 *
 * Rows are sorted ascending by position. A position whose reads are all
 * inconclusive still gets a row, with `NaN` f-value and d-value.
 *
 * @throws {ValidationError} On invalid thresholds or a p-value outside [0, 1]
 *
 * @example
 * ```typescript
 * computeFdValues(
 *   [
 *     { readId: "r1", pos0b: 0, pval: 0.01 },
 *     { readId: "r2", pos0b: 0, pval: 0.9 },
 *   ],
 *   { lower: 0.05, upper: 0.4 }
 * );
 * // [{ pos0b: 0, numBelowLowerThresh: 1, numAboveUpperThresh: 1, covg: 2,
 * //    fracBelowLowerThresh: 0.5, fracAboveUpperThresh: 0.5,
 * //    fValue: 0.5, dValue: 0.25 }]
 * ```
 */
export function computeFdValues(
  observations: Iterable<Observation>,
  thresholds: Thresholds = DEFAULT_THRESHOLDS
): PositionStats[] {
  validateThresholds(thresholds);

  const counts = new Map<number, PositionCounts>();

  for (const { readId, pos0b, pval } of observations) {
    if (!(pval >= 0 && pval <= 1)) {
      throw new ValidationError(
        `p-value ${pval} for read "${readId}" at position ${pos0b} is outside [0, 1]`
      );
    }

    let entry = counts.get(pos0b);
    if (entry === undefined) {
      entry = { below: 0, above: 0, covg: 0 };
      counts.set(pos0b, entry);
    }

    entry.covg++;
    const bucket = classifyPValue(pval, thresholds);
    if (bucket === "below") entry.below++;
    else if (bucket === "above") entry.above++;
  }

  return [...counts.entries()]
    .sort(([a], [b]) => a - b)
    .map(([pos0b, { below, above, covg }]) => ({
      pos0b,
      numBelowLowerThresh: below,
      numAboveUpperThresh: above,
      covg,
      fracBelowLowerThresh: below / covg,
      fracAboveUpperThresh: above / covg,
      fValue: modifiedFraction(below, above),
      dValue: dampenedFraction(below, above),
    }));
}
