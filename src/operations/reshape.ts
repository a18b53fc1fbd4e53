/**
 * Conversion between the wide p-value table and long-form observations
 *
 * @module operations/reshape
 */

import { DuplicateKeyError, MalformedInputError } from "../errors";
import type { Observation, WideTable } from "../types";

/**
 * Flatten a wide table into one observation per present cell
 *
 * Rows are visited in table order, and columns within a row in table order.
 * Absent cells produce nothing.
 *
 * @throws {MalformedInputError} If a row's width differs from the number of positions
 *
 * @example
 * ```typescript
 * longify({ readIds: ["r1"], positions: [0, 1], cells: [[0.01, undefined]] });
 * // [{ readId: "r1", pos0b: 0, pval: 0.01 }]
 * ```
 */
export function longify(table: WideTable): Observation[] {
  if (table.cells.length !== table.readIds.length) {
    throw new MalformedInputError(
      `Table has ${table.cells.length} rows but ${table.readIds.length} read ids`
    );
  }

  const observations: Observation[] = [];

  table.cells.forEach((row, r) => {
    const readId = table.readIds[r] ?? "";
    if (row.length !== table.positions.length) {
      throw new MalformedInputError(
        `Row for read "${readId}" has ${row.length} columns, expected ${table.positions.length}`,
        undefined,
        table.lineNumbers?.[r]
      );
    }

    row.forEach((pval, c) => {
      const pos0b = table.positions[c];
      if (pval !== undefined && pos0b !== undefined) {
        observations.push({ readId, pos0b, pval });
      }
    });
  });

  return observations;
}

/**
 * Rebuild a wide table from observations
 *
 * Rows follow the order in which read ids first appear; columns are sorted
 * ascending. Cells with no observation are absent.
 *
 * @throws {DuplicateKeyError} If a (read, position) pair is observed twice
 */
export function widify(observations: Iterable<Observation>): WideTable {
  const byRead = new Map<string, Map<number, number>>();
  const positionSet = new Set<number>();

  for (const { readId, pos0b, pval } of observations) {
    let row = byRead.get(readId);
    if (row === undefined) {
      row = new Map();
      byRead.set(readId, row);
    }
    if (row.has(pos0b)) {
      throw DuplicateKeyError.forObservation(readId, pos0b);
    }
    row.set(pos0b, pval);
    positionSet.add(pos0b);
  }

  const positions = [...positionSet].sort((a, b) => a - b);
  const readIds = [...byRead.keys()];
  const cells = [...byRead.values()].map((row) => positions.map((pos0b) => row.get(pos0b)));

  return { readIds, positions, cells };
}

/**
 * Whether two tables hold the same present cells
 *
 * Row order, column order, and rows or columns with no present cell are
 * ignored.
 */
export function tablesEqual(a: WideTable, b: WideTable): boolean {
  const left = presentCells(a);
  const right = presentCells(b);

  if (left.size !== right.size) {
    return false;
  }
  for (const [key, pval] of left) {
    if (right.get(key) !== pval) {
      return false;
    }
  }
  return true;
}

function presentCells(table: WideTable): Map<string, number> {
  const cells = new Map<string, number>();
  for (const { readId, pos0b, pval } of longify(table)) {
    cells.set(`${readId}\t${pos0b}`, pval);
  }
  return cells;
}
