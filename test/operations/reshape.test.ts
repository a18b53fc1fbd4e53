/**
 * Tests for longify/widify and table equality
 */

import { describe, expect, test } from "vitest";
import { DuplicateKeyError, MalformedInputError } from "../../src/errors";
import { longify, tablesEqual, widify } from "../../src/operations/reshape";
import type { WideTable } from "../../src/types";

const TABLE: WideTable = {
  readIds: ["r1", "r2"],
  positions: [0, 1, 2],
  cells: [
    [0.01, undefined, 0.5],
    [0.9, 0.02, undefined],
  ],
};

describe("longify", () => {
  test("emits one observation per present cell in row-major order", () => {
    expect(longify(TABLE)).toEqual([
      { readId: "r1", pos0b: 0, pval: 0.01 },
      { readId: "r1", pos0b: 2, pval: 0.5 },
      { readId: "r2", pos0b: 0, pval: 0.9 },
      { readId: "r2", pos0b: 1, pval: 0.02 },
    ]);
  });

  test("keeps zero p-values", () => {
    const table: WideTable = { readIds: ["r1"], positions: [5], cells: [[0]] };

    expect(longify(table)).toEqual([{ readId: "r1", pos0b: 5, pval: 0 }]);
  });

  test("returns nothing for an empty table", () => {
    expect(longify({ readIds: [], positions: [0], cells: [] })).toEqual([]);
  });

  test("rejects a row whose width does not match the positions", () => {
    const table: WideTable = { readIds: ["r1"], positions: [0, 1], cells: [[0.1]] };

    expect(() => longify(table)).toThrow(MalformedInputError);
  });

  test("rejects a row count that does not match the read ids", () => {
    const table: WideTable = { readIds: ["r1", "r2"], positions: [0], cells: [[0.1]] };

    expect(() => longify(table)).toThrow("Table has 1 rows but 2 read ids");
  });
});

describe("widify", () => {
  test("inverts longify", () => {
    expect(widify(longify(TABLE))).toEqual(TABLE);
  });

  test("orders rows by first appearance and columns ascending", () => {
    const table = widify([
      { readId: "b", pos0b: 5, pval: 0.1 },
      { readId: "a", pos0b: 1, pval: 0.2 },
      { readId: "b", pos0b: 1, pval: 0.3 },
    ]);

    expect(table).toEqual({
      readIds: ["b", "a"],
      positions: [1, 5],
      cells: [
        [0.3, 0.1],
        [0.2, undefined],
      ],
    });
  });

  test("sorts positions numerically", () => {
    const table = widify([
      { readId: "r1", pos0b: 10, pval: 0.1 },
      { readId: "r1", pos0b: 9, pval: 0.2 },
    ]);

    expect(table.positions).toEqual([9, 10]);
  });

  test("rejects the same read and position observed twice", () => {
    const observations = [
      { readId: "r1", pos0b: 0, pval: 0.1 },
      { readId: "r1", pos0b: 0, pval: 0.2 },
    ];

    expect(() => widify(observations)).toThrow(DuplicateKeyError);
    expect(() => widify(observations)).toThrow('Read "r1" has more than one p-value at position 0');
  });

  test("builds an empty table from no observations", () => {
    expect(widify([])).toEqual({ readIds: [], positions: [], cells: [] });
  });
});

describe("tablesEqual", () => {
  test("round-trip law holds", () => {
    expect(tablesEqual(widify(longify(TABLE)), TABLE)).toBe(true);
  });

  test("ignores row and column order", () => {
    const shuffled: WideTable = {
      readIds: ["r2", "r1"],
      positions: [2, 1, 0],
      cells: [
        [undefined, 0.02, 0.9],
        [0.5, undefined, 0.01],
      ],
    };

    expect(tablesEqual(shuffled, TABLE)).toBe(true);
  });

  test("ignores rows and columns with no present cells", () => {
    const padded: WideTable = {
      readIds: ["r1", "r2", "r3"],
      positions: [0, 1, 2, 3],
      cells: [
        [0.01, undefined, 0.5, undefined],
        [0.9, 0.02, undefined, undefined],
        [undefined, undefined, undefined, undefined],
      ],
    };

    expect(tablesEqual(padded, TABLE)).toBe(true);
  });

  test("detects a changed value", () => {
    const changed: WideTable = { ...TABLE, cells: [[0.01, undefined, 0.5], [0.9, 0.03, undefined]] };

    expect(tablesEqual(changed, TABLE)).toBe(false);
  });

  test("detects a cell that went missing", () => {
    const dropped: WideTable = {
      ...TABLE,
      cells: [
        [0.01, undefined, undefined],
        [0.9, 0.02, undefined],
      ],
    };

    expect(tablesEqual(dropped, TABLE)).toBe(false);
    expect(tablesEqual(TABLE, dropped)).toBe(false);
  });
});
