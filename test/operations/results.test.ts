/**
 * Tests for rendering and writing the per-position summary table
 */

import { mkdtempSync, readdirSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import {
  formatPositionStats,
  positionStatsColumns,
  writePositionStats,
} from "../../src/operations/results";
import type { PositionStats } from "../../src/types";

const STATS: PositionStats[] = [
  {
    pos0b: 0,
    numBelowLowerThresh: 1,
    numAboveUpperThresh: 2,
    covg: 3,
    fracBelowLowerThresh: 1 / 3,
    fracAboveUpperThresh: 2 / 3,
    fValue: 1 / 3,
    dValue: 0.2,
  },
  {
    pos0b: 1,
    numBelowLowerThresh: 2,
    numAboveUpperThresh: 0,
    covg: 2,
    fracBelowLowerThresh: 1,
    fracAboveUpperThresh: 0,
    fValue: 1,
    dValue: 0.5,
  },
];

const INCONCLUSIVE: PositionStats = {
  pos0b: 4,
  numBelowLowerThresh: 0,
  numAboveUpperThresh: 0,
  covg: 2,
  fracBelowLowerThresh: 0,
  fracAboveUpperThresh: 0,
  fValue: Number.NaN,
  dValue: Number.NaN,
};

const SHORT_HEADER = "pos_0b,num_below_lower_thresh,num_above_upper_thresh,covg,f_value,d_value";
const FULL_HEADER =
  "pos_0b,num_below_lower_thresh,num_above_upper_thresh,covg," +
  "frac_below_lower_thresh,frac_above_upper_thresh,f_value,d_value";

describe("positionStatsColumns", () => {
  test("lists the fraction columns only when asked", () => {
    expect(positionStatsColumns(false).join(",")).toBe(SHORT_HEADER);
    expect(positionStatsColumns(true).join(",")).toBe(FULL_HEADER);
  });
});

describe("formatPositionStats", () => {
  test("leaves out fraction fields by default", () => {
    expect(formatPositionStats(STATS)).toBe(
      `${SHORT_HEADER}\n0,1,2,3,0.3333333333333333,0.2\n1,2,0,2,1,0.5\n`
    );
  });

  test("includes fraction fields on request", () => {
    expect(formatPositionStats(STATS, { includeFractionFields: true })).toBe(
      `${FULL_HEADER}\n` +
        "0,1,2,3,0.3333333333333333,0.6666666666666666,0.3333333333333333,0.2\n" +
        "1,2,0,2,1,0,1,0.5\n"
    );
  });

  test("writes NaN ratios as empty fields", () => {
    expect(formatPositionStats([INCONCLUSIVE])).toBe(`${SHORT_HEADER}\n4,0,0,2,,\n`);
  });

  test("uses a configured missing value", () => {
    expect(formatPositionStats([INCONCLUSIVE], { missingValue: "NaN" })).toBe(
      `${SHORT_HEADER}\n4,0,0,2,NaN,NaN\n`
    );
  });

  test("writes only the header when there are no positions", () => {
    expect(formatPositionStats([])).toBe(`${SHORT_HEADER}\n`);
  });

  test("honours a tab delimiter", () => {
    const [header, first] = formatPositionStats(STATS, { delimiter: "\t" }).split("\n");

    expect(header).toBe(SHORT_HEADER.replaceAll(",", "\t"));
    expect(first).toBe("0\t1\t2\t3\t0.3333333333333333\t0.2");
  });
});

describe("writePositionStats", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "fdvalues-results-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("writes the formatted table", async () => {
    const path = join(dir, "fd_values.csv");

    await writePositionStats(path, STATS, { includeFractionFields: true });

    expect(readFileSync(path, "utf8")).toBe(
      formatPositionStats(STATS, { includeFractionFields: true })
    );
  });

  test("picks tabs for a .tsv sink", async () => {
    const path = join(dir, "fd_values.tsv");

    await writePositionStats(path, [INCONCLUSIVE]);

    expect(readFileSync(path, "utf8")).toBe(
      `${SHORT_HEADER.replaceAll(",", "\t")}\n4\t0\t0\t2\t\t\n`
    );
  });

  test("gzip-compresses a .gz sink", async () => {
    const path = join(dir, "fd_values.csv.gz");

    await writePositionStats(path, STATS);

    expect(gunzipSync(readFileSync(path)).toString("utf8")).toBe(formatPositionStats(STATS));
  });

  test("fails with FileError for an unwritable sink", async () => {
    const path = join(dir, "missing", "fd_values.csv");

    await expect(writePositionStats(path, STATS)).rejects.toThrow(FileError);
    expect(readdirSync(dir)).toEqual([]);
  });
});
