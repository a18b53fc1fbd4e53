/**
 * Tests for the command-line and static front ends
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { main, mainStatic, parseArguments } from "../src/cli";
import { resolveConfig, STATIC_CONFIG } from "../src/config";
import { ERROR_SUGGESTIONS } from "../src/errors";

const EXAMPLE = "read_id,0,1\nr1,0.01,0.02\nr2,0.50,0.03\nr3,0.60,\n";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "fdvalues-cli-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

describe("parseArguments", () => {
  test("takes a source and a sink", () => {
    expect(parseArguments(["in.csv", "out.csv"])).toEqual({
      kind: "run",
      sourcePath: "in.csv",
      sinkPath: "out.csv",
    });
  });

  test("recognises help anywhere", () => {
    expect(parseArguments(["-h"])).toEqual({ kind: "help" });
    expect(parseArguments(["in.csv", "--help"])).toEqual({ kind: "help" });
  });

  test("rejects the wrong number of arguments", () => {
    expect(parseArguments([])).toEqual({ kind: "usage-error", message: "Expected 2 arguments, got 0" });
    expect(parseArguments(["a", "b", "c"])).toEqual({
      kind: "usage-error",
      message: "Expected 2 arguments, got 3",
    });
  });

  test("rejects unknown options", () => {
    expect(parseArguments(["--lower", "in.csv", "out.csv"])).toEqual({
      kind: "usage-error",
      message: "Unknown option: --lower",
    });
  });
});

describe("main", () => {
  test("prints usage for --help and exits 0", async () => {
    expect(await main(["--help"])).toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("Usage: fd-values"));
  });

  test("prints usage to stderr for a missing argument and exits 1", async () => {
    expect(await main(["in.csv"])).toBe(1);
    expect(console.error).toHaveBeenCalledWith("Error: Expected 2 arguments, got 1\n");
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Usage: fd-values"));
  });

  test("writes fraction fields and reports a summary", async () => {
    const sourcePath = join(dir, "pvals.csv");
    const sinkPath = join(dir, "fd_values.csv");
    writeFileSync(sourcePath, EXAMPLE);

    expect(await main([sourcePath, sinkPath])).toBe(0);

    expect(readFileSync(sinkPath, "utf8").split("\n")[0]).toBe(
      "pos_0b,num_below_lower_thresh,num_above_upper_thresh,covg," +
        "frac_below_lower_thresh,frac_above_upper_thresh,f_value,d_value"
    );
    expect(console.log).toHaveBeenCalledWith(
      `Wrote 2 positions to ${sinkPath} (3 reads, 5 p-values from ${sourcePath})`
    );
  });

  test("reports a duplicate read id with a suggestion and exits 1", async () => {
    const sourcePath = join(dir, "pvals.csv");
    const sinkPath = join(dir, "fd_values.csv");
    writeFileSync(sourcePath, "read_id,0\nr1,0.01\nr1,0.9\n");

    expect(await main([sourcePath, sinkPath])).toBe(1);

    expect(console.error).toHaveBeenCalledWith(
      'Error: Duplicate read id "r1" on lines 2 and 3; read ids must be unique'
    );
    expect(console.error).toHaveBeenCalledWith(
      `Suggestion: ${ERROR_SUGGESTIONS.DUPLICATE_READ_ID}`
    );
    expect(existsSync(sinkPath)).toBe(false);
  });

  test("reports a missing source and exits 1", async () => {
    const sourcePath = join(dir, "missing.csv");

    expect(await main([sourcePath, join(dir, "fd_values.csv")])).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining(`Error: read operation failed for ${sourcePath}`)
    );
  });
});

describe("mainStatic", () => {
  test("runs the fixed config without fraction fields", async () => {
    const sourcePath = join(dir, "pvals.csv");
    const sinkPath = join(dir, "fd_values.csv");
    writeFileSync(sourcePath, EXAMPLE);

    const config = resolveConfig({ ...STATIC_CONFIG, sourcePath, sinkPath });

    expect(await mainStatic(config)).toBe(0);
    expect(readFileSync(sinkPath, "utf8")).toBe(
      "pos_0b,num_below_lower_thresh,num_above_upper_thresh,covg,f_value,d_value\n" +
        "0,1,2,3,0.3333333333333333,0.2\n" +
        "1,2,0,2,1,0.5\n"
    );
  });

  test("exits 1 when the fixed source is absent", async () => {
    const config = resolveConfig({
      ...STATIC_CONFIG,
      sourcePath: join(dir, "per_read_pvals.csv"),
      sinkPath: join(dir, "fd_values.csv"),
    });

    expect(await mainStatic(config)).toBe(1);
  });
});
