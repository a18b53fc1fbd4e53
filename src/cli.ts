#!/usr/bin/env tsx

/**
 * Command-line front end: per-read p-value table in, f/d-value table out
 *
 * Usage: npm run fd-values -- <filepath_to_read> <filepath_to_write>
 *
 * Examples:
 *   npm run fd-values -- per_read_pvals.csv fd_values.csv
 *   npm run fd-values -- per_read_pvals.tsv.gz fd_values.tsv.gz
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { type PipelineConfig, resolveConfig, STATIC_CONFIG } from "./config";
import { FdValuesError, getErrorSuggestion } from "./errors";
import { type PipelineSummary, runPipeline } from "./operations";

const USAGE = `Usage: fd-values <filepath_to_read> <filepath_to_write>

Compute per-position f-values and d-values from a table of per-read p-values.

Arguments:
  filepath_to_read   CSV/TSV of p-values: header of 0-based positions, one row per read
  filepath_to_write  Output CSV/TSV (gzip-compressed when it ends in .gz)

Options:
  -h, --help         Show this help`;

export type CliArguments =
  | { readonly kind: "help" }
  | { readonly kind: "run"; readonly sourcePath: string; readonly sinkPath: string }
  | { readonly kind: "usage-error"; readonly message: string };

/**
 * Interpret argv (without the node and script entries)
 */
export function parseArguments(args: readonly string[]): CliArguments {
  if (args.includes("--help") || args.includes("-h")) {
    return { kind: "help" };
  }

  const unknown = args.find((arg) => arg.startsWith("-") && arg !== "-");
  if (unknown !== undefined) {
    return { kind: "usage-error", message: `Unknown option: ${unknown}` };
  }

  const [sourcePath, sinkPath] = args;
  if (args.length !== 2 || sourcePath === undefined || sinkPath === undefined) {
    return {
      kind: "usage-error",
      message: `Expected 2 arguments, got ${args.length}`,
    };
  }

  return { kind: "run", sourcePath, sinkPath };
}

/**
 * Run the command-line front end; resolves to the process exit code
 */
export async function main(args: readonly string[]): Promise<number> {
  const parsed = parseArguments(args);

  switch (parsed.kind) {
    case "help":
      console.log(USAGE);
      return 0;
    case "usage-error":
      console.error(`Error: ${parsed.message}\n`);
      console.error(USAGE);
      return 1;
    case "run":
      return execute(() =>
        resolveConfig({
          sourcePath: parsed.sourcePath,
          sinkPath: parsed.sinkPath,
          includeFractionFields: true,
        })
      );
  }
}

/**
 * Run the static front end against a fixed config; resolves to the exit code
 */
export function mainStatic(config: PipelineConfig = STATIC_CONFIG): Promise<number> {
  return execute(() => config);
}

async function execute(buildConfig: () => PipelineConfig): Promise<number> {
  try {
    const summary = await runPipeline(buildConfig());
    console.log(formatSummary(summary));
    return 0;
  } catch (error) {
    reportFailure(error);
    return 1;
  }
}

function formatSummary(summary: PipelineSummary): string {
  return (
    `Wrote ${summary.positions} positions to ${summary.sinkPath} ` +
    `(${summary.reads} reads, ${summary.observations} p-values from ${summary.sourcePath})`
  );
}

function reportFailure(error: unknown): void {
  if (error instanceof FdValuesError) {
    console.error(`Error: ${error.message}`);
    const suggestion = getErrorSuggestion(error);
    if (suggestion !== undefined) {
      console.error(`Suggestion: ${suggestion}`);
    }
  } else if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error(`Error: ${String(error)}`);
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  return import.meta.url === pathToFileURL(resolve(script)).href;
}

// Run if executed directly
if (isEntryPoint()) {
  process.exitCode = await main(process.argv.slice(2));
}
