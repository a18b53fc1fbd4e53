#!/usr/bin/env tsx

/**
 * Static front end: runs the pipeline with the fixed paths of STATIC_CONFIG
 * (data/per_read_pvals.csv -> data/fd_values.csv), fraction fields left out.
 *
 * Usage: npm run fd-values:static
 */

import { mainStatic } from "../src/cli";
import { STATIC_CONFIG } from "../src/config";

process.exitCode = await mainStatic(STATIC_CONFIG);
