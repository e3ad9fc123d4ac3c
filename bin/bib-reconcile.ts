#!/usr/bin/env tsx
/**
 * bib-reconcile entry point.
 *
 * @module bib-reconcile-cli
 */

import { runCli } from "../src/cli/index.ts";
import { EXIT_CODES } from "../src/cli/exit-codes.ts";

runCli().catch((error: unknown) => {
  console.error(`[bib-reconcile] ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = EXIT_CODES.ERROR;
});
