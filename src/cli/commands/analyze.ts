/**
 * Analyze Command
 *
 * Reports how complete a bibliography is without touching the network.
 *
 * Usage:
 *   bib-reconcile analyze <input.bib> [--json]
 */

import { readFile } from "node:fs/promises";
import type { Command } from "commander";
import type { RawEntry } from "../../reconcile/domain/models/reconciliation.ts";
import { errorMessage } from "../../reconcile/domain/models/errors.ts";
import { parseBibtex } from "../../_shared/bibtex.ts";
import { checkCompleteness } from "../../_shared/field-merge.ts";
import { resolve } from "../../_shared/identifier-resolver.ts";
import { EXIT_CODES, type ExitCode } from "../exit-codes.ts";

interface AnalyzeOptions {
  readonly json?: boolean;
}

export interface BibliographyAnalysis {
  total: number;
  incomplete: number;
  withIdentifier: number;
  parseErrors: number;
  fieldCounts: Record<string, number>;
  missingCounts: Record<string, number>;
}

export function analyzeEntries(entries: readonly RawEntry[], parseErrors = 0): BibliographyAnalysis {
  const fieldCounts: Record<string, number> = {};
  const missingCounts: Record<string, number> = {};
  let incomplete = 0;
  let withIdentifier = 0;

  for (const entry of entries) {
    for (const [name, value] of Object.entries(entry.fields)) {
      if (value.trim() === "") continue;
      fieldCounts[name] = (fieldCounts[name] ?? 0) + 1;
    }

    const { missing } = checkCompleteness(entry);
    if (missing.length > 0) incomplete += 1;
    for (const name of missing) {
      missingCounts[name] = (missingCounts[name] ?? 0) + 1;
    }

    if (resolve(entry).ok) withIdentifier += 1;
  }

  return { total: entries.length, incomplete, withIdentifier, parseErrors, fieldCounts, missingCounts };
}

function sortedCounts(counts: Record<string, number>): Array<[string, number]> {
  return Object.entries(counts).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

export function formatAnalysis(analysis: BibliographyAnalysis): string {
  const lines = [
    `Entries: ${analysis.total}`,
    `Incomplete: ${analysis.incomplete}`,
    `With identifier: ${analysis.withIdentifier}`,
  ];
  if (analysis.parseErrors > 0) lines.push(`Parse errors: ${analysis.parseErrors}`);

  lines.push("", "Field presence:");
  for (const [name, count] of sortedCounts(analysis.fieldCounts)) {
    lines.push(`  ${name.padEnd(14)} ${count}`);
  }

  const missing = sortedCounts(analysis.missingCounts);
  if (missing.length > 0) {
    lines.push("", "Missing important fields:");
    for (const [name, count] of missing) {
      lines.push(`  ${name.padEnd(14)} ${count}`);
    }
  }
  return lines.join("\n");
}

export async function executeAnalyze(inputPath: string, options: AnalyzeOptions = {}): Promise<ExitCode> {
  let text: string;
  try {
    text = await readFile(inputPath, "utf8");
  } catch (error) {
    console.error(`[bib-reconcile] cannot read ${inputPath}: ${errorMessage(error)}`);
    return EXIT_CODES.ERROR;
  }

  const parsed = parseBibtex(text);
  for (const error of parsed.errors) {
    console.warn(`[bibtex] line ${error.line}: ${error.message}`);
  }

  const analysis = analyzeEntries(parsed.entries, parsed.errors.length);
  console.log(options.json ? JSON.stringify(analysis, null, 2) : formatAnalysis(analysis));
  return EXIT_CODES.SUCCESS;
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command("analyze")
    .description("Count field presence and incomplete entries in a BibTeX file")
    .argument("<input>", "BibTeX file to inspect")
    .option("--json", "Output as JSON")
    .action(async (input: string, options: AnalyzeOptions) => {
      process.exitCode = await executeAnalyze(input, options);
    });
}
