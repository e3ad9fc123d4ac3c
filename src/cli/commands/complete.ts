/**
 * Complete Command
 *
 * Fills missing fields of every entry in a BibTeX file from publisher APIs,
 * the DOI registry and academic search engines.
 *
 * Usage:
 *   bib-reconcile complete <input.bib> [options]
 *
 * Options:
 *   -o, --output <file>        Where to write the completed bibliography
 *   --report <file>            Write a Markdown change report
 *   --workers <n>              Concurrent entries
 *   --timeout <ms>             Cancel the batch after this long
 *   --no-preflight             Skip the DOI registry existence check
 *   --interactive              Ask before accepting uncertain candidates
 *   --config <file>            JSON config file
 *   --corrections <file>       Identifier correction table (defaults to the bundled one)
 *   --no-corrections           Skip the correction table
 *   --cache-dir <dir>          Persist fetched records as JSON files
 *   --failure-log <file>       Append exhausted entries to a JSON file
 *   --preprints <policy>       keep | replace
 *   --quiet                    Only print warnings and the summary
 */

import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { InvalidArgumentError, type Command } from "commander";
import type {
  BatchTotals,
  Diagnostic,
  FailureRecord,
  PreprintPolicy,
} from "../../reconcile/domain/models/reconciliation.ts";
import { errorMessage } from "../../reconcile/domain/models/errors.ts";
import { runReconciliationBatch } from "../../reconcile/application/run-batch.ts";
import type { DecisionChannel } from "../../reconcile/application/decision-channel.ts";
import { buildSourceStack, type SourceStack } from "../../reconcile/providers/index.ts";
import { RequestPacer } from "../../reconcile/providers/pacing.ts";
import {
  JsonDirectoryRecordCache,
  MemoryRecordCache,
  type RecordCache,
} from "../../reconcile/infrastructure/repositories/record-cache.ts";
import {
  JsonFileFailureLog,
  MemoryFailureLog,
  type FailureLog,
} from "../../reconcile/infrastructure/repositories/failure-log.ts";
import {
  loadCorrectionTable,
  type CorrectionTable,
} from "../../reconcile/infrastructure/repositories/correction-table.ts";
import { createReconciliationStore } from "../../reconcile/infrastructure/repositories/reconciliation-store.ts";
import { createConsoleEventEmitter } from "../../reconcile/observability/reconcile-events.ts";
import { isEntryError, parseBibtex, serializeWithVerbatim, type BibtexParseError } from "../../_shared/bibtex.ts";
import { ChangeLedger, type ChangeSink } from "../../_shared/change-ledger.ts";
import { formatBatchSummary, renderChangeReport } from "../../_shared/change-report.ts";
import {
  getReconcileRuntimeConfig,
  loadConfigFile,
  type ReconcileConfigFile,
  type ReconcileConfigOverrides,
  type ReconcileRuntimeConfig,
} from "../../_shared/runtime-config.ts";
import { EXIT_CODES, type ExitCode } from "../exit-codes.ts";
import { createPromptDecisionChannel } from "../prompt.ts";

export interface CompleteOptions {
  readonly output?: string;
  readonly report?: string;
  readonly workers?: number;
  readonly timeout?: number;
  readonly preflight?: boolean;
  readonly interactive?: boolean;
  readonly config?: string;
  readonly corrections?: string | false;
  readonly cacheDir?: string;
  readonly failureLog?: string;
  readonly preprints?: PreprintPolicy;
  readonly quiet?: boolean;
}

/** Collaborators a caller may supply instead of the live ones. */
export interface CompleteRuntime {
  env?: Record<string, string | undefined>;
  sources?: SourceStack;
  pacer?: RequestPacer;
  decide?: DecisionChannel;
  now?: () => Date;
  signal?: AbortSignal;
}

interface RunStores {
  cache: RecordCache;
  failureLog: FailureLog;
  changeSink?: ChangeSink;
}

export const BUNDLED_CORRECTIONS_PATH = fileURLToPath(
  new URL("../../../data/identifier_corrections.json", import.meta.url),
);

export function parseIntegerOption(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

export function parsePreprintPolicy(value: string): PreprintPolicy {
  if (value === "keep") return "keep";
  if (value === "replace" || value === "replace_with_published") return "replace_with_published";
  throw new InvalidArgumentError('Expected "keep" or "replace".');
}

export function defaultOutputPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}.completed${parsed.ext || ".bib"}`);
}

export function overridesFromOptions(options: CompleteOptions): ReconcileConfigOverrides {
  const overrides: ReconcileConfigOverrides = {};
  if (options.workers !== undefined) overrides.maxWorkers = options.workers;
  if (options.timeout !== undefined) overrides.timeoutMs = options.timeout > 0 ? options.timeout : null;
  if (options.preflight === false) overrides.preflight = false;
  if (options.interactive) overrides.interactive = true;
  if (options.preprints) overrides.preprintPolicy = options.preprints;
  if (options.quiet) overrides.quiet = true;
  return overrides;
}

/**
 * Picks where records, failures and change events go. A configured Supabase
 * project backs whatever the command line did not point at a local file.
 */
function openStores(config: ReconcileRuntimeConfig, options: CompleteOptions, now: () => number): RunStores {
  const remote = config.supabaseUrl && config.supabaseServiceRoleKey
    ? createReconciliationStore({
      url: config.supabaseUrl,
      serviceRoleKey: config.supabaseServiceRoleKey,
      maxAgeMs: config.cacheMaxAgeMs,
    })
    : null;

  const cache: RecordCache = options.cacheDir
    ? new JsonDirectoryRecordCache(options.cacheDir, { maxAgeMs: config.cacheMaxAgeMs, now })
    : remote ?? new MemoryRecordCache({ maxAgeMs: config.cacheMaxAgeMs, now });

  const failureLog: FailureLog = options.failureLog
    ? new JsonFileFailureLog(options.failureLog)
    : remote ?? new MemoryFailureLog();

  return remote ? { cache, failureLog, changeSink: remote } : { cache, failureLog };
}

function correctionsPath(option: string | false | undefined): string | null {
  if (option === false) return null;
  return option ?? BUNDLED_CORRECTIONS_PATH;
}

export function malformedDiagnostic(error: BibtexParseError): Diagnostic {
  return {
    sourceTag: "orchestrator",
    code: "ENTRY_MALFORMED",
    reason: `unparseable entry at line ${error.line}: ${error.message}`,
  };
}

/** Logs every unreadable entry as a failure and returns the totals that include them. */
async function recordMalformedEntries(
  errors: readonly BibtexParseError[],
  failureLog: FailureLog,
  totals: BatchTotals,
  now: () => Date,
): Promise<BatchTotals> {
  for (const error of errors) {
    await failureLog.append({
      identifier: null,
      entryId: error.entryId ?? `line ${error.line}`,
      publisherTag: "UNKNOWN",
      reason: malformedDiagnostic(error).reason,
      timestamp: now().toISOString(),
    });
  }
  return {
    ...totals,
    processed: totals.processed + errors.length,
    failed: totals.failed + errors.length,
  };
}

/** Keeps this run's failures for the report while forwarding them to the configured log. */
function teeFailureLog(target: FailureLog): { log: FailureLog; runFailures: FailureRecord[] } {
  const runFailures: FailureRecord[] = [];
  return {
    runFailures,
    log: {
      append: async (record) => {
        runFailures.push(record);
        await target.append(record);
      },
      list: () => target.list(),
    },
  };
}

export async function executeComplete(
  inputPath: string,
  options: CompleteOptions,
  runtime: CompleteRuntime = {},
): Promise<ExitCode> {
  let file: ReconcileConfigFile | undefined;
  let corrections: CorrectionTable | undefined;
  try {
    file = options.config ? await loadConfigFile(options.config) : undefined;
    const correctionsFile = correctionsPath(options.corrections);
    corrections = correctionsFile ? await loadCorrectionTable(correctionsFile) : undefined;
  } catch (error) {
    console.error(`[bib-reconcile] ${errorMessage(error)}`);
    return EXIT_CODES.CONFIG_ERROR;
  }

  const config = getReconcileRuntimeConfig({
    env: runtime.env ?? process.env,
    file,
    overrides: overridesFromOptions(options),
  });

  let text: string;
  try {
    text = await readFile(inputPath, "utf8");
  } catch (error) {
    console.error(`[bib-reconcile] cannot read ${inputPath}: ${errorMessage(error)}`);
    return EXIT_CODES.ERROR;
  }

  const parsed = parseBibtex(text);
  const malformed = parsed.errors.filter(isEntryError);
  for (const error of parsed.errors) {
    const label = isEntryError(error) ? "ENTRY_MALFORMED" : `@${error.entryType}`;
    console.warn(`[bibtex] ${label} line ${error.line}${error.entryId ? ` (${error.entryId})` : ""}: ${error.message}`);
  }
  for (const warning of parsed.warnings) {
    console.warn(`[bibtex] ${warning}`);
  }

  const now = runtime.now ?? (() => new Date());
  const stores = openStores(config, options, () => now().getTime());
  const { log: failureLog, runFailures } = teeFailureLog(stores.failureLog);
  const sources = runtime.sources ?? buildSourceStack(config);
  const pacer = runtime.pacer ?? new RequestPacer({
    requestDelayMs: config.requestDelayMs,
    cacheHitDelayMs: config.cacheHitDelayMs,
    searchDelayMs: config.searchDelayMs,
  });

  const prompt = config.interactive && !runtime.decide ? createPromptDecisionChannel() : null;
  const decide = runtime.decide ?? prompt?.decide;

  if (!config.quiet) {
    console.log(`[bib-reconcile] ${parsed.entries.length} entries from ${inputPath}, ${config.maxWorkers} worker(s)`);
  }

  const interrupt = new AbortController();
  const onInterrupt = () => {
    console.warn("[bib-reconcile] interrupted; finishing in-flight attempts and writing what is done");
    interrupt.abort();
  };
  const forward = () => interrupt.abort();
  if (runtime.signal?.aborted) interrupt.abort();
  runtime.signal?.addEventListener("abort", forward, { once: true });
  process.once("SIGINT", onInterrupt);

  const ledger = new ChangeLedger(stores.changeSink);
  try {
    const result = await runReconciliationBatch(
      parsed.entries,
      {
        adapters: sources.adapters,
        ledger,
        cache: stores.cache,
        failureLog,
        corrections,
        registryChecker: sources.registryChecker,
        publishedVersionLocators: sources.publishedVersionLocators,
        pacer,
        emit: createConsoleEventEmitter({ quiet: config.quiet }),
        now,
        ...(decide ? { decide } : {}),
      },
      {
        maxWorkers: config.maxWorkers,
        timeoutMs: config.timeoutMs,
        skipComplete: config.skipComplete,
        preflight: config.preflight,
        fetchDespitePreflightFailure: config.fetchDespitePreflightFailure,
        titleSearchFallback: config.titleSearchFallback,
        tryFlaggedIdentifiers: config.tryFlaggedIdentifiers,
        interactive: config.interactive,
        preprintPolicy: config.preprintPolicy,
        signal: interrupt.signal,
      },
    );
    const totals = await recordMalformedEntries(malformed, failureLog, result.totals, now);

    const outputPath = options.output ?? defaultOutputPath(inputPath);
    const verbatim = parsed.errors.map((error) => error.raw);
    await writeFile(outputPath, serializeWithVerbatim(result.entries, verbatim), "utf8");

    if (options.report) {
      const report = renderChangeReport({
        ledger: result.ledger,
        totals,
        failures: runFailures,
        generatedAt: now(),
      });
      await writeFile(options.report, report, "utf8");
    }

    console.log(formatBatchSummary(totals));
    console.log(`[bib-reconcile] wrote ${outputPath}`);
    return totals.failed > 0 || totals.cancelled > 0 ? EXIT_CODES.FAILURES : EXIT_CODES.SUCCESS;
  } catch (error) {
    console.error(`[bib-reconcile] ${errorMessage(error)}`);
    return EXIT_CODES.ERROR;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    runtime.signal?.removeEventListener("abort", forward);
    prompt?.close();
  }
}

export function registerCompleteCommand(program: Command): void {
  program
    .command("complete")
    .description("Fill missing fields of every entry in a BibTeX file")
    .argument("<input>", "BibTeX file to complete")
    .option("-o, --output <file>", "Where to write the completed bibliography")
    .option("--report <file>", "Write a Markdown change report")
    .option("--workers <n>", "Concurrent entries", parseIntegerOption)
    .option("--timeout <ms>", "Cancel the batch after this many milliseconds", parseIntegerOption)
    .option("--no-preflight", "Skip the DOI registry existence check")
    .option("--interactive", "Ask before accepting uncertain candidates")
    .option("--config <file>", "JSON config file")
    .option("--corrections <file>", "Identifier correction table (defaults to the bundled one)")
    .option("--no-corrections", "Skip the identifier correction table")
    .option("--cache-dir <dir>", "Persist fetched records as JSON files")
    .option("--failure-log <file>", "Append exhausted entries to a JSON file")
    .option("--preprints <policy>", "keep | replace", parsePreprintPolicy)
    .option("-q, --quiet", "Only print warnings and the summary")
    .action(async (input: string, options: CompleteOptions) => {
      process.exitCode = await executeComplete(input, options);
    });
}
