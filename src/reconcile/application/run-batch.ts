import type {
  BatchTotals,
  Diagnostic,
  RawEntry,
} from "../domain/models/reconciliation.ts";
import { errorMessage } from "../domain/models/errors.ts";
import { ChangeLedger } from "../../_shared/change-ledger.ts";
import { resolve } from "../../_shared/identifier-resolver.ts";
import {
  completeEntry,
  type CompleteEntryDeps,
  type CompleteEntryOptions,
  type CompleteEntryResult,
} from "./complete-entry.ts";
import { serializeDecisions } from "./decision-channel.ts";
import { FetchCoalescer } from "./fetch-coalescer.ts";

export interface BatchDeps extends Omit<CompleteEntryDeps, "ledger"> {
  ledger?: ChangeLedger;
}

export interface BatchOptions extends Omit<CompleteEntryOptions, "signal"> {
  maxWorkers?: number;
  timeoutMs?: number | null;
  signal?: AbortSignal;
}

export interface BatchResult {
  entries: RawEntry[];
  outcomes: CompleteEntryResult[];
  ledger: ChangeLedger;
  totals: BatchTotals;
}

const DEFAULT_MAX_WORKERS = 4;

/** Aborts when the caller's signal fires or the batch deadline passes. */
function combinedSignal(external: AbortSignal | undefined, timeoutMs: number | null | undefined): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const onAbort = () => controller.abort();

  if (external?.aborted) controller.abort();
  external?.addEventListener("abort", onAbort, { once: true });

  const timer = timeoutMs && timeoutMs > 0 ? setTimeout(onAbort, timeoutMs) : null;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      external?.removeEventListener("abort", onAbort);
    },
  };
}

function passThrough(entry: RawEntry, outcome: "cancelled" | "failed", diagnostic: Diagnostic): CompleteEntryResult {
  return {
    entry,
    changes: [],
    diagnostics: [diagnostic],
    outcome,
    attempts: [],
    identifier: null,
    preflightFailed: false,
    cacheHits: 0,
  };
}

export function summarizeOutcomes(outcomes: readonly CompleteEntryResult[]): BatchTotals {
  const totals: BatchTotals = {
    processed: outcomes.length,
    modified: 0,
    failed: 0,
    unchanged: 0,
    skippedComplete: 0,
    cancelled: 0,
    cacheHits: 0,
    preflightFailures: 0,
  };

  for (const result of outcomes) {
    totals.cacheHits += result.cacheHits;
    if (result.preflightFailed) totals.preflightFailures += 1;

    switch (result.outcome) {
      case "complete":
        totals.skippedComplete += 1;
        break;
      case "merged":
      case "replaced":
        if (result.changes.length > 0) totals.modified += 1;
        else totals.unchanged += 1;
        break;
      case "exhausted":
      case "failed":
        totals.failed += 1;
        break;
      case "cancelled":
        totals.cancelled += 1;
        break;
    }
  }
  return totals;
}

/**
 * Completes every entry with a bounded pool of workers. Results come back in
 * input order whatever order the workers finish in.
 */
export async function runReconciliationBatch(
  entries: readonly RawEntry[],
  deps: BatchDeps,
  options: BatchOptions = {},
): Promise<BatchResult> {
  const ledger = deps.ledger ?? new ChangeLedger();
  const entryDeps: CompleteEntryDeps = {
    ...deps,
    ledger,
    coalescer: deps.coalescer ?? new FetchCoalescer(),
    ...(deps.decide ? { decide: serializeDecisions(deps.decide) } : {}),
  };
  const now = deps.now ?? (() => new Date());

  const { maxWorkers = DEFAULT_MAX_WORKERS, timeoutMs, signal: external, ...entryOptions } = options;
  const { signal, dispose } = combinedSignal(external, timeoutMs);

  const outcomes = Array.from({ length: entries.length }, (): CompleteEntryResult | undefined => undefined);
  let next = 0;

  const worker = async () => {
    while (next < entries.length) {
      const index = next;
      next += 1;
      const entry = entries[index];
      if (!entry) continue;

      if (signal.aborted) {
        outcomes[index] = passThrough(entry, "cancelled", {
          sourceTag: "orchestrator",
          code: "CANCELLED",
          reason: "run cancelled before entry started",
        });
        continue;
      }

      try {
        outcomes[index] = await completeEntry(entry, entryDeps, { ...entryOptions, signal });
      } catch (error) {
        const message = errorMessage(error);
        console.error(`[Orchestrator] entry=${entry.entryId} failed unexpectedly:`, message);
        outcomes[index] = passThrough(entry, "failed", {
          sourceTag: "orchestrator",
          code: "ENTRY_MALFORMED",
          reason: message,
        });
        await recordUnexpectedFailure(entry, message, entryDeps, now);
      }
    }
  };

  const poolSize = Math.max(1, Math.min(Math.trunc(maxWorkers), entries.length));
  try {
    await Promise.all(Array.from({ length: poolSize }, () => worker()));
  } finally {
    dispose();
  }
  await ledger.flush();

  const settled = entries.map((entry, idx) =>
    outcomes[idx] ?? passThrough(entry, "cancelled", {
      sourceTag: "orchestrator",
      code: "CANCELLED",
      reason: "run cancelled before entry started",
    })
  );

  return {
    entries: settled.map((result) => result.entry),
    outcomes: settled,
    ledger,
    totals: summarizeOutcomes(settled),
  };
}

async function recordUnexpectedFailure(
  entry: RawEntry,
  message: string,
  deps: CompleteEntryDeps,
  now: () => Date,
): Promise<void> {
  if (!deps.failureLog) return;
  const resolved = resolve(entry, deps.prefixTable);
  try {
    await deps.failureLog.append({
      identifier: resolved.ok ? resolved.identifier.value : null,
      entryId: entry.entryId,
      publisherTag: resolved.ok ? resolved.identifier.publisherTag : "UNKNOWN",
      reason: message,
      timestamp: now().toISOString(),
    });
  } catch (error) {
    console.warn(`[Orchestrator] entry=${entry.entryId} failure record not written:`, errorMessage(error));
  }
}
