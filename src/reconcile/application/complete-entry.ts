import type {
  AttemptTrace,
  ChangeEvent,
  Diagnostic,
  EntryOutcome,
  FailureRecord,
  FetchHint,
  FetchResult,
  Identifier,
  PreprintPolicy,
  RawEntry,
  RawRecord,
  SourceTag,
} from "../domain/models/reconciliation.ts";
import { errorMessage, toDiagnostic } from "../domain/models/errors.ts";
import type { ChangeLedger } from "../../_shared/change-ledger.ts";
import { validate } from "../../_shared/candidate-validator.ts";
import { checkCompleteness, reconcile } from "../../_shared/field-merge.ts";
import {
  DEFAULT_PREFIX_TABLE,
  extractArxivId,
  isPreprintEntry,
  normalizeIdentifier,
  resolve,
  toIdentifier,
  type PrefixTable,
} from "../../_shared/identifier-resolver.ts";
import { eligibleAdapters } from "../providers/catalog.ts";
import type { RequestPacer } from "../providers/pacing.ts";
import type {
  PublishedVersionLocator,
  RegistryChecker,
  RegistryCheckResult,
  SourceAdapter,
} from "../providers/types.ts";
import type { CorrectionTable } from "../infrastructure/repositories/correction-table.ts";
import type { FailureLog } from "../infrastructure/repositories/failure-log.ts";
import type { RecordCache } from "../infrastructure/repositories/record-cache.ts";
import {
  silentEventEmitter,
  type ReconcileEvent,
  type ReconcileEventEmitter,
} from "../observability/reconcile-events.ts";
import { alwaysReject, type DecisionChannel } from "./decision-channel.ts";
import { FetchCoalescer } from "./fetch-coalescer.ts";

export interface CompleteEntryDeps {
  adapters: readonly SourceAdapter[];
  ledger: ChangeLedger;
  cache?: RecordCache;
  failureLog?: FailureLog;
  corrections?: CorrectionTable;
  registryChecker?: RegistryChecker;
  /** Tried in order until one names a published version. */
  publishedVersionLocators?: readonly PublishedVersionLocator[];
  decide?: DecisionChannel;
  pacer?: RequestPacer;
  coalescer?: FetchCoalescer;
  emit?: ReconcileEventEmitter;
  prefixTable?: PrefixTable;
  now?: () => Date;
}

export interface CompleteEntryOptions {
  skipComplete?: boolean;
  preflight?: boolean;
  fetchDespitePreflightFailure?: boolean;
  titleSearchFallback?: boolean;
  tryFlaggedIdentifiers?: boolean;
  interactive?: boolean;
  preprintPolicy?: PreprintPolicy;
  signal?: AbortSignal;
}

export interface CompleteEntryResult {
  entry: RawEntry;
  changes: ChangeEvent[];
  diagnostics: Diagnostic[];
  outcome: EntryOutcome;
  attempts: AttemptTrace[];
  identifier: Identifier | null;
  preflightFailed: boolean;
  cacheHits: number;
}

interface AcceptedChain {
  kind: "accepted";
  entry: RawEntry;
  changes: ChangeEvent[];
  replaced: boolean;
  sourceTag: SourceTag;
}

type ChainResult = AcceptedChain | { kind: "rejected" } | { kind: "cancelled" };

interface ChainRequest {
  identifier: Identifier | null;
  baseIdentifier: string | null;
  adapters: SourceAdapter[];
  replaceUnidentified?: boolean;
}

const PREFLIGHT_SOURCE: SourceTag = "doi_registry";

function hintFor(entry: RawEntry): FetchHint {
  const hint: FetchHint = {};
  if (entry.fields.title?.trim()) hint.title = entry.fields.title.trim();
  if (entry.fields.author?.trim()) hint.author = entry.fields.author.trim();
  if (entry.fields.year?.trim()) hint.year = entry.fields.year.trim();
  return hint;
}

/**
 * Runs one entry through the fallback chain and returns the completed entry.
 *
 * The chain stops at the first accepted candidate. Every change is appended
 * to the ledger before this resolves; an exhausted chain leaves one record in
 * the failure log and returns the entry untouched.
 */
export async function completeEntry(
  entry: RawEntry,
  deps: CompleteEntryDeps,
  options: CompleteEntryOptions = {},
): Promise<CompleteEntryResult> {
  const run = new EntryRun(entry, deps, options);
  return run.execute();
}

class EntryRun {
  private readonly diagnostics: Diagnostic[] = [];
  private readonly attempts: AttemptTrace[] = [];
  private readonly emit: ReconcileEventEmitter;
  private readonly now: () => Date;
  private readonly decide: DecisionChannel;
  private readonly hint: FetchHint;
  private identifier: Identifier | null = null;
  private preflightFailed = false;
  private cacheHits = 0;

  constructor(
    private readonly entry: RawEntry,
    private readonly deps: CompleteEntryDeps,
    private readonly options: CompleteEntryOptions,
  ) {
    this.emit = deps.emit ?? silentEventEmitter;
    this.now = deps.now ?? (() => new Date());
    this.decide = deps.decide ?? alwaysReject;
    this.hint = hintFor(entry);
  }

  async execute(): Promise<CompleteEntryResult> {
    if ((this.options.skipComplete ?? true) && checkCompleteness(this.entry).missing.length === 0) {
      this.event({ stage: "SKIP_COMPLETE", status: "skipped" });
      return this.finish("complete", this.entry, []);
    }

    if (this.options.signal?.aborted) return this.cancelled();

    const prefixTable = this.deps.prefixTable ?? DEFAULT_PREFIX_TABLE;
    const resolved = resolve(this.entry, prefixTable);

    if (!resolved.ok) {
      this.diagnostics.push({ sourceTag: "orchestrator", code: resolved.code, reason: resolved.reason });
      this.event({ stage: "RESOLVE", status: "failed", code: resolved.code, message: resolved.reason });

      const published = await this.replaceWithPublished(prefixTable, null);
      if (published) return this.settle(published);

      if ((this.options.titleSearchFallback ?? true) && this.hint.title) {
        const chain = await this.runChain({
          identifier: null,
          baseIdentifier: null,
          adapters: eligibleAdapters(this.deps.adapters, null),
        });
        return this.settle(chain);
      }
      return this.exhaust();
    }

    this.identifier = resolved.identifier;
    this.event({ stage: "RESOLVE", status: "completed", identifier: resolved.identifier.value });

    const originalIdentifier = resolved.identifier.value;
    const corrected = this.applyCorrection(resolved.identifier, prefixTable);
    if (!corrected) return this.exhaust();
    this.identifier = corrected;

    if (!(await this.preflight(corrected))) return this.exhaust();
    if (this.options.signal?.aborted) return this.cancelled();

    const published = await this.replaceWithPublished(prefixTable, corrected.value);
    if (published) return this.settle(published);

    const chain = await this.runChain({
      identifier: corrected,
      baseIdentifier: corrected.value,
      adapters: eligibleAdapters(this.deps.adapters, corrected.publisherTag),
    });

    if (chain.kind === "accepted" && corrected.value !== originalIdentifier && !chain.replaced) {
      return this.settle(this.rewriteCorrectedDoi(chain, originalIdentifier, corrected.value));
    }
    return this.settle(chain);
  }

  private applyCorrection(identifier: Identifier, prefixTable: PrefixTable): Identifier | null {
    const rule = this.deps.corrections?.lookup(identifier.value);
    if (!rule) return identifier;

    if (rule.status === "corrected" && rule.replacementIdentifier) {
      const replacement = toIdentifier(rule.replacementIdentifier, "correction", prefixTable);
      this.event({
        stage: "CORRECTION",
        status: "completed",
        identifier: replacement.value,
        message: `replaces ${identifier.value}`,
      });
      return replacement;
    }

    const code = rule.status === "invalid" ? "IDENTIFIER_MALFORMED" : "IDENTIFIER_NOT_FOUND";
    const reason = `identifier flagged ${rule.status} in correction table${rule.reason ? `: ${rule.reason}` : ""}`;

    if (this.options.tryFlaggedIdentifiers) {
      this.event({ stage: "CORRECTION", status: "skipped", identifier: identifier.value, message: reason });
      return identifier;
    }

    this.diagnostics.push({ sourceTag: "orchestrator", code, reason });
    this.event({ stage: "CORRECTION", status: "failed", identifier: identifier.value, code, message: reason });
    return null;
  }

  private async preflight(identifier: Identifier): Promise<boolean> {
    const checker = this.deps.registryChecker;
    if (!(this.options.preflight ?? true) || !checker) return true;

    await this.deps.pacer?.beforeNetworkCall("registry");
    let result: RegistryCheckResult;
    try {
      result = await checker.check(identifier.value);
    } catch (error) {
      result = { ok: false, reason: toDiagnostic(PREFLIGHT_SOURCE, error).reason };
    }

    if (result.ok) {
      this.event({ stage: "PREFLIGHT", status: "completed", identifier: identifier.value });
      return true;
    }

    this.preflightFailed = true;
    const diagnostic: Diagnostic = {
      sourceTag: PREFLIGHT_SOURCE,
      code: "IDENTIFIER_NOT_FOUND",
      reason: result.reason,
      ...(result.statusCode !== undefined ? { statusCode: result.statusCode } : {}),
    };
    this.diagnostics.push(diagnostic);
    this.event({
      stage: "PREFLIGHT",
      status: "failed",
      identifier: identifier.value,
      code: diagnostic.code,
      message: diagnostic.reason,
    });
    return this.options.fetchDespitePreflightFailure === true;
  }

  /**
   * Swaps a preprint for its published version when the policy asks for it.
   * Null means the entry goes through its own chain instead.
   */
  private async replaceWithPublished(
    prefixTable: PrefixTable,
    baseIdentifier: string | null,
  ): Promise<ChainResult | null> {
    if (this.options.preprintPolicy !== "replace_with_published" || !isPreprintEntry(this.entry)) return null;

    const published = await this.locatePublished(prefixTable);
    if (!published) return null;

    const chain = await this.runChain({
      identifier: published,
      baseIdentifier,
      adapters: eligibleAdapters(this.deps.adapters, published.publisherTag),
      replaceUnidentified: true,
    });
    if (chain.kind === "rejected") return null;
    if (chain.kind === "accepted" && baseIdentifier === null) this.identifier = published;
    return chain;
  }

  private async locatePublished(prefixTable: PrefixTable): Promise<Identifier | null> {
    const arxivId = extractArxivId(this.entry);

    for (const locator of this.deps.publishedVersionLocators ?? []) {
      if (locator.lookupBy === "arxiv_id" ? !arxivId : !this.hint.title) continue;
      if (this.options.signal?.aborted) return null;

      await this.deps.pacer?.beforeNetworkCall("search");
      try {
        const found = await locator.findPublishedVersion(arxivId, this.hint);
        if (!found) {
          this.event({ stage: "LOCATE_PUBLISHED", status: "skipped", sourceTag: locator.sourceTag, message: "no published version" });
          continue;
        }
        const published = toIdentifier(found.identifier, "published_version", prefixTable);
        this.event({ stage: "LOCATE_PUBLISHED", status: "completed", sourceTag: locator.sourceTag, identifier: published.value });
        return published;
      } catch (error) {
        const diagnostic = toDiagnostic(locator.sourceTag, error);
        this.diagnostics.push(diagnostic);
        this.holdOff(diagnostic);
        this.event({
          stage: "LOCATE_PUBLISHED",
          status: "failed",
          sourceTag: locator.sourceTag,
          code: diagnostic.code,
          message: diagnostic.reason,
        });
      }
    }
    return null;
  }

  private holdOff(diagnostic: Diagnostic): void {
    if (diagnostic.retryAfterMs !== undefined) this.deps.pacer?.holdOff(diagnostic.retryAfterMs);
  }

  private async runChain(request: ChainRequest): Promise<ChainResult> {
    const identifierValue = request.identifier?.value ?? null;
    let cacheRejected = false;

    for (const adapter of request.adapters) {
      if (this.options.signal?.aborted) return { kind: "cancelled" };

      if (identifierValue && this.deps.cache && !cacheRejected) {
        const cached = await this.readCache(identifierValue);
        if (cached) {
          this.cacheHits += 1;
          await this.deps.pacer?.afterCacheHit();
          const outcome = await this.consider(cached, request, true);
          if (outcome.kind === "accepted") return outcome;
          cacheRejected = true;
          if (this.options.signal?.aborted) return { kind: "cancelled" };
        }
      }

      const result = await this.fetchVia(adapter, identifierValue);
      if (!result.ok) {
        this.diagnostics.push(result.diagnostic);
        this.holdOff(result.diagnostic);
        this.attempts.push({
          sourceTag: adapter.sourceTag,
          identifier: identifierValue,
          cacheHit: false,
          diagnostic: result.diagnostic,
        });
        this.event({
          stage: "FETCH",
          status: "failed",
          sourceTag: adapter.sourceTag,
          identifier: identifierValue,
          code: result.diagnostic.code,
          message: result.diagnostic.reason,
        });
        continue;
      }

      this.event({ stage: "FETCH", status: "completed", sourceTag: adapter.sourceTag, identifier: identifierValue });
      const outcome = await this.consider(result.record, request, false);
      if (outcome.kind === "accepted") {
        if (identifierValue && this.deps.cache) {
          await this.deps.cache.put(identifierValue, result.record);
        }
        return outcome;
      }
    }

    return this.options.signal?.aborted ? { kind: "cancelled" } : { kind: "rejected" };
  }

  private async readCache(identifier: string): Promise<RawRecord | null> {
    const cache = this.deps.cache;
    if (!cache) return null;
    try {
      return await cache.get(identifier);
    } catch (error) {
      console.warn("[Orchestrator] cache read failed:", errorMessage(error));
      return null;
    }
  }

  private fetchVia(adapter: SourceAdapter, identifier: string | null): Promise<FetchResult> {
    const start = async (): Promise<FetchResult> => {
      await this.deps.pacer?.beforeNetworkCall(adapter.tier);
      try {
        return await adapter.fetch(identifier, this.hint);
      } catch (error) {
        return { ok: false, diagnostic: toDiagnostic(adapter.sourceTag, error) };
      }
    };

    if (!identifier || !this.deps.coalescer) return start();
    return this.deps.coalescer.run(FetchCoalescer.keyFor(adapter.sourceTag, identifier), start);
  }

  private async consider(
    record: RawRecord,
    request: ChainRequest,
    cacheHit: boolean,
  ): Promise<AcceptedChain | { kind: "rejected" }> {
    const identifierValue = request.identifier?.value ?? null;
    const verdict = validate(this.entry, record, {
      identifier: identifierValue,
      interactive: this.options.interactive,
    });

    let accepted = verdict.verdict === "ACCEPT";
    if (verdict.verdict === "UNCERTAIN") {
      accepted = await this.decide({ entry: this.entry, candidate: record, verdict, identifier: identifierValue });
    }

    this.attempts.push({ sourceTag: record.sourceTag, identifier: identifierValue, cacheHit, verdict: verdict.verdict });
    this.event({
      stage: "VALIDATE",
      status: accepted ? "completed" : "failed",
      sourceTag: record.sourceTag,
      identifier: identifierValue,
      cacheHit,
      verdict: verdict.verdict,
      message: verdict.reason,
    });

    if (!accepted) {
      this.diagnostics.push({
        sourceTag: cacheHit ? "cache" : record.sourceTag,
        code: "VALIDATION_REJECTED",
        reason: verdict.reason,
      });
      return { kind: "rejected" };
    }

    const merged = reconcile(
      this.entry,
      record.fields,
      {
        sourceTag: record.sourceTag,
        originalIdentifier: request.baseIdentifier,
        candidateIdentifier: normalizeIdentifier(record.fields.doi) ?? identifierValue,
        replaceUnidentified: request.replaceUnidentified,
      },
      { now: this.now },
    );
    return {
      kind: "accepted",
      entry: merged.entry,
      changes: merged.changes,
      replaced: merged.replaced,
      sourceTag: record.sourceTag,
    };
  }

  /** The entry still carries the identifier the correction table replaced. */
  private rewriteCorrectedDoi(
    chain: AcceptedChain,
    originalIdentifier: string,
    correctedIdentifier: string,
  ): AcceptedChain {
    const current = chain.entry.fields.doi;
    if (current === undefined || normalizeIdentifier(current) !== originalIdentifier) return chain;

    const event: ChangeEvent = Object.freeze({
      entryId: this.entry.entryId,
      kind: "FIELD_UPDATED" as const,
      field: "doi",
      oldValue: current,
      newValue: correctedIdentifier,
      sourceTag: chain.sourceTag,
      timestamp: this.now().toISOString(),
    });
    return {
      ...chain,
      entry: { ...chain.entry, fields: { ...chain.entry.fields, doi: correctedIdentifier } },
      changes: [...chain.changes, event],
    };
  }

  private async settle(chain: ChainResult): Promise<CompleteEntryResult> {
    if (chain.kind === "cancelled") return this.cancelled();
    if (chain.kind === "rejected") return this.exhaust();

    await this.deps.ledger.append(chain.changes);
    this.event({
      stage: "MERGE",
      status: "completed",
      identifier: this.identifier?.value ?? null,
      message: `${chain.changes.length} change(s)`,
    });
    return this.finish(chain.replaced ? "replaced" : "merged", chain.entry, chain.changes);
  }

  private async exhaust(): Promise<CompleteEntryResult> {
    const reasons = this.diagnostics.map((diagnostic) => `${diagnostic.sourceTag}: ${diagnostic.reason}`);
    let statusCode: number | undefined;
    for (const diagnostic of this.diagnostics) {
      if (diagnostic.statusCode !== undefined) statusCode = diagnostic.statusCode;
    }

    const reason = reasons.length > 0 ? reasons.join("; ") : "no eligible adapters";
    this.diagnostics.push({
      sourceTag: "orchestrator",
      code: "CHAIN_EXHAUSTED",
      reason,
      ...(statusCode !== undefined ? { statusCode } : {}),
    });

    const record: FailureRecord = {
      identifier: this.identifier?.value ?? null,
      entryId: this.entry.entryId,
      publisherTag: this.identifier?.publisherTag ?? "UNKNOWN",
      reason,
      timestamp: this.now().toISOString(),
      ...(statusCode !== undefined ? { statusCode } : {}),
    };
    await this.deps.failureLog?.append(record);

    this.event({
      stage: "EXHAUSTED",
      status: "failed",
      identifier: record.identifier,
      code: "CHAIN_EXHAUSTED",
      message: reason,
    });
    return this.finish("exhausted", this.entry, []);
  }

  private cancelled(): CompleteEntryResult {
    this.diagnostics.push({ sourceTag: "orchestrator", code: "CANCELLED", reason: "run cancelled" });
    this.event({ stage: "CANCELLED", status: "skipped", identifier: this.identifier?.value ?? null });
    return this.finish("cancelled", this.entry, []);
  }

  private finish(outcome: EntryOutcome, entry: RawEntry, changes: ChangeEvent[]): CompleteEntryResult {
    return {
      entry,
      changes,
      diagnostics: this.diagnostics,
      outcome,
      attempts: this.attempts,
      identifier: this.identifier,
      preflightFailed: this.preflightFailed,
      cacheHits: this.cacheHits,
    };
  }

  private event(event: Omit<ReconcileEvent, "entryId" | "at">): void {
    this.emit({ ...event, entryId: this.entry.entryId, at: this.now().toISOString() });
  }
}
