import type {
  AdapterTier,
  FetchHint,
  FetchResult,
  RawRecord,
  SourceTag,
} from "../domain/models/reconciliation.ts";

export interface AdapterCallContext {
  signal?: AbortSignal;
}

/** Uniform contract every external source is driven through. */
export interface SourceAdapter {
  readonly sourceTag: SourceTag;
  readonly tier: AdapterTier;
  readonly supportsTitleSearch: boolean;
  fetch(identifier: string | null, hint: FetchHint, context?: AdapterCallContext): Promise<FetchResult>;
}

/**
 * Raw lookup an adapter is built from. Returns null when the source has no
 * record and throws `ReconcileError` for everything else.
 */
export type SourceLookupFn = (
  identifier: string | null,
  hint: FetchHint,
  context: AdapterCallContext,
) => Promise<RawRecord | null>;

export interface SourceDescriptor {
  sourceTag: SourceTag;
  tier: AdapterTier;
  supportsTitleSearch: boolean;
  lookup: SourceLookupFn;
}

export type RegistryCheckResult =
  | { ok: true; statusCode?: number }
  | { ok: false; reason: string; statusCode?: number };

export interface RegistryChecker {
  check(identifier: string, context?: AdapterCallContext): Promise<RegistryCheckResult>;
}

export interface PublishedVersion {
  identifier: string;
  title?: string;
  venue?: string;
}

export type PublishedVersionKey = "arxiv_id" | "title";

/**
 * Finds the published record of a preprint. Locators keyed on `arxiv_id`
 * are skipped for entries without one, `title` locators for entries
 * without a title.
 */
export interface PublishedVersionLocator {
  readonly sourceTag: SourceTag;
  readonly lookupBy: PublishedVersionKey;
  findPublishedVersion(
    arxivId: string | null,
    hint: FetchHint,
    context?: AdapterCallContext,
  ): Promise<PublishedVersion | null>;
}
