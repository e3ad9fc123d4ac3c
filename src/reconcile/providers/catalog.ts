import type {
  AdapterTier,
  EntryFields,
  FetchHint,
  FetchResult,
  PublisherTag,
  SourceTag,
} from "../domain/models/reconciliation.ts";
import { emptyDiagnostic, ReconcileError, toDiagnostic } from "../domain/models/errors.ts";
import type { AdapterCallContext, SourceAdapter, SourceDescriptor } from "./types.ts";

export const TIER_ORDER: readonly AdapterTier[] = ["publisher", "registry", "search"];

/** Publisher-tier sources and the publisher tags they serve. */
export const PUBLISHER_ELIGIBILITY: Readonly<Partial<Record<SourceTag, readonly PublisherTag[]>>> = {
  arxiv: ["ARXIV"],
  ieee: ["IEEE"],
};

function hasUsableFields(fields: EntryFields): boolean {
  return Object.entries(fields).some(([name, value]) => !name.startsWith("_") && value.trim() !== "");
}

export function toSourceAdapter(descriptor: SourceDescriptor): SourceAdapter {
  return {
    sourceTag: descriptor.sourceTag,
    tier: descriptor.tier,
    supportsTitleSearch: descriptor.supportsTitleSearch,
    async fetch(identifier: string | null, hint: FetchHint, context: AdapterCallContext = {}): Promise<FetchResult> {
      try {
        const record = await descriptor.lookup(identifier, hint, context);
        if (!record || !hasUsableFields(record.fields)) {
          return {
            ok: false,
            diagnostic: emptyDiagnostic(descriptor.sourceTag, `${descriptor.sourceTag} returned no usable fields`),
          };
        }
        return { ok: true, record };
      } catch (error) {
        const diagnostic = toDiagnostic(descriptor.sourceTag, error);
        if (error instanceof ReconcileError) {
          console.warn(`[Provider:${descriptor.sourceTag}] ${diagnostic.code}: ${diagnostic.reason}`);
        } else {
          console.error(`[Provider:${descriptor.sourceTag}] Fetch failed`, error);
        }
        return { ok: false, diagnostic };
      }
    },
  };
}

export function isEligible(adapter: SourceAdapter, publisherTag: PublisherTag): boolean {
  if (adapter.tier !== "publisher") return true;
  return PUBLISHER_ELIGIBILITY[adapter.sourceTag]?.includes(publisherTag) ?? false;
}

/**
 * The chain for one identifier: eligible adapters in tier order, keeping the
 * configured order within a tier. Without an identifier only search-tier
 * adapters that can look up by title take part.
 */
export function eligibleAdapters(
  adapters: readonly SourceAdapter[],
  publisherTag: PublisherTag | null,
): SourceAdapter[] {
  const candidates = publisherTag === null
    ? adapters.filter((adapter) => adapter.tier === "search" && adapter.supportsTitleSearch)
    : adapters.filter((adapter) => isEligible(adapter, publisherTag));

  return candidates
    .map((adapter, idx) => ({ adapter, idx }))
    .sort((a, b) => TIER_ORDER.indexOf(a.adapter.tier) - TIER_ORDER.indexOf(b.adapter.tier) || a.idx - b.idx)
    .map(({ adapter }) => adapter);
}
