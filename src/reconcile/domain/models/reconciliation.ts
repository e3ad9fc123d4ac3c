export type EntryFields = Record<string, string>;

export interface RawEntry {
  readonly entryId: string;
  entryType: string;
  fields: EntryFields;
}

export type MergedEntry = RawEntry;

export type PublisherTag = "IEEE" | "ACM" | "SPRINGER" | "ELSEVIER" | "ARXIV" | "UNKNOWN";

export type IdentifierOrigin = "field" | "eprint" | "url" | "preprint_url" | "correction" | "published_version";

export interface Identifier {
  value: string;
  publisherTag: PublisherTag;
  origin: IdentifierOrigin;
}

export type SourceTag = "arxiv" | "ieee" | "crossref" | "semantic_scholar" | "dblp" | "doi_registry" | "cache";

export type AdapterTier = "publisher" | "registry" | "search";

export type ReconcileErrorCode =
  | "IDENTIFIER_NOT_FOUND"
  | "IDENTIFIER_MALFORMED"
  | "ADAPTER_UNAVAILABLE"
  | "ADAPTER_EMPTY"
  | "VALIDATION_REJECTED"
  | "CHAIN_EXHAUSTED"
  | "ENTRY_MALFORMED"
  | "CANCELLED";

export interface Diagnostic {
  sourceTag: SourceTag | "orchestrator";
  code: ReconcileErrorCode;
  reason: string;
  statusCode?: number;
  /** Pause the source asked for before it takes more requests. */
  retryAfterMs?: number;
}

export interface RawRecord {
  sourceTag: SourceTag;
  fields: EntryFields;
  entryType?: string;
  diagnostic?: Diagnostic;
}

export type FetchResult =
  | { ok: true; record: RawRecord }
  | { ok: false; diagnostic: Diagnostic };

export interface FetchHint {
  title?: string;
  author?: string;
  year?: string;
}

export type VerdictKind = "ACCEPT" | "REJECT" | "UNCERTAIN";

export type ValidationCheck = "identifier" | "title" | "year";

export interface SimilarityMetrics {
  titleOverlap: number | null;
  yearDelta: number | null;
  identifierMatch: boolean | null;
}

export interface ValidationVerdict {
  verdict: VerdictKind;
  metrics: SimilarityMetrics;
  failedChecks: ValidationCheck[];
  reason: string;
}

export type ChangeKind = "FIELD_ADDED" | "FIELD_UPDATED" | "RECORD_REPLACED";

export interface ChangeEvent {
  readonly entryId: string;
  readonly kind: ChangeKind;
  readonly field?: string;
  readonly oldValue?: string;
  readonly newValue: string;
  readonly sourceTag: SourceTag;
  readonly timestamp: string;
}

export interface FailureRecord {
  identifier: string | null;
  entryId: string;
  publisherTag: PublisherTag;
  reason: string;
  statusCode?: number;
  timestamp: string;
}

export type CorrectionStatus = "corrected" | "invalid" | "pending";

export interface CorrectionRule {
  originalIdentifier: string;
  replacementIdentifier: string | null;
  status: CorrectionStatus;
  reason: string;
}

export type EntryOutcome = "complete" | "merged" | "replaced" | "exhausted" | "cancelled" | "failed";

export type PreprintPolicy = "keep" | "replace_with_published";

export interface AttemptTrace {
  sourceTag: SourceTag;
  identifier: string | null;
  cacheHit: boolean;
  verdict?: VerdictKind;
  diagnostic?: Diagnostic;
}

export interface BatchTotals {
  processed: number;
  modified: number;
  failed: number;
  unchanged: number;
  skippedComplete: number;
  cancelled: number;
  cacheHits: number;
  preflightFailures: number;
}
