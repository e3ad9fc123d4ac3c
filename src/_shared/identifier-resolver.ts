import type {
  Identifier,
  IdentifierOrigin,
  PublisherTag,
  RawEntry,
} from "../reconcile/domain/models/reconciliation.ts";

export type PrefixTable = Readonly<Record<string, PublisherTag>>;

export type ResolveResult =
  | { ok: true; identifier: Identifier }
  | { ok: false; code: "IDENTIFIER_NOT_FOUND" | "IDENTIFIER_MALFORMED"; reason: string };

export const DEFAULT_PREFIX_TABLE: PrefixTable = {
  "10.1109": "IEEE",
  "10.1145": "ACM",
  "10.1007": "SPRINGER",
  "10.1016": "ELSEVIER",
  "10.48550": "ARXIV",
};

export const ARXIV_DOI_PREFIX = "10.48550/arxiv.";

const URL_FIELDS = ["url", "ee", "howpublished"] as const;

const ARXIV_ID_BODY = String.raw`(\d{4}\.\d{4,5}|[a-z][a-z-]*(?:\.[a-z]{2})?\/\d{7})`;
const ARXIV_FIELD_PATTERN = new RegExp(`^(?:arxiv:)?${ARXIV_ID_BODY}(?:v\\d+)?$`, "i");
const ARXIV_URL_PATTERN = new RegExp(`arxiv\\.org\\/(?:abs|pdf)\\/${ARXIV_ID_BODY}(?:v\\d+)?(?:\\.pdf)?`, "i");
// "arXiv preprint arXiv:1512.03385", as reference managers write the journal.
const ARXIV_TEXT_PATTERN = new RegExp(`\\barxiv:\\s*${ARXIV_ID_BODY}`, "i");
const ARXIV_TEXT_FIELDS = ["journal", "note"] as const;
const ARXIV_DOI_PATTERN = new RegExp(`^10\\.48550\\/arxiv\\.${ARXIV_ID_BODY}(?:v\\d+)?$`, "i");

const DOI_BODY = String.raw`(10\.\d{4,9}\/[^\s?#"<>]+)`;
const DOI_URL_PATTERNS: readonly RegExp[] = [
  new RegExp(`(?:dx\\.)?doi\\.org\\/${DOI_BODY}`, "i"),
  new RegExp(`dl\\.acm\\.org\\/doi\\/(?:abs\\/|pdf\\/|full\\/|fullHtml\\/)?${DOI_BODY}`, "i"),
  new RegExp(`link\\.springer\\.com\\/(?:article|chapter)\\/${DOI_BODY}`, "i"),
  new RegExp(`onlinelibrary\\.wiley\\.com\\/doi\\/(?:abs\\/|pdf\\/|full\\/)?${DOI_BODY}`, "i"),
  new RegExp(`ieeexplore\\.ieee\\.org\\/\\S*?\\/doi\\/${DOI_BODY}`, "i"),
];

export function normalizeIdentifier(value: string | null | undefined): string | null {
  if (!value) return null;
  const normalized = value
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\/(dx\.)?doi\.org\//, "")
    .replace(/^doi:\s*/, "")
    .trim();
  return normalized || null;
}

export function isWellFormedIdentifier(value: string | null | undefined): boolean {
  const normalized = normalizeIdentifier(value);
  if (!normalized) return false;
  return /^[^\s/]+\/\S+$/.test(normalized);
}

export function resolvePublisherTag(value: string, table: PrefixTable = DEFAULT_PREFIX_TABLE): PublisherTag {
  const normalized = normalizeIdentifier(value) ?? "";
  const prefixes = Object.keys(table).sort((a, b) => b.length - a.length);
  for (const prefix of prefixes) {
    if (!normalized.startsWith(prefix)) continue;
    const boundary = normalized.charAt(prefix.length);
    if (boundary === "" || boundary === "/" || boundary === ".") {
      return table[prefix] ?? "UNKNOWN";
    }
  }
  return "UNKNOWN";
}

export function arxivIdToIdentifier(arxivId: string): string {
  return `${ARXIV_DOI_PREFIX}${arxivId.toLowerCase()}`;
}

export function arxivIdFromIdentifier(value: string): string | null {
  const normalized = normalizeIdentifier(value);
  if (!normalized) return null;
  return ARXIV_DOI_PATTERN.exec(normalized)?.[1] ?? null;
}

function stripTrailingPunctuation(value: string): string {
  return value.replace(/[.,;)\]}]+$/, "").replace(/\.pdf$/i, "");
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export function extractDoiFromUrl(url: string): string | null {
  for (const pattern of DOI_URL_PATTERNS) {
    const match = pattern.exec(url);
    if (match?.[1]) return normalizeIdentifier(stripTrailingPunctuation(safeDecode(match[1])));
  }
  return null;
}

export function extractArxivIdFromUrl(url: string): string | null {
  return ARXIV_URL_PATTERN.exec(url)?.[1] ?? null;
}

function fieldValue(entry: RawEntry, name: string): string {
  return (entry.fields[name] ?? "").trim();
}

export function extractArxivId(entry: RawEntry): string | null {
  for (const name of ["eprint", "arxivid"]) {
    const match = ARXIV_FIELD_PATTERN.exec(fieldValue(entry, name));
    if (match?.[1]) return match[1];
  }
  for (const name of URL_FIELDS) {
    const id = extractArxivIdFromUrl(fieldValue(entry, name));
    if (id) return id;
  }
  const fromDoi = arxivIdFromIdentifier(fieldValue(entry, "doi"));
  if (fromDoi) return fromDoi;
  for (const name of ARXIV_TEXT_FIELDS) {
    const match = ARXIV_TEXT_PATTERN.exec(fieldValue(entry, name));
    if (match?.[1]) return match[1];
  }
  return null;
}

export function isPreprintEntry(entry: RawEntry): boolean {
  if (entry.entryType.toLowerCase() === "misc") {
    return extractArxivId(entry) !== null;
  }
  if (/arxiv/i.test(fieldValue(entry, "archiveprefix"))) return true;
  return /arxiv/i.test(fieldValue(entry, "journal")) || /arxiv/i.test(fieldValue(entry, "publisher"));
}

export function toIdentifier(
  value: string,
  origin: IdentifierOrigin,
  table: PrefixTable = DEFAULT_PREFIX_TABLE,
): Identifier {
  const normalized = normalizeIdentifier(value) ?? value;
  return { value: normalized, publisherTag: resolvePublisherTag(normalized, table), origin };
}

/**
 * Finds the entry's canonical identifier.
 *
 * Looks at the `doi` field, then arXiv eprint fields, then URL-bearing
 * fields. A malformed `doi` does not stop the search, it only changes the
 * failure code when nothing else resolves.
 */
export function resolve(entry: RawEntry, table: PrefixTable = DEFAULT_PREFIX_TABLE): ResolveResult {
  const rawDoi = fieldValue(entry, "doi");
  let malformed: string | null = null;

  if (rawDoi) {
    if (isWellFormedIdentifier(rawDoi)) {
      return { ok: true, identifier: toIdentifier(rawDoi, "field", table) };
    }
    malformed = rawDoi;
  }

  for (const name of ["eprint", "arxivid"]) {
    const match = ARXIV_FIELD_PATTERN.exec(fieldValue(entry, name));
    if (match?.[1]) {
      return { ok: true, identifier: toIdentifier(arxivIdToIdentifier(match[1]), "eprint", table) };
    }
  }

  for (const name of URL_FIELDS) {
    const url = fieldValue(entry, name);
    if (!url) continue;
    const doi = extractDoiFromUrl(url);
    if (doi && isWellFormedIdentifier(doi)) {
      return { ok: true, identifier: toIdentifier(doi, "url", table) };
    }
    const arxivId = extractArxivIdFromUrl(url);
    if (arxivId) {
      return { ok: true, identifier: toIdentifier(arxivIdToIdentifier(arxivId), "preprint_url", table) };
    }
  }

  if (malformed !== null) {
    return { ok: false, code: "IDENTIFIER_MALFORMED", reason: `malformed doi field "${malformed}"` };
  }
  return { ok: false, code: "IDENTIFIER_NOT_FOUND", reason: "no identifier in doi, eprint or url fields" };
}
