import type {
  EntryFields,
  RawEntry,
  SimilarityMetrics,
  ValidationCheck,
  ValidationVerdict,
} from "../reconcile/domain/models/reconciliation.ts";
import { normalizeIdentifier } from "./identifier-resolver.ts";

export const TITLE_OVERLAP_THRESHOLD = 0.6;
export const YEAR_TOLERANCE = 1;

// Keeps 3/5 at exactly the threshold despite float division.
const RATIO_EPSILON = 1e-9;

export interface ValidateOptions {
  identifier: string | null;
  interactive?: boolean;
}

export function tokenizeTitle(value: string | null | undefined): Set<string> {
  if (!value) return new Set();
  return new Set(
    value
      .toLowerCase()
      .replace(/[{}]/g, "")
      .replace(/[^\p{L}\p{N}\s]/gu, "")
      .split(/\s+/)
      .filter(Boolean),
  );
}

export function titleOverlap(a: string | null | undefined, b: string | null | undefined): number {
  const left = tokenizeTitle(a);
  const right = tokenizeTitle(b);
  if (left.size === 0 || right.size === 0) return 0;
  const [smaller, larger] = left.size <= right.size ? [left, right] : [right, left];
  let shared = 0;
  for (const token of smaller) {
    if (larger.has(token)) shared += 1;
  }
  return shared / smaller.size;
}

export function meetsTitleThreshold(ratio: number): boolean {
  return ratio + RATIO_EPSILON >= TITLE_OVERLAP_THRESHOLD;
}

/** A title as a search query, without BibTeX braces or escapes. */
export function searchableTitle(value: string | null | undefined): string | null {
  const cleaned = value?.replace(/[{}\\]/g, "").replace(/\s+/g, " ").trim();
  return cleaned || null;
}

/** The candidate whose title overlaps `title` most, if any clears the threshold. */
export function bestTitleMatch<T>(
  title: string,
  candidates: readonly T[],
  titleOf: (candidate: T) => string | null | undefined,
): T | null {
  let best: { candidate: T; score: number } | null = null;
  for (const candidate of candidates) {
    const score = titleOverlap(title, titleOf(candidate));
    if (!meetsTitleThreshold(score)) continue;
    if (!best || score > best.score) best = { candidate, score };
  }
  return best?.candidate ?? null;
}

export function parseYear(value: string | null | undefined): number | null {
  if (!value) return null;
  const match = /\d{4}/.exec(value);
  return match ? Number.parseInt(match[0], 10) : null;
}

/**
 * Decides whether a fetched record describes the same publication as the
 * original entry. Checks that cannot run for lack of data are skipped.
 */
export function validate(
  original: RawEntry,
  candidate: { fields: EntryFields },
  options: ValidateOptions,
): ValidationVerdict {
  const metrics: SimilarityMetrics = { titleOverlap: null, yearDelta: null, identifierMatch: null };
  const failedChecks: ValidationCheck[] = [];
  const reasons: string[] = [];

  const originalTitle = original.fields.title ?? "";
  if (tokenizeTitle(originalTitle).size > 0) {
    const ratio = titleOverlap(originalTitle, candidate.fields.title);
    metrics.titleOverlap = ratio;
    if (!meetsTitleThreshold(ratio)) {
      failedChecks.push("title");
      reasons.push(`title overlap ${ratio.toFixed(2)} below ${TITLE_OVERLAP_THRESHOLD}`);
    }
  }

  const originalYear = parseYear(original.fields.year);
  const candidateYear = parseYear(candidate.fields.year);
  if (originalYear !== null && candidateYear !== null) {
    const delta = Math.abs(originalYear - candidateYear);
    metrics.yearDelta = delta;
    if (delta > YEAR_TOLERANCE) {
      failedChecks.push("year");
      reasons.push(`year delta ${delta} exceeds ${YEAR_TOLERANCE}`);
    }
  }

  const fetchedFor = normalizeIdentifier(options.identifier);
  const candidateDoi = normalizeIdentifier(candidate.fields.doi);
  if (fetchedFor && candidateDoi) {
    const match = fetchedFor === candidateDoi;
    metrics.identifierMatch = match;
    if (!match) {
      failedChecks.push("identifier");
      reasons.push(`identifier mismatch ${candidateDoi} != ${fetchedFor}`);
    }
  }

  if (failedChecks.length === 0) {
    return { verdict: "ACCEPT", metrics, failedChecks, reason: "all checks passed" };
  }

  const downgradable = options.interactive === true && !failedChecks.includes("identifier");
  return {
    verdict: downgradable ? "UNCERTAIN" : "REJECT",
    metrics,
    failedChecks,
    reason: reasons.join("; "),
  };
}
