import type {
  ChangeEvent,
  EntryFields,
  MergedEntry,
  RawEntry,
  SourceTag,
} from "../reconcile/domain/models/reconciliation.ts";
import { normalizeIdentifier } from "./identifier-resolver.ts";

export interface MergeResult {
  entry: MergedEntry;
  changes: ChangeEvent[];
}

export interface ReplaceContext {
  oldIdentifier: string | null;
  newIdentifier: string;
  sourceTag: SourceTag;
}

export interface ReconcileContext {
  sourceTag: SourceTag;
  originalIdentifier: string | null;
  candidateIdentifier: string | null;
  /** Replace even when the entry had no identifier of its own. */
  replaceUnidentified?: boolean;
}

export interface MergeClock {
  now?: () => Date;
}

type VenueField = "journal" | "booktitle";

const ARTICLE_LIKE = new Set(["article", "periodical"]);
const PROCEEDINGS_LIKE = new Set(["inproceedings", "conference", "incollection"]);
const BOOK_LIKE = new Set(["book", "proceedings", "inbook"]);

const COMMON_FIELDS = ["author", "title", "year", "doi"];

export function venueFieldFor(entryType: string): VenueField | null {
  const type = entryType.toLowerCase();
  if (ARTICLE_LIKE.has(type)) return "journal";
  if (PROCEEDINGS_LIKE.has(type)) return "booktitle";
  return null;
}

export function importantFieldsFor(entryType: string): string[] {
  const type = entryType.toLowerCase();
  if (ARTICLE_LIKE.has(type)) return [...COMMON_FIELDS, "journal", "volume", "number", "pages"];
  if (PROCEEDINGS_LIKE.has(type)) return [...COMMON_FIELDS, "booktitle", "pages", "publisher"];
  if (BOOK_LIKE.has(type)) return [...COMMON_FIELDS, "publisher"];
  return [...COMMON_FIELDS];
}

function hasValue(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== "";
}

export function checkCompleteness(entry: RawEntry): { present: string[]; missing: string[] } {
  const present: string[] = [];
  const missing: string[] = [];
  for (const field of importantFieldsFor(entry.entryType)) {
    if (hasValue(entry.fields[field])) present.push(field);
    else missing.push(field);
  }
  return { present, missing };
}

/**
 * Moves a venue the candidate filed under the wrong name (`journal` on a
 * proceedings entry, `booktitle` on an article) to the name the entry type
 * expects, unless the candidate already carries that one.
 */
function remapVenue(entryType: string, fields: EntryFields): EntryFields {
  const expected = venueFieldFor(entryType);
  if (!expected) return fields;
  const other: VenueField = expected === "journal" ? "booktitle" : "journal";
  const misplaced = fields[other];
  if (misplaced === undefined) return fields;

  const remapped: EntryFields = {};
  for (const [name, value] of Object.entries(fields)) {
    if (name !== other) remapped[name] = value;
  }
  if (!hasValue(remapped[expected])) remapped[expected] = misplaced;
  return remapped;
}

function timestampOf(clock: MergeClock | undefined): string {
  return (clock?.now?.() ?? new Date()).toISOString();
}

function fillOnly(
  base: EntryFields,
  candidate: EntryFields,
  entryType: string,
): Array<{ field: string; value: string }> {
  const added: Array<{ field: string; value: string }> = [];
  for (const [field, value] of Object.entries(remapVenue(entryType, candidate))) {
    if (field.startsWith("_")) continue;
    if (!hasValue(value)) continue;
    if (hasValue(base[field])) continue;
    base[field] = value.trim();
    added.push({ field, value: value.trim() });
  }
  return added;
}

export function merge(
  original: RawEntry,
  candidate: EntryFields,
  sourceTag: SourceTag,
  clock?: MergeClock,
): MergeResult {
  const fields: EntryFields = { ...original.fields };
  const added = fillOnly(fields, candidate, original.entryType);
  const timestamp = timestampOf(clock);

  return {
    entry: { entryId: original.entryId, entryType: original.entryType, fields },
    changes: added.map(({ field, value }) =>
      Object.freeze({
        entryId: original.entryId,
        kind: "FIELD_ADDED" as const,
        field,
        newValue: value,
        sourceTag,
        timestamp,
      })
    ),
  };
}

export function replaceRecord(
  original: RawEntry,
  candidate: EntryFields,
  context: ReplaceContext,
  clock?: MergeClock,
): MergeResult {
  const fields: EntryFields = {};
  fillOnly(fields, candidate, original.entryType);

  const event: ChangeEvent = Object.freeze({
    entryId: original.entryId,
    kind: "RECORD_REPLACED" as const,
    ...(context.oldIdentifier !== null ? { oldValue: context.oldIdentifier } : {}),
    newValue: context.newIdentifier,
    sourceTag: context.sourceTag,
    timestamp: timestampOf(clock),
  });

  return {
    entry: { entryId: original.entryId, entryType: original.entryType, fields },
    changes: [event],
  };
}

export function reconcile(
  original: RawEntry,
  candidate: EntryFields,
  context: ReconcileContext,
  clock?: MergeClock,
): MergeResult & { replaced: boolean } {
  const before = normalizeIdentifier(context.originalIdentifier);
  const after = normalizeIdentifier(context.candidateIdentifier);
  if (after && before !== after && (before || context.replaceUnidentified)) {
    return {
      ...replaceRecord(original, candidate, { oldIdentifier: before, newIdentifier: after, sourceTag: context.sourceTag }, clock),
      replaced: true,
    };
  }
  return { ...merge(original, candidate, context.sourceTag, clock), replaced: false };
}
