import { z } from "zod";
import type { EntryFields, FetchHint, RawRecord } from "../domain/models/reconciliation.ts";
import { ReconcileError } from "../domain/models/errors.ts";
import { normalizeIdentifier, resolvePublisherTag } from "../../_shared/identifier-resolver.ts";
import { bestTitleMatch, searchableTitle } from "../../_shared/candidate-validator.ts";
import { fetchWithRetry, readJson, responseError, type HttpClientOptions } from "./http.ts";
import { toSourceAdapter } from "./catalog.ts";
import type {
  AdapterCallContext,
  PublishedVersion,
  PublishedVersionLocator,
  SourceAdapter,
  SourceLookupFn,
} from "./types.ts";

const CROSSREF_TIMEOUT_MS = 15_000;
const CROSSREF_MAX_RETRIES = 3;
const CROSSREF_TITLE_ROWS = 5;
const TITLE_SEARCH_FIELDS = "DOI,title,container-title,type,issued";

const dateParts = z.object({ "date-parts": z.array(z.array(z.number().nullable())).optional() }).passthrough();

export const crossrefWorkSchema = z
  .object({
    DOI: z.string().optional(),
    title: z.array(z.string()).optional(),
    author: z
      .array(z.object({ given: z.string().optional(), family: z.string().optional(), name: z.string().optional() }).passthrough())
      .optional(),
    "container-title": z.array(z.string()).optional(),
    publisher: z.string().optional(),
    volume: z.string().optional(),
    issue: z.string().optional(),
    page: z.string().optional(),
    type: z.string().optional(),
    ISSN: z.array(z.string()).optional(),
    ISBN: z.array(z.string()).optional(),
    URL: z.string().optional(),
    issued: dateParts.optional(),
    published: dateParts.optional(),
    "published-print": dateParts.optional(),
  })
  .passthrough();

export type CrossrefWork = z.infer<typeof crossrefWorkSchema>;

const crossrefResponseSchema = z.object({ message: crossrefWorkSchema }).passthrough();

const crossrefSearchSchema = z
  .object({ message: z.object({ items: z.array(crossrefWorkSchema).optional() }).passthrough() })
  .passthrough();

const ENTRY_TYPE_BY_WORK_TYPE: Record<string, string> = {
  "journal-article": "article",
  "proceedings-article": "inproceedings",
  "book-chapter": "incollection",
  book: "book",
  "edited-book": "book",
  monograph: "book",
  "posted-content": "misc",
  report: "techreport",
  dissertation: "phdthesis",
};

export interface CrossrefOptions extends HttpClientOptions {
  mailto?: string | null;
}

function firstYear(work: CrossrefWork): string | undefined {
  const year = work.issued?.["date-parts"]?.[0]?.[0]
    ?? work.published?.["date-parts"]?.[0]?.[0]
    ?? work["published-print"]?.["date-parts"]?.[0]?.[0]
    ?? null;
  return year === null ? undefined : String(year);
}

export function crossrefWorkToFields(work: CrossrefWork): EntryFields {
  const fields: EntryFields = {};
  const set = (name: string, value: string | undefined) => {
    const trimmed = value?.replace(/\s+/g, " ").trim();
    if (trimmed) fields[name] = trimmed;
  };

  const authors = (work.author ?? [])
    .map((author) => author.name ?? [author.given, author.family].filter(Boolean).join(" ").trim())
    .filter(Boolean);

  const entryType = ENTRY_TYPE_BY_WORK_TYPE[work.type ?? ""] ?? "misc";
  const venue = work["container-title"]?.[0];

  set("title", work.title?.[0]);
  set("author", authors.join(" and "));
  set("year", firstYear(work));
  set(entryType === "inproceedings" || entryType === "incollection" ? "booktitle" : "journal", venue);
  set("volume", work.volume);
  set("number", work.issue);
  set("pages", work.page);
  set("publisher", work.publisher);
  set("doi", normalizeIdentifier(work.DOI) ?? undefined);
  set("issn", work.ISSN?.[0]);
  set("isbn", work.ISBN?.[0]);
  set("url", work.URL);
  return fields;
}

export function crossrefEntryType(work: CrossrefWork): string {
  return ENTRY_TYPE_BY_WORK_TYPE[work.type ?? ""] ?? "misc";
}

function userAgent(mailto: string | null | undefined): string {
  return mailto ? `bib-reconcile/0.1 (mailto:${mailto})` : "bib-reconcile/0.1";
}

async function getCrossref(
  url: string,
  label: string,
  options: CrossrefOptions,
  context: AdapterCallContext,
): Promise<Response> {
  const response = await fetchWithRetry(
    url,
    { headers: { Accept: "application/json", "User-Agent": userAgent(options.mailto) }, signal: context.signal },
    {
      label,
      timeoutMs: options.timeoutMs ?? CROSSREF_TIMEOUT_MS,
      maxRetries: options.maxRetries ?? CROSSREF_MAX_RETRIES,
      baseDelayMs: options.baseDelayMs,
      onRetry: ({ attempt, delayMs, reason }) => {
        console.warn(`[Crossref] Retry #${attempt} in ${delayMs}ms (${reason})`);
      },
    },
  );
  if (!response.ok) throw responseError("crossref", response);
  return response;
}

export function createCrossrefLookup(options: CrossrefOptions = {}): SourceLookupFn {
  return async (identifier, _hint, context): Promise<RawRecord | null> => {
    if (!identifier) {
      throw new ReconcileError("IDENTIFIER_NOT_FOUND", "crossref lookups need an identifier");
    }

    const url = `https://api.crossref.org/works/${encodeURIComponent(identifier)}`;
    const response = await getCrossref(url, "crossref-work", options, context);

    const parsed = crossrefResponseSchema.safeParse(await readJson("crossref", response));
    if (!parsed.success) {
      throw new ReconcileError("ADAPTER_EMPTY", "crossref returned an unexpected payload", { statusCode: response.status });
    }

    const work = parsed.data.message;
    return { sourceTag: "crossref", entryType: crossrefEntryType(work), fields: crossrefWorkToFields(work) };
  };
}

export function createCrossrefAdapter(options: CrossrefOptions = {}): SourceAdapter {
  return toSourceAdapter({
    sourceTag: "crossref",
    tier: "registry",
    supportsTitleSearch: false,
    lookup: createCrossrefLookup(options),
  });
}

/**
 * Finds a preprint's published version by title. Posted content (preprints
 * registered with Crossref) and arXiv DOIs never count as published.
 */
export class CrossrefTitleLocator implements PublishedVersionLocator {
  readonly sourceTag = "crossref" as const;
  readonly lookupBy = "title" as const;

  constructor(private readonly options: CrossrefOptions = {}) {}

  async findPublishedVersion(
    _arxivId: string | null,
    hint: FetchHint,
    context: AdapterCallContext = {},
  ): Promise<PublishedVersion | null> {
    const title = searchableTitle(hint.title);
    if (!title) return null;

    const url = new URL("https://api.crossref.org/works");
    url.searchParams.set("query.title", title);
    url.searchParams.set("rows", String(CROSSREF_TITLE_ROWS));
    url.searchParams.set("select", TITLE_SEARCH_FIELDS);
    const response = await getCrossref(url.toString(), "crossref-title-search", this.options, context);

    const parsed = crossrefSearchSchema.safeParse(await readJson("crossref", response));
    if (!parsed.success) {
      throw new ReconcileError("ADAPTER_EMPTY", "crossref returned an unexpected search payload", {
        statusCode: response.status,
      });
    }

    const works = (parsed.data.message.items ?? []).filter((work) => {
      const doi = normalizeIdentifier(work.DOI);
      return work.type !== "posted-content" && doi !== null && resolvePublisherTag(doi) !== "ARXIV";
    });
    const match = bestTitleMatch(title, works, (work) => work.title?.[0]);
    const doi = normalizeIdentifier(match?.DOI);
    if (!match || !doi) return null;

    const published: PublishedVersion = { identifier: doi };
    const matchedTitle = match.title?.[0];
    if (matchedTitle) published.title = matchedTitle;
    const venue = match["container-title"]?.[0];
    if (venue) published.venue = venue;
    return published;
  }
}
