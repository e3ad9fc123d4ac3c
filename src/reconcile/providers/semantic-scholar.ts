import { z } from "zod";
import type { EntryFields, FetchHint, RawRecord } from "../domain/models/reconciliation.ts";
import { ReconcileError } from "../domain/models/errors.ts";
import {
  arxivIdFromIdentifier,
  normalizeIdentifier,
  resolvePublisherTag,
} from "../../_shared/identifier-resolver.ts";
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

const SEMANTIC_SCHOLAR_TIMEOUT_MS = 15_000;
const SEMANTIC_SCHOLAR_MAX_RETRIES = 3;
const SEMANTIC_SCHOLAR_SEARCH_LIMIT = 5;
const PAPER_FIELDS = "title,year,venue,authors,externalIds,publicationVenue,journal,publicationTypes,url";

export const semanticScholarPaperSchema = z
  .object({
    paperId: z.string(),
    title: z.string().nullish(),
    year: z.number().nullish(),
    venue: z.string().nullish(),
    authors: z.array(z.object({ name: z.string().nullish() }).passthrough()).nullish(),
    externalIds: z.object({ DOI: z.string().optional(), ArXiv: z.string().optional() }).passthrough().nullish(),
    publicationVenue: z.object({ name: z.string().optional(), type: z.string().optional() }).passthrough().nullish(),
    journal: z
      .object({ name: z.string().optional(), volume: z.string().optional(), pages: z.string().optional() })
      .passthrough()
      .nullish(),
    publicationTypes: z.array(z.string()).nullish(),
    url: z.string().nullish(),
  })
  .passthrough();

export type SemanticScholarPaper = z.infer<typeof semanticScholarPaperSchema>;

const searchResponseSchema = z
  .object({ data: z.array(semanticScholarPaperSchema).optional() })
  .passthrough();

export interface SemanticScholarOptions extends HttpClientOptions {
  apiKey?: string | null;
}

function isConferencePaper(paper: SemanticScholarPaper): boolean {
  if ((paper.publicationTypes ?? []).some((type) => /conference/i.test(type))) return true;
  return /conference/i.test(paper.publicationVenue?.type ?? "");
}

function venueOf(paper: SemanticScholarPaper): string | undefined {
  const venue = paper.journal?.name || paper.publicationVenue?.name || paper.venue || "";
  if (!venue || /arxiv/i.test(venue)) return undefined;
  return venue;
}

/**
 * Maps a paper onto BibTeX fields. A lookup made for a known identifier
 * records that identifier as the `doi`.
 */
export function semanticScholarPaperToFields(paper: SemanticScholarPaper, identifier: string | null): EntryFields {
  const fields: EntryFields = {};
  const set = (name: string, value: string | number | null | undefined) => {
    const trimmed = value === null || value === undefined ? "" : String(value).replace(/\s+/g, " ").trim();
    if (trimmed) fields[name] = trimmed;
  };

  const authors = (paper.authors ?? []).map((author) => author.name?.trim() ?? "").filter(Boolean);
  const doi = identifier ?? normalizeIdentifier(paper.externalIds?.DOI);

  set("title", paper.title);
  set("author", authors.join(" and "));
  set("year", paper.year);
  set(isConferencePaper(paper) ? "booktitle" : "journal", venueOf(paper));
  set("volume", paper.journal?.volume);
  set("pages", paper.journal?.pages?.replace(/\s*-+\s*/, "--"));
  set("doi", doi);
  if (paper.externalIds?.ArXiv) {
    set("eprint", paper.externalIds.ArXiv);
    set("archiveprefix", "arXiv");
  }
  set("url", paper.url);
  return fields;
}

function paperPathFor(identifier: string): string {
  const arxivId = arxivIdFromIdentifier(identifier);
  return arxivId ? `arXiv:${arxivId}` : `DOI:${identifier}`;
}

export class SemanticScholarClient implements PublishedVersionLocator {
  readonly sourceTag = "semantic_scholar" as const;
  readonly lookupBy = "arxiv_id" as const;

  constructor(private readonly options: SemanticScholarOptions = {}) {}

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.apiKey) headers["x-api-key"] = this.options.apiKey;
    return headers;
  }

  private async getJson(url: URL, label: string, context: AdapterCallContext): Promise<unknown> {
    const response = await fetchWithRetry(
      url.toString(),
      { headers: this.headers(), signal: context.signal },
      {
        label,
        timeoutMs: this.options.timeoutMs ?? SEMANTIC_SCHOLAR_TIMEOUT_MS,
        maxRetries: this.options.maxRetries ?? SEMANTIC_SCHOLAR_MAX_RETRIES,
        baseDelayMs: this.options.baseDelayMs,
        onRetry: ({ attempt, delayMs, reason }) => {
          console.warn(`[SemanticScholar] Retry #${attempt} in ${delayMs}ms (${reason})`);
        },
      },
    );
    if (response.status === 404) return null;
    if (!response.ok) throw responseError("semantic_scholar", response);
    return readJson("semantic_scholar", response);
  }

  async getPaper(identifier: string, context: AdapterCallContext = {}): Promise<SemanticScholarPaper | null> {
    const url = new URL(`https://api.semanticscholar.org/graph/v1/paper/${paperPathFor(identifier)}`);
    url.searchParams.set("fields", PAPER_FIELDS);
    const payload = await this.getJson(url, "semantic-scholar-paper", context);
    if (payload === null) return null;

    const parsed = semanticScholarPaperSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ReconcileError("ADAPTER_EMPTY", "semantic_scholar returned an unexpected payload");
    }
    return parsed.data;
  }

  async searchByTitle(hint: FetchHint, context: AdapterCallContext = {}): Promise<SemanticScholarPaper | null> {
    const title = searchableTitle(hint.title);
    if (!title) return null;

    const url = new URL("https://api.semanticscholar.org/graph/v1/paper/search");
    url.searchParams.set("query", title);
    url.searchParams.set("limit", String(SEMANTIC_SCHOLAR_SEARCH_LIMIT));
    url.searchParams.set("fields", PAPER_FIELDS);
    const payload = await this.getJson(url, "semantic-scholar-search", context);
    if (payload === null) return null;

    const parsed = searchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ReconcileError("ADAPTER_EMPTY", "semantic_scholar returned an unexpected search payload");
    }

    const papers = parsed.data.data ?? [];
    const best = bestTitleMatch(title, papers, (paper) => paper.title);
    console.log(`[SemanticScholar] Title search matched ${best ? 1 : 0} of ${papers.length} papers`);
    return best;
  }

  async findPublishedVersion(
    arxivId: string | null,
    _hint: FetchHint,
    context: AdapterCallContext = {},
  ): Promise<PublishedVersion | null> {
    if (!arxivId) return null;
    const paper = await this.getPaper(`10.48550/arxiv.${arxivId.toLowerCase()}`, context);
    const doi = normalizeIdentifier(paper?.externalIds?.DOI);
    if (!paper || !doi || resolvePublisherTag(doi) === "ARXIV") return null;

    const published: PublishedVersion = { identifier: doi };
    if (paper.title) published.title = paper.title;
    const venue = venueOf(paper);
    if (venue) published.venue = venue;
    return published;
  }

  lookup(): SourceLookupFn {
    return async (identifier, hint, context): Promise<RawRecord | null> => {
      const paper = identifier ? await this.getPaper(identifier, context) : await this.searchByTitle(hint, context);
      if (!paper) return null;
      return {
        sourceTag: "semantic_scholar",
        entryType: isConferencePaper(paper) ? "inproceedings" : "article",
        fields: semanticScholarPaperToFields(paper, identifier),
      };
    };
  }
}

export function createSemanticScholarAdapter(client: SemanticScholarClient): SourceAdapter {
  return toSourceAdapter({
    sourceTag: "semantic_scholar",
    tier: "search",
    supportsTitleSearch: true,
    lookup: client.lookup(),
  });
}
