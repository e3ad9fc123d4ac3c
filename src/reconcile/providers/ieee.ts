import { z } from "zod";
import type { EntryFields, RawRecord } from "../domain/models/reconciliation.ts";
import { ReconcileError } from "../domain/models/errors.ts";
import { normalizeIdentifier } from "../../_shared/identifier-resolver.ts";
import { fetchWithRetry, readJson, responseError, type HttpClientOptions } from "./http.ts";
import { toSourceAdapter } from "./catalog.ts";
import type { SourceAdapter, SourceLookupFn } from "./types.ts";

const IEEE_TIMEOUT_MS = 15_000;
const IEEE_MAX_RETRIES = 2;

export const ieeeArticleSchema = z
  .object({
    doi: z.string().optional(),
    title: z.string().optional(),
    publication_title: z.string().optional(),
    publisher: z.string().optional(),
    publication_year: z.union([z.string(), z.number()]).optional(),
    volume: z.string().optional(),
    issue: z.string().optional(),
    start_page: z.string().optional(),
    end_page: z.string().optional(),
    content_type: z.string().optional(),
    issn: z.string().optional(),
    isbn: z.string().optional(),
    html_url: z.string().optional(),
    authors: z
      .object({ authors: z.array(z.object({ full_name: z.string().optional() }).passthrough()).optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type IeeeArticle = z.infer<typeof ieeeArticleSchema>;

const ieeeSearchResponseSchema = z
  .object({
    total_records: z.number().optional(),
    articles: z.array(ieeeArticleSchema).optional(),
  })
  .passthrough();

export interface IeeeOptions extends HttpClientOptions {
  apiKey: string | null;
}

function isConferenceContent(contentType: string | undefined): boolean {
  return /conference/i.test(contentType ?? "");
}

export function ieeeArticleToFields(article: IeeeArticle): EntryFields {
  const fields: EntryFields = {};
  const set = (name: string, value: string | number | undefined) => {
    const trimmed = value === undefined ? "" : String(value).replace(/\s+/g, " ").trim();
    if (trimmed) fields[name] = trimmed;
  };

  const authors = (article.authors?.authors ?? [])
    .map((author) => author.full_name?.trim() ?? "")
    .filter(Boolean);
  const pages = article.start_page && article.end_page
    ? `${article.start_page}--${article.end_page}`
    : article.start_page;

  set("title", article.title);
  set("author", authors.join(" and "));
  set("year", article.publication_year);
  set(isConferenceContent(article.content_type) ? "booktitle" : "journal", article.publication_title);
  set("volume", article.volume);
  set("number", article.issue);
  set("pages", pages);
  set("publisher", article.publisher);
  set("doi", normalizeIdentifier(article.doi) ?? undefined);
  set("issn", article.issn);
  set("isbn", article.isbn);
  set("url", article.html_url);
  return fields;
}

export function createIeeeLookup(options: IeeeOptions): SourceLookupFn {
  return async (identifier, _hint, context): Promise<RawRecord | null> => {
    if (!options.apiKey) {
      throw new ReconcileError("ADAPTER_UNAVAILABLE", "IEEE_API_KEY is not configured");
    }
    if (!identifier) {
      throw new ReconcileError("IDENTIFIER_NOT_FOUND", "ieee lookups need an identifier");
    }

    const url = new URL("https://ieeexploreapi.ieee.org/api/v1/search/articles");
    url.searchParams.set("doi", identifier);
    url.searchParams.set("format", "json");
    url.searchParams.set("max_records", "1");
    url.searchParams.set("apikey", options.apiKey);

    const response = await fetchWithRetry(
      url.toString(),
      { headers: { Accept: "application/json" }, signal: context.signal },
      {
        label: "ieee-xplore",
        timeoutMs: options.timeoutMs ?? IEEE_TIMEOUT_MS,
        maxRetries: options.maxRetries ?? IEEE_MAX_RETRIES,
        baseDelayMs: options.baseDelayMs,
        onRetry: ({ attempt, delayMs, reason }) => {
          console.warn(`[IEEE] Retry #${attempt} in ${delayMs}ms (${reason})`);
        },
      },
    );
    if (!response.ok) throw responseError("ieee", response);

    const parsed = ieeeSearchResponseSchema.safeParse(await readJson("ieee", response));
    if (!parsed.success) {
      throw new ReconcileError("ADAPTER_EMPTY", "ieee returned an unexpected payload", { statusCode: response.status });
    }

    const article = parsed.data.articles?.[0];
    if (!article) return null;
    return {
      sourceTag: "ieee",
      entryType: isConferenceContent(article.content_type) ? "inproceedings" : "article",
      fields: ieeeArticleToFields(article),
    };
  };
}

export function createIeeeAdapter(options: IeeeOptions): SourceAdapter {
  return toSourceAdapter({
    sourceTag: "ieee",
    tier: "publisher",
    supportsTitleSearch: false,
    lookup: createIeeeLookup(options),
  });
}
