import type { EntryFields, RawRecord } from "../domain/models/reconciliation.ts";
import { ReconcileError } from "../domain/models/errors.ts";
import { arxivIdFromIdentifier } from "../../_shared/identifier-resolver.ts";
import { fetchWithRetry, responseError, type HttpClientOptions } from "./http.ts";
import { toSourceAdapter } from "./catalog.ts";
import type { SourceAdapter, SourceLookupFn } from "./types.ts";

const ARXIV_TIMEOUT_MS = 15_000;
const ARXIV_MAX_RETRIES = 3;

function decodeXml(value: string): string {
  return value
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, "\"")
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, "&");
}

/** Parses the first `<entry>` of an arXiv Atom feed into BibTeX fields. */
export function parseArxivEntry(xmlText: string): EntryFields | null {
  const entryRegex = /<entry>([\s\S]*?)<\/entry>/g;
  let match: RegExpExecArray | null;

  while ((match = entryRegex.exec(xmlText)) !== null) {
    const entry = match[1] ?? "";
    if (/<title[^>]*>\s*Error\s*<\/title>/i.test(entry)) {
      const errorSummary = entry.match(/<summary[^>]*>([\s\S]*?)<\/summary>/i)?.[1]?.trim().replace(/\s+/g, " ");
      throw new ReconcileError("ADAPTER_EMPTY", `arxiv feed error: ${errorSummary || "Unknown error"}`);
    }

    const getTag = (tag: string): string => {
      const tagMatch = entry.match(new RegExp(`<${tag}[^>]*>([\\s\\S]*?)<\\/${tag}>`));
      return tagMatch?.[1] ? decodeXml(tagMatch[1].trim().replace(/\s+/g, " ")) : "";
    };

    const fullId = getTag("id");
    const title = getTag("title");
    if (!fullId || !title) continue;

    const arxivId = fullId
      .replace(/^https?:\/\/(export\.)?arxiv\.org\/abs\//, "")
      .replace(/v\d+$/, "");
    const published = getTag("published");

    const authorRegex = /<author>\s*<name>([^<]+)<\/name>/g;
    const authors: string[] = [];
    let authorMatch: RegExpExecArray | null;
    while ((authorMatch = authorRegex.exec(entry)) !== null) {
      if (authorMatch[1]) authors.push(decodeXml(authorMatch[1].trim()));
    }

    const primaryClass = entry.match(/<arxiv:primary_category[^>]*term="([^"]+)"/)?.[1];

    const fields: EntryFields = {
      title,
      eprint: arxivId,
      archiveprefix: "arXiv",
      doi: `10.48550/arXiv.${arxivId}`,
      url: `https://arxiv.org/abs/${arxivId}`,
    };
    if (authors.length > 0) fields.author = authors.join(" and ");
    if (/^\d{4}/.test(published)) fields.year = published.substring(0, 4);
    if (primaryClass) fields.primaryclass = primaryClass;
    return fields;
  }

  return null;
}

export function createArxivLookup(options: HttpClientOptions = {}): SourceLookupFn {
  return async (identifier, _hint, context): Promise<RawRecord | null> => {
    const arxivId = identifier ? arxivIdFromIdentifier(identifier) : null;
    if (!arxivId) {
      throw new ReconcileError("ADAPTER_EMPTY", `not an arXiv identifier: ${identifier ?? "(none)"}`);
    }

    const url = new URL("https://export.arxiv.org/api/query");
    url.searchParams.set("id_list", arxivId);
    url.searchParams.set("max_results", "1");

    const response = await fetchWithRetry(
      url.toString(),
      { headers: { Accept: "application/atom+xml,text/xml;q=0.9,*/*;q=0.8" }, signal: context.signal },
      {
        label: "arxiv-id-list",
        timeoutMs: options.timeoutMs ?? ARXIV_TIMEOUT_MS,
        maxRetries: options.maxRetries ?? ARXIV_MAX_RETRIES,
        baseDelayMs: options.baseDelayMs,
        onRetry: ({ attempt, delayMs, reason }) => {
          console.warn(`[ArXiv] Retry #${attempt} in ${delayMs}ms (${reason})`);
        },
      },
    );
    if (!response.ok) throw responseError("arxiv", response);

    const fields = parseArxivEntry(await response.text());
    if (!fields) return null;
    return { sourceTag: "arxiv", entryType: "misc", fields };
  };
}

export function createArxivAdapter(options: HttpClientOptions = {}): SourceAdapter {
  return toSourceAdapter({
    sourceTag: "arxiv",
    tier: "publisher",
    supportsTitleSearch: false,
    lookup: createArxivLookup(options),
  });
}
