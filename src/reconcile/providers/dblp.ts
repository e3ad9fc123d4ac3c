import { z } from "zod";
import type { FetchHint } from "../domain/models/reconciliation.ts";
import { ReconcileError } from "../domain/models/errors.ts";
import { normalizeIdentifier, resolvePublisherTag } from "../../_shared/identifier-resolver.ts";
import { bestTitleMatch, searchableTitle } from "../../_shared/candidate-validator.ts";
import { fetchWithRetry, readJson, responseError, type HttpClientOptions } from "./http.ts";
import type { AdapterCallContext, PublishedVersion, PublishedVersionLocator } from "./types.ts";

const DBLP_TIMEOUT_MS = 15_000;
const DBLP_MAX_RETRIES = 3;
const DBLP_HITS = 5;

const dblpInfoSchema = z
  .object({
    title: z.string().optional(),
    venue: z.union([z.string(), z.array(z.string())]).optional(),
    year: z.string().optional(),
    type: z.string().optional(),
    doi: z.string().optional(),
  })
  .passthrough();

export type DblpInfo = z.infer<typeof dblpInfoSchema>;

const dblpSearchSchema = z
  .object({
    result: z
      .object({
        hits: z.object({ hit: z.array(z.object({ info: dblpInfoSchema }).passthrough()).optional() }).passthrough(),
      })
      .passthrough(),
  })
  .passthrough();

function venueOf(info: DblpInfo): string | null {
  const venue = (Array.isArray(info.venue) ? info.venue[0] : info.venue)?.trim();
  return venue || null;
}

// DBLP files arXiv listings under the CoRR venue as informal publications.
function isPublished(info: DblpInfo): boolean {
  const venue = venueOf(info);
  if (!venue || /arxiv/i.test(venue) || venue === "CoRR") return false;
  return !/informal/i.test(info.type ?? "");
}

/** Title search over the DBLP computer science bibliography. */
export class DblpClient implements PublishedVersionLocator {
  readonly sourceTag = "dblp" as const;
  readonly lookupBy = "title" as const;

  constructor(private readonly options: HttpClientOptions = {}) {}

  async search(title: string, context: AdapterCallContext = {}): Promise<DblpInfo[]> {
    const url = new URL("https://dblp.org/search/publ/api");
    url.searchParams.set("q", title);
    url.searchParams.set("format", "json");
    url.searchParams.set("h", String(DBLP_HITS));

    const response = await fetchWithRetry(
      url.toString(),
      { headers: { Accept: "application/json" }, signal: context.signal },
      {
        label: "dblp-search",
        timeoutMs: this.options.timeoutMs ?? DBLP_TIMEOUT_MS,
        maxRetries: this.options.maxRetries ?? DBLP_MAX_RETRIES,
        baseDelayMs: this.options.baseDelayMs,
        onRetry: ({ attempt, delayMs, reason }) => {
          console.warn(`[DBLP] Retry #${attempt} in ${delayMs}ms (${reason})`);
        },
      },
    );
    if (!response.ok) throw responseError("dblp", response);

    const parsed = dblpSearchSchema.safeParse(await readJson("dblp", response));
    if (!parsed.success) {
      throw new ReconcileError("ADAPTER_EMPTY", "dblp returned an unexpected payload", { statusCode: response.status });
    }
    return (parsed.data.result.hits.hit ?? []).map((hit) => hit.info);
  }

  async findPublishedVersion(
    _arxivId: string | null,
    hint: FetchHint,
    context: AdapterCallContext = {},
  ): Promise<PublishedVersion | null> {
    const title = searchableTitle(hint.title);
    if (!title) return null;

    const hits = await this.search(title, context);
    const published = hits.filter((info) => {
      const doi = normalizeIdentifier(info.doi);
      return isPublished(info) && doi !== null && resolvePublisherTag(doi) !== "ARXIV";
    });
    const match = bestTitleMatch(title, published, (info) => info.title);
    console.log(`[DBLP] Title search matched ${match ? 1 : 0} of ${hits.length} hits`);

    const doi = normalizeIdentifier(match?.doi);
    if (!match || !doi) return null;

    const version: PublishedVersion = { identifier: doi };
    if (match.title) version.title = match.title;
    const venue = venueOf(match);
    if (venue) version.venue = venue;
    return version;
  }
}
