import type { ReconcileRuntimeConfig } from "../../_shared/runtime-config.ts";
import { createArxivAdapter } from "./arxiv.ts";
import { createCrossrefAdapter, CrossrefTitleLocator } from "./crossref.ts";
import { DblpClient } from "./dblp.ts";
import { DoiRegistryChecker } from "./doi-registry.ts";
import type { HttpClientOptions } from "./http.ts";
import { createIeeeAdapter } from "./ieee.ts";
import { createSemanticScholarAdapter, SemanticScholarClient } from "./semantic-scholar.ts";
import type { PublishedVersionLocator, RegistryChecker, SourceAdapter } from "./types.ts";

export { eligibleAdapters, isEligible, PUBLISHER_ELIGIBILITY, TIER_ORDER, toSourceAdapter } from "./catalog.ts";
export { fetchWithRetry, retryAfterMs, sleep } from "./http.ts";
export { createUnpacedPacer, RequestPacer } from "./pacing.ts";
export type * from "./types.ts";

export interface SourceStack {
  adapters: SourceAdapter[];
  registryChecker: RegistryChecker;
  publishedVersionLocators: PublishedVersionLocator[];
}

type SourceStackConfig = Pick<
  ReconcileRuntimeConfig,
  "httpTimeoutMs" | "retryMax" | "ieeeApiKey" | "semanticScholarApiKey" | "crossrefMailto"
>;

/**
 * The closed adapter set, in chain order, and the published-version
 * locators: Semantic Scholar by arXiv id, then DBLP and Crossref by title.
 */
export function buildSourceStack(config: SourceStackConfig): SourceStack {
  const http: HttpClientOptions = { timeoutMs: config.httpTimeoutMs, maxRetries: config.retryMax };
  const semanticScholar = new SemanticScholarClient({ ...http, apiKey: config.semanticScholarApiKey });

  return {
    adapters: [
      createArxivAdapter(http),
      createIeeeAdapter({ ...http, apiKey: config.ieeeApiKey }),
      createCrossrefAdapter({ ...http, mailto: config.crossrefMailto }),
      createSemanticScholarAdapter(semanticScholar),
    ],
    registryChecker: new DoiRegistryChecker(http),
    publishedVersionLocators: [
      semanticScholar,
      new DblpClient(http),
      new CrossrefTitleLocator({ ...http, mailto: config.crossrefMailto }),
    ],
  };
}
