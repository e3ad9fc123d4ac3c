import { describe, expect, it, vi } from "vitest";
import type { SourceAdapter } from "../reconcile/providers/types.ts";
import { createArxivAdapter, parseArxivEntry } from "../reconcile/providers/arxiv.ts";
import { eligibleAdapters } from "../reconcile/providers/catalog.ts";
import { createCrossrefAdapter, CrossrefTitleLocator } from "../reconcile/providers/crossref.ts";
import { DblpClient } from "../reconcile/providers/dblp.ts";
import { DoiRegistryChecker } from "../reconcile/providers/doi-registry.ts";
import { fetchWithRetry, responseError, retryAfterMs } from "../reconcile/providers/http.ts";
import { createIeeeAdapter } from "../reconcile/providers/ieee.ts";
import { createSemanticScholarAdapter, SemanticScholarClient } from "../reconcile/providers/semantic-scholar.ts";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function stubFetch(...responses: Array<Response | Error>) {
  const fetchMock = vi.fn();
  for (const response of responses) {
    if (response instanceof Error) fetchMock.mockRejectedValueOnce(response);
    else fetchMock.mockResolvedValueOnce(response);
  }
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function calledUrl(fetchMock: ReturnType<typeof vi.fn>, call = 0): string {
  return String(fetchMock.mock.calls[call]?.[0]);
}

const noRetry = { maxRetries: 0, baseDelayMs: 0 };

describe("reconcile provider: crossref", () => {
  it("maps a work onto BibTeX fields", async () => {
    const fetchMock = stubFetch(jsonResponse({
      status: "ok",
      message: {
        DOI: "10.1109/CVPR.2016.90",
        title: ["Deep Residual Learning for Image Recognition"],
        author: [{ given: "Kaiming", family: "He" }, { given: "Xiangyu", family: "Zhang" }],
        "container-title": ["2016 IEEE Conference on Computer Vision and Pattern Recognition (CVPR)"],
        publisher: "IEEE",
        page: "770-778",
        type: "proceedings-article",
        issued: { "date-parts": [[2016, 6]] },
      },
    }));

    const adapter = createCrossrefAdapter({ ...noRetry, mailto: "test@example.org" });
    const result = await adapter.fetch("10.1109/CVPR.2016.90", {});

    expect(calledUrl(fetchMock)).toBe("https://api.crossref.org/works/10.1109%2FCVPR.2016.90");
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      Accept: "application/json",
      "User-Agent": "bib-reconcile/0.1 (mailto:test@example.org)",
    });
    expect(result).toEqual({
      ok: true,
      record: {
        sourceTag: "crossref",
        entryType: "inproceedings",
        fields: {
          title: "Deep Residual Learning for Image Recognition",
          author: "Kaiming He and Xiangyu Zhang",
          year: "2016",
          booktitle: "2016 IEEE Conference on Computer Vision and Pattern Recognition (CVPR)",
          pages: "770-778",
          publisher: "IEEE",
          doi: "10.1109/cvpr.2016.90",
        },
      },
    });
  });

  it("reports a missing work as empty", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    stubFetch(new Response("Resource not found.", { status: 404 }));

    const result = await createCrossrefAdapter(noRetry).fetch("10.1109/fake.0000", {});

    expect(result).toEqual({
      ok: false,
      diagnostic: {
        sourceTag: "crossref",
        code: "ADAPTER_EMPTY",
        reason: "crossref has no record (HTTP 404)",
        statusCode: 404,
      },
    });
  });

  it("reports server errors as unavailable", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    stubFetch(new Response("busy", { status: 503 }));

    const result = await createCrossrefAdapter(noRetry).fetch("10.1/x", {});

    expect(result).toEqual({
      ok: false,
      diagnostic: { sourceTag: "crossref", code: "ADAPTER_UNAVAILABLE", reason: "crossref API error 503", statusCode: 503 },
    });
  });

  it("turns transport failures into diagnostics", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    stubFetch(new TypeError("fetch failed"));

    const result = await createCrossrefAdapter(noRetry).fetch("10.1/x", {});

    expect(result).toEqual({
      ok: false,
      diagnostic: { sourceTag: "crossref", code: "ADAPTER_UNAVAILABLE", reason: "fetch failed" },
    });
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("needs an identifier", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const fetchMock = stubFetch();

    const result = await createCrossrefAdapter(noRetry).fetch(null, { title: "Anything" });

    expect(result.ok).toBe(false);
    expect(result.ok ? null : result.diagnostic.code).toBe("IDENTIFIER_NOT_FOUND");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("reconcile provider: arxiv", () => {
  const feed = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>ArXiv Query</title>
  <entry>
    <id>http://arxiv.org/abs/1512.03385v1</id>
    <published>2015-12-10T19:51:55Z</published>
    <title>Deep Residual Learning for Image
      Recognition</title>
    <author><name>Kaiming He</name></author>
    <author><name>Xiangyu Zhang</name></author>
    <arxiv:primary_category xmlns:arxiv="http://arxiv.org/schemas/atom" term="cs.CV" scheme="http://arxiv.org/schemas/atom"/>
  </entry>
</feed>`;

  it("queries by id and parses the entry", async () => {
    const fetchMock = stubFetch(new Response(feed, { status: 200 }));

    const result = await createArxivAdapter(noRetry).fetch("10.48550/arxiv.1512.03385", {});

    expect(calledUrl(fetchMock)).toBe("https://export.arxiv.org/api/query?id_list=1512.03385&max_results=1");
    expect(result).toEqual({
      ok: true,
      record: {
        sourceTag: "arxiv",
        entryType: "misc",
        fields: {
          title: "Deep Residual Learning for Image Recognition",
          eprint: "1512.03385",
          archiveprefix: "arXiv",
          doi: "10.48550/arXiv.1512.03385",
          url: "https://arxiv.org/abs/1512.03385",
          author: "Kaiming He and Xiangyu Zhang",
          year: "2015",
          primaryclass: "cs.CV",
        },
      },
    });
  });

  it("surfaces feed errors", () => {
    const errorFeed = `<feed><entry><id>http://arxiv.org/api/errors#incorrect_id_format_for_1234</id>
      <title>Error</title><summary>incorrect id format for 1234</summary></entry></feed>`;
    expect(() => parseArxivEntry(errorFeed)).toThrow("arxiv feed error: incorrect id format for 1234");
  });

  it("skips identifiers that are not arXiv ones", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const fetchMock = stubFetch();

    const result = await createArxivAdapter(noRetry).fetch("10.1109/cvpr.2016.90", {});

    expect(result).toEqual({
      ok: false,
      diagnostic: { sourceTag: "arxiv", code: "ADAPTER_EMPTY", reason: "not an arXiv identifier: 10.1109/cvpr.2016.90" },
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("treats an empty feed as no usable fields", async () => {
    stubFetch(new Response("<feed></feed>", { status: 200 }));
    const result = await createArxivAdapter(noRetry).fetch("10.48550/arxiv.2101.00001", {});
    expect(result).toEqual({
      ok: false,
      diagnostic: { sourceTag: "arxiv", code: "ADAPTER_EMPTY", reason: "arxiv returned no usable fields" },
    });
  });
});

describe("reconcile provider: ieee", () => {
  it("refuses to run without an API key", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const fetchMock = stubFetch();

    const result = await createIeeeAdapter({ ...noRetry, apiKey: null }).fetch("10.1109/cvpr.2016.90", {});

    expect(result).toEqual({
      ok: false,
      diagnostic: { sourceTag: "ieee", code: "ADAPTER_UNAVAILABLE", reason: "IEEE_API_KEY is not configured" },
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("maps the first article", async () => {
    const fetchMock = stubFetch(jsonResponse({
      total_records: 1,
      articles: [
        {
          doi: "10.1109/CVPR.2016.90",
          title: "Deep Residual Learning for Image Recognition",
          publication_title: "2016 IEEE CVPR",
          publisher: "IEEE",
          publication_year: 2016,
          start_page: "770",
          end_page: "778",
          content_type: "Conferences",
          authors: { authors: [{ full_name: "Kaiming He" }] },
        },
      ],
    }));

    const result = await createIeeeAdapter({ ...noRetry, apiKey: "test-key" }).fetch("10.1109/cvpr.2016.90", {});

    const url = new URL(calledUrl(fetchMock));
    expect(url.searchParams.get("doi")).toBe("10.1109/cvpr.2016.90");
    expect(url.searchParams.get("apikey")).toBe("test-key");
    expect(result).toEqual({
      ok: true,
      record: {
        sourceTag: "ieee",
        entryType: "inproceedings",
        fields: {
          title: "Deep Residual Learning for Image Recognition",
          author: "Kaiming He",
          year: "2016",
          booktitle: "2016 IEEE CVPR",
          pages: "770--778",
          publisher: "IEEE",
          doi: "10.1109/cvpr.2016.90",
        },
      },
    });
  });
});

describe("reconcile provider: semantic scholar", () => {
  const paper = {
    paperId: "p1",
    title: "Deep Residual Learning for Image Recognition",
    year: 2016,
    venue: "CVPR",
    authors: [{ name: "Kaiming He" }],
    externalIds: { DOI: "10.1109/CVPR.2016.90", ArXiv: "1512.03385" },
    publicationTypes: ["Conference"],
  };

  it("looks a paper up by identifier", async () => {
    const fetchMock = stubFetch(jsonResponse(paper));
    const adapter = createSemanticScholarAdapter(new SemanticScholarClient({ ...noRetry, apiKey: "test-key" }));

    const result = await adapter.fetch("10.1109/cvpr.2016.90", {});

    expect(calledUrl(fetchMock).startsWith("https://api.semanticscholar.org/graph/v1/paper/DOI:10.1109/cvpr.2016.90?")).toBe(true);
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({ Accept: "application/json", "x-api-key": "test-key" });
    expect(result).toEqual({
      ok: true,
      record: {
        sourceTag: "semantic_scholar",
        entryType: "inproceedings",
        fields: {
          title: "Deep Residual Learning for Image Recognition",
          author: "Kaiming He",
          year: "2016",
          booktitle: "CVPR",
          doi: "10.1109/cvpr.2016.90",
          eprint: "1512.03385",
          archiveprefix: "arXiv",
        },
      },
    });
  });

  it("searches by title and keeps the best match above the threshold", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const fetchMock = stubFetch(jsonResponse({
      data: [
        { paperId: "a", title: "Unrelated Work on Proteins" },
        { paperId: "b", title: "Deep Residual Learning for Image Recognition", year: 2016, externalIds: { DOI: "10.1109/CVPR.2016.90" } },
      ],
    }));
    const adapter = createSemanticScholarAdapter(new SemanticScholarClient(noRetry));

    const result = await adapter.fetch(null, { title: "Deep {Residual} Learning" });

    expect(new URL(calledUrl(fetchMock)).searchParams.get("query")).toBe("Deep Residual Learning");
    expect(result).toEqual({
      ok: true,
      record: {
        sourceTag: "semantic_scholar",
        entryType: "article",
        fields: { title: "Deep Residual Learning for Image Recognition", year: "2016", doi: "10.1109/cvpr.2016.90" },
      },
    });
  });

  it("finds the published version of a preprint", async () => {
    const fetchMock = stubFetch(jsonResponse(paper));
    const client = new SemanticScholarClient(noRetry);

    await expect(client.findPublishedVersion("1512.03385", {})).resolves.toEqual({
      identifier: "10.1109/cvpr.2016.90",
      title: "Deep Residual Learning for Image Recognition",
      venue: "CVPR",
    });
    expect(calledUrl(fetchMock).startsWith("https://api.semanticscholar.org/graph/v1/paper/arXiv:1512.03385?")).toBe(true);
  });

  it("ignores a preprint that only has its arXiv DOI", async () => {
    stubFetch(jsonResponse({ ...paper, externalIds: { DOI: "10.48550/arXiv.1512.03385" } }));
    await expect(new SemanticScholarClient(noRetry).findPublishedVersion("1512.03385", {})).resolves.toBeNull();
  });

  it("treats a 404 as not found", async () => {
    stubFetch(new Response("not found", { status: 404 }));
    await expect(new SemanticScholarClient(noRetry).findPublishedVersion("2101.00001", {})).resolves.toBeNull();
  });

  it("needs an arXiv id to look for a published version", async () => {
    const fetchMock = stubFetch();
    await expect(new SemanticScholarClient(noRetry).findPublishedVersion(null, { title: "Anything" })).resolves.toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("reconcile provider: crossref title search", () => {
  it("skips posted content and picks the matching published work", async () => {
    const fetchMock = stubFetch(jsonResponse({
      status: "ok",
      message: {
        items: [
          { DOI: "10.48550/arXiv.1512.03385", title: ["Deep Residual Learning for Image Recognition"], type: "posted-content" },
          { DOI: "10.1234/protein.1", title: ["Protein Folding at Scale"], type: "journal-article" },
          {
            DOI: "10.1109/CVPR.2016.90",
            title: ["Deep Residual Learning for Image Recognition"],
            "container-title": ["2016 IEEE Conference on Computer Vision and Pattern Recognition (CVPR)"],
            type: "proceedings-article",
          },
        ],
      },
    }));

    const locator = new CrossrefTitleLocator({ ...noRetry, mailto: "test@example.org" });
    const found = await locator.findPublishedVersion(null, { title: "Deep {Residual} Learning for Image Recognition" });

    expect(found).toEqual({
      identifier: "10.1109/cvpr.2016.90",
      title: "Deep Residual Learning for Image Recognition",
      venue: "2016 IEEE Conference on Computer Vision and Pattern Recognition (CVPR)",
    });
    const url = new URL(calledUrl(fetchMock));
    expect(`${url.origin}${url.pathname}`).toBe("https://api.crossref.org/works");
    expect(url.searchParams.get("query.title")).toBe("Deep Residual Learning for Image Recognition");
    expect(url.searchParams.get("rows")).toBe("5");
    expect(url.searchParams.get("select")).toBe("DOI,title,container-title,type,issued");
  });

  it("finds nothing when only preprints match", async () => {
    stubFetch(jsonResponse({
      message: { items: [{ DOI: "10.1101/2020.01.01.000001", title: ["Deep Residual Learning"], type: "posted-content" }] },
    }));
    await expect(new CrossrefTitleLocator(noRetry).findPublishedVersion(null, { title: "Deep Residual Learning" })).resolves.toBeNull();
  });

  it("does not search without a title", async () => {
    const fetchMock = stubFetch();
    await expect(new CrossrefTitleLocator(noRetry).findPublishedVersion("1512.03385", {})).resolves.toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("reconcile provider: dblp", () => {
  it("skips the CoRR listing and returns the venue version", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const fetchMock = stubFetch(jsonResponse({
      result: {
        hits: {
          "@total": "2",
          hit: [
            {
              info: {
                title: "Deep Residual Learning for Image Recognition.",
                venue: "CoRR",
                type: "Informal and Other Publications",
                doi: "10.48550/ARXIV.1512.03385",
                year: "2015",
              },
            },
            {
              info: {
                title: "Deep Residual Learning for Image Recognition.",
                venue: "CVPR",
                type: "Conference and Workshop Papers",
                doi: "10.1109/CVPR.2016.90",
                year: "2016",
              },
            },
          ],
        },
      },
    }));

    const found = await new DblpClient(noRetry).findPublishedVersion(null, { title: "Deep Residual Learning for Image Recognition" });

    expect(found).toEqual({
      identifier: "10.1109/cvpr.2016.90",
      title: "Deep Residual Learning for Image Recognition.",
      venue: "CVPR",
    });
    const url = new URL(calledUrl(fetchMock));
    expect(`${url.origin}${url.pathname}`).toBe("https://dblp.org/search/publ/api");
    expect(url.searchParams.get("q")).toBe("Deep Residual Learning for Image Recognition");
    expect(url.searchParams.get("format")).toBe("json");
    expect(url.searchParams.get("h")).toBe("5");
  });

  it("returns nothing for an empty result", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    stubFetch(jsonResponse({ result: { hits: { "@total": "0" } } }));
    await expect(new DblpClient(noRetry).findPublishedVersion(null, { title: "Unheard Of" })).resolves.toBeNull();
  });

  it("passes on the pause a rate limit asks for", async () => {
    stubFetch(new Response("slow down", { status: 429, headers: { "retry-after": "3" } }));
    await expect(new DblpClient(noRetry).findPublishedVersion(null, { title: "Anything" })).rejects.toMatchObject({
      code: "ADAPTER_UNAVAILABLE",
      message: "dblp API error 429, retry after 3s",
      retryAfterMs: 3_000,
    });
  });
});

describe("reconcile provider: doi registry", () => {
  it("counts a redirect as registered", async () => {
    const fetchMock = stubFetch(new Response(null, { status: 302 }));
    await expect(new DoiRegistryChecker(noRetry).check("10.1109/cvpr.2016.90")).resolves.toEqual({ ok: true, statusCode: 302 });
    expect(calledUrl(fetchMock)).toBe("https://doi.org/10.1109/cvpr.2016.90");
    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({ method: "HEAD", redirect: "manual" });
  });

  it("reports an unknown DOI with its status", async () => {
    stubFetch(new Response(null, { status: 404 }));
    await expect(new DoiRegistryChecker(noRetry).check("10.1109/fake.0000")).resolves.toEqual({
      ok: false,
      reason: "DOI not found in DOI.org database (HTTP 404)",
      statusCode: 404,
    });
  });

  it("rejects malformed DOIs without a request", async () => {
    const fetchMock = stubFetch();
    await expect(new DoiRegistryChecker(noRetry).check("abc")).resolves.toEqual({
      ok: false,
      reason: 'invalid DOI format (must start with "10."): abc',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("reports network errors without a status", async () => {
    stubFetch(new TypeError("fetch failed"));
    await expect(new DoiRegistryChecker(noRetry).check("10.1/x")).resolves.toEqual({
      ok: false,
      reason: "DOI resolution failed (network error): fetch failed",
    });
  });
});

describe("reconcile provider: http and catalog", () => {
  it("reads Retry-After as seconds or a date", () => {
    const now = Date.parse("2024-01-01T00:00:00Z");
    expect(retryAfterMs("5", now)).toBe(5_000);
    expect(retryAfterMs("Mon, 01 Jan 2024 00:00:30 GMT", now)).toBe(30_000);
    expect(retryAfterMs("Sun, 31 Dec 2023 23:59:00 GMT", now)).toBe(0);
    expect(retryAfterMs("soon", now)).toBeNull();
    expect(retryAfterMs(null, now)).toBeNull();
  });

  it("carries the pause a rate-limited source asks for", () => {
    const error = responseError("crossref", new Response("slow down", { status: 429, headers: { "retry-after": "7" } }));
    expect(error.code).toBe("ADAPTER_UNAVAILABLE");
    expect(error.message).toBe("crossref API error 429, retry after 7s");
    expect(error.retryAfterMs).toBe(7_000);
    expect(error.statusCode).toBe(429);
  });

  it("does not retry a cancelled request", async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchMock = vi.fn(async () => {
      throw new Error("aborted");
    });
    vi.stubGlobal("fetch", fetchMock);

    await expect(
      fetchWithRetry("https://example.org/x", { signal: controller.signal }, { label: "test", timeoutMs: 1_000, baseDelayMs: 0 }),
    ).rejects.toThrow("aborted");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("retries a server error", async () => {
    const fetchMock = stubFetch(new Response("busy", { status: 503 }), new Response("ok", { status: 200 }));
    const onRetry = vi.fn();

    const response = await fetchWithRetry("https://example.org/x", {}, {
      label: "test",
      timeoutMs: 1_000,
      baseDelayMs: 0,
      onRetry,
    });

    expect(response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith({ attempt: 1, delayMs: 0, reason: "status 503" });
  });

  it("orders eligible adapters by tier", () => {
    const fake = (sourceTag: SourceAdapter["sourceTag"], tier: SourceAdapter["tier"], supportsTitleSearch = false): SourceAdapter => ({
      sourceTag,
      tier,
      supportsTitleSearch,
      fetch: vi.fn(),
    });
    const adapters = [
      fake("crossref", "registry"),
      fake("semantic_scholar", "search", true),
      fake("arxiv", "publisher"),
      fake("ieee", "publisher"),
    ];
    const tags = (tag: Parameters<typeof eligibleAdapters>[1]) => eligibleAdapters(adapters, tag).map((a) => a.sourceTag);

    expect(tags("IEEE")).toEqual(["ieee", "crossref", "semantic_scholar"]);
    expect(tags("ARXIV")).toEqual(["arxiv", "crossref", "semantic_scholar"]);
    expect(tags("UNKNOWN")).toEqual(["crossref", "semantic_scholar"]);
    expect(tags(null)).toEqual(["semantic_scholar"]);
  });
});
