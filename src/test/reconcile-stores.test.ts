import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createClient } from "@supabase/supabase-js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ChangeEvent, FailureRecord, RawRecord } from "../reconcile/domain/models/reconciliation.ts";
import {
  loadCorrectionTable,
  parseCorrectionFile,
} from "../reconcile/infrastructure/repositories/correction-table.ts";
import { JsonFileFailureLog } from "../reconcile/infrastructure/repositories/failure-log.ts";
import { JsonDirectoryRecordCache, MemoryRecordCache } from "../reconcile/infrastructure/repositories/record-cache.ts";
import { ReconciliationStore } from "../reconcile/infrastructure/repositories/reconciliation-store.ts";

const AT = "2024-01-01T00:00:00.000Z";
const record: RawRecord = { sourceTag: "crossref", entryType: "article", fields: { title: "Deep Residual Learning", year: "2016" } };

function failure(entryId: string, statusCode?: number): FailureRecord {
  return {
    identifier: `10.1/${entryId}`,
    entryId,
    publisherTag: "UNKNOWN",
    reason: "crossref: crossref has no record (HTTP 404)",
    timestamp: AT,
    ...(statusCode !== undefined ? { statusCode } : {}),
  };
}

describe("record cache: memory", () => {
  it("normalizes identifiers and expires old records", async () => {
    let clock = 0;
    const cache = new MemoryRecordCache({ maxAgeMs: 500, now: () => clock });

    await cache.put("https://doi.org/10.1109/CVPR.2016.90", record);
    await expect(cache.get("10.1109/cvpr.2016.90")).resolves.toEqual(record);

    clock = 1_000;
    await expect(cache.get("10.1109/cvpr.2016.90")).resolves.toBeNull();
    expect(cache.size).toBe(0);
  });

  it("hands out copies", async () => {
    const cache = new MemoryRecordCache({ maxAgeMs: 500 });
    await cache.put("10.1/x", record);
    const first = await cache.get("10.1/x");
    if (first) first.fields.title = "changed";
    await expect(cache.get("10.1/x")).resolves.toEqual(record);
  });
});

describe("record cache and failure log: files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "bib-reconcile-store-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("round-trips a record through a JSON file", async () => {
    let clock = 1_000;
    const cache = new JsonDirectoryRecordCache(path.join(dir, "cache"), { maxAgeMs: 500, now: () => clock });

    await cache.put("10.1109/CVPR.2016.90", record);
    await expect(cache.get("doi:10.1109/cvpr.2016.90")).resolves.toEqual(record);
    await expect(cache.get("10.1/other")).resolves.toBeNull();

    const stored = JSON.parse(await readFile(cache.pathFor("10.1109/cvpr.2016.90"), "utf8"));
    expect(stored).toEqual({ identifier: "10.1109/cvpr.2016.90", storedAt: 1_000, record });

    clock = 2_000;
    await expect(cache.get("10.1109/cvpr.2016.90")).resolves.toBeNull();
  });

  it("treats an unreadable cache file as a miss", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const cache = new JsonDirectoryRecordCache(dir, { maxAgeMs: 500 });
    await writeFile(cache.pathFor("10.1/x"), "{ nope", "utf8");

    await expect(cache.get("10.1/x")).resolves.toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("appends failures from concurrent callers", async () => {
    const filePath = path.join(dir, "logs", "failures.json");
    const log = new JsonFileFailureLog(filePath);

    await Promise.all([log.append(failure("a", 404)), log.append(failure("b"))]);

    await expect(log.list()).resolves.toEqual([failure("a", 404), failure("b")]);
    const rows = JSON.parse(await readFile(filePath, "utf8"));
    expect(rows[0]).toEqual({
      identifier: "10.1/a",
      entry_id: "a",
      publisher: "UNKNOWN",
      reason: "crossref: crossref has no record (HTTP 404)",
      http_status: 404,
      timestamp: AT,
    });
  });

  it("refuses to overwrite a malformed failure log", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const filePath = path.join(dir, "failures.json");
    await writeFile(filePath, JSON.stringify({ not: "a list" }), "utf8");

    await new JsonFileFailureLog(filePath).append(failure("a"));

    expect(warn).toHaveBeenCalledWith(
      "[failure-log] append failed:",
      `failure log ${filePath} is malformed; refusing to overwrite it`,
    );
    await expect(readFile(filePath, "utf8")).resolves.toBe(JSON.stringify({ not: "a list" }));
  });
});

describe("correction table", () => {
  it("loads the bundled table", async () => {
    const table = await loadCorrectionTable(fileURLToPath(new URL("../../data/identifier_corrections.json", import.meta.url)));

    expect(table.size).toBe(3);
    expect(table.lookup("10.1109/CVPR.2016.90.")).toEqual({
      originalIdentifier: "10.1109/CVPR.2016.90.",
      replacementIdentifier: "10.1109/cvpr.2016.90",
      status: "corrected",
      reason: "trailing period copied from a reference list",
    });
    expect(table.lookup("https://doi.org/10.1145/0000000.0000000")?.status).toBe("invalid");
    expect(table.lookup("10.1007/978-3-030-00000-0_1")?.replacementIdentifier).toBeNull();
    expect(table.lookup("10.1/unlisted")).toBeNull();
  });

  it("names the offending row", () => {
    expect(() => parseCorrectionFile({ corrections: [{ original_doi: "10.1/x", status: "bogus" }] })).toThrow(
      /^Correction table corrections is invalid: corrections\.0\.status: /,
    );
  });

  it("drops corrected rows without a replacement", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const table = parseCorrectionFile({ corrections: [{ original_doi: "10.1/x", status: "corrected" }] });
    expect(table.size).toBe(0);
    expect(warn).toHaveBeenCalledWith("[correction-table] 10.1/x is marked corrected without a replacement; ignored");
  });

  it("rejects a file that is not JSON", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "bib-reconcile-corrections-"));
    try {
      const filePath = path.join(dir, "corrections.json");
      await writeFile(filePath, "corrections:", "utf8");
      await expect(loadCorrectionTable(filePath)).rejects.toThrow(`Correction table ${filePath} is not valid JSON`);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

interface CapturedRequest {
  method: string;
  url: URL;
  body: unknown;
}

function fakeSupabase(rowsByTable: Record<string, unknown[]>, failWith?: string) {
  const requests: CapturedRequest[] = [];
  const fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const method = init?.method ?? "GET";
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    requests.push({ method, url, body });

    if (failWith) {
      return new Response(JSON.stringify({ message: failWith, code: "XX000" }), {
        status: 500,
        headers: { "content-type": "application/json" },
      });
    }
    if (method === "GET") {
      const table = url.pathname.split("/").pop() ?? "";
      return new Response(JSON.stringify(rowsByTable[table] ?? []), {
        status: 200,
        headers: { "content-type": "application/json" },
      });
    }
    return new Response(null, { status: 201 });
  };

  const client = createClient("http://localhost:54321", "test-key", {
    global: { fetch },
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return { client, requests };
}

describe("reconciliation store: supabase", () => {
  const now = () => Date.parse(AT) + 1_000;

  it("reads fresh cache rows by normalized identifier", async () => {
    const { client, requests } = fakeSupabase({
      bib_record_cache: [{ identifier: "10.1/x", record, stored_at: AT }],
    });
    const store = new ReconciliationStore(client, { maxAgeMs: 60_000, runId: "run-1", now });

    await expect(store.get("https://doi.org/10.1/X")).resolves.toEqual(record);
    expect(requests[0]?.url.pathname).toBe("/rest/v1/bib_record_cache");
    expect(requests[0]?.url.searchParams.get("identifier")).toBe("eq.10.1/x");
  });

  it("ignores stale cache rows", async () => {
    const { client } = fakeSupabase({
      bib_record_cache: [{ identifier: "10.1/x", record, stored_at: "2023-01-01T00:00:00.000Z" }],
    });
    const store = new ReconciliationStore(client, { maxAgeMs: 60_000, now });
    await expect(store.get("10.1/x")).resolves.toBeNull();
  });

  it("upserts cache rows on the identifier", async () => {
    const { client, requests } = fakeSupabase({});
    const store = new ReconciliationStore(client, { maxAgeMs: 60_000, now });

    await store.put("10.1/X", record);

    expect(requests[0]?.method).toBe("POST");
    expect(requests[0]?.url.searchParams.get("on_conflict")).toBe("identifier");
    expect(requests[0]?.body).toEqual({
      identifier: "10.1/x",
      source_tag: "crossref",
      record,
      stored_at: "2024-01-01T00:00:01.000Z",
    });
  });

  it("writes and lists failures for its run", async () => {
    const { client, requests } = fakeSupabase({
      bib_failure_log: [
        {
          identifier: "10.1/a",
          entry_id: "a",
          publisher: "UNKNOWN",
          reason: "crossref: crossref has no record (HTTP 404)",
          http_status: 404,
          failed_at: AT,
        },
      ],
    });
    const store = new ReconciliationStore(client, { maxAgeMs: 60_000, runId: "run-1", now });

    await store.append(failure("a", 404));
    const listed = await store.list();

    expect(requests[0]?.body).toEqual({
      run_id: "run-1",
      identifier: "10.1/a",
      entry_id: "a",
      publisher: "UNKNOWN",
      reason: "crossref: crossref has no record (HTTP 404)",
      http_status: 404,
      failed_at: AT,
    });
    expect(requests[1]?.url.searchParams.get("run_id")).toBe("eq.run-1");
    expect(listed).toEqual([failure("a", 404)]);
  });

  it("records change events", async () => {
    const { client, requests } = fakeSupabase({});
    const store = new ReconciliationStore(client, { maxAgeMs: 60_000, runId: "run-1", now });
    const event: ChangeEvent = { entryId: "a", kind: "FIELD_ADDED", field: "doi", newValue: "10.1/a", sourceTag: "crossref", timestamp: AT };

    await store.write([event]);
    await store.write([]);

    expect(requests).toHaveLength(1);
    expect(requests[0]?.url.pathname).toBe("/rest/v1/bib_change_events");
    expect(requests[0]?.body).toEqual([
      {
        run_id: "run-1",
        entry_id: "a",
        kind: "FIELD_ADDED",
        field: "doi",
        old_value: null,
        new_value: "10.1/a",
        source_tag: "crossref",
        occurred_at: AT,
      },
    ]);
  });

  it("treats a failing read as a miss", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { client } = fakeSupabase({}, "boom");
    const store = new ReconciliationStore(client, { maxAgeMs: 60_000, now });

    await expect(store.get("10.1/x")).resolves.toBeNull();
    expect(warn).toHaveBeenCalledWith("[reconciliation-store] cache read failed:", "boom");
  });
});
