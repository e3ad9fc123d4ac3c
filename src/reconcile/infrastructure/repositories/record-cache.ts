import { createHash } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { RawRecord } from "../../domain/models/reconciliation.ts";
import { errorMessage } from "../../domain/models/errors.ts";
import { normalizeIdentifier } from "../../../_shared/identifier-resolver.ts";

export interface RecordCache {
  get(identifier: string): Promise<RawRecord | null>;
  put(identifier: string, record: RawRecord): Promise<void>;
}

export interface RecordCacheOptions {
  maxAgeMs: number;
  now?: () => number;
}

const sourceTagSchema = z.enum(["arxiv", "ieee", "crossref", "semantic_scholar", "dblp", "doi_registry", "cache"]);

export const rawRecordSchema = z.object({
  sourceTag: sourceTagSchema,
  fields: z.record(z.string()),
  entryType: z.string().optional(),
});

const cacheFileSchema = z.object({
  identifier: z.string(),
  storedAt: z.number(),
  record: rawRecordSchema,
});

function cacheKey(identifier: string): string {
  return normalizeIdentifier(identifier) ?? identifier;
}

function toStoredRecord(record: RawRecord): RawRecord {
  const stored: RawRecord = { sourceTag: record.sourceTag, fields: { ...record.fields } };
  if (record.entryType) stored.entryType = record.entryType;
  return stored;
}

export class MemoryRecordCache implements RecordCache {
  private readonly entries = new Map<string, { record: RawRecord; storedAt: number }>();
  private readonly now: () => number;

  constructor(private readonly options: RecordCacheOptions) {
    this.now = options.now ?? (() => Date.now());
  }

  async get(identifier: string): Promise<RawRecord | null> {
    const key = cacheKey(identifier);
    const hit = this.entries.get(key);
    if (!hit) return null;
    if (this.now() - hit.storedAt > this.options.maxAgeMs) {
      this.entries.delete(key);
      return null;
    }
    return toStoredRecord(hit.record);
  }

  async put(identifier: string, record: RawRecord): Promise<void> {
    this.entries.set(cacheKey(identifier), { record: toStoredRecord(record), storedAt: this.now() });
  }

  get size(): number {
    return this.entries.size;
  }
}

/** One JSON file per identifier under `directory`, named by a hash of the identifier. */
export class JsonDirectoryRecordCache implements RecordCache {
  private readonly now: () => number;

  constructor(private readonly directory: string, private readonly options: RecordCacheOptions) {
    this.now = options.now ?? (() => Date.now());
  }

  pathFor(identifier: string): string {
    const digest = createHash("sha1").update(cacheKey(identifier)).digest("hex");
    return path.join(this.directory, `${digest}.json`);
  }

  async get(identifier: string): Promise<RawRecord | null> {
    let text: string;
    try {
      text = await readFile(this.pathFor(identifier), "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      console.warn("[record-cache] cache read failed:", errorMessage(error));
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      console.warn("[record-cache] cache file is not valid JSON:", errorMessage(error));
      return null;
    }
    const parsed = cacheFileSchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`[record-cache] ignoring malformed cache file for ${identifier}`);
      return null;
    }
    if (parsed.data.identifier !== cacheKey(identifier)) return null;
    if (this.now() - parsed.data.storedAt > this.options.maxAgeMs) return null;
    return toStoredRecord(parsed.data.record);
  }

  async put(identifier: string, record: RawRecord): Promise<void> {
    const payload = {
      identifier: cacheKey(identifier),
      storedAt: this.now(),
      record: toStoredRecord(record),
    };
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(this.pathFor(identifier), `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    } catch (error) {
      console.warn("[record-cache] cache write failed:", errorMessage(error));
    }
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
