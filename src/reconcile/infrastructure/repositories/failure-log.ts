import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { FailureRecord } from "../../domain/models/reconciliation.ts";
import { errorMessage } from "../../domain/models/errors.ts";
import { isMissingFile } from "./record-cache.ts";

export interface FailureLog {
  append(record: FailureRecord): Promise<void>;
  list(): Promise<FailureRecord[]>;
}

export class MemoryFailureLog implements FailureLog {
  private readonly records: FailureRecord[] = [];

  async append(record: FailureRecord): Promise<void> {
    this.records.push({ ...record });
  }

  async list(): Promise<FailureRecord[]> {
    return this.records.map((record) => ({ ...record }));
  }
}

const publisherTagSchema = z.enum(["IEEE", "ACM", "SPRINGER", "ELSEVIER", "ARXIV", "UNKNOWN"]);

const failureRowSchema = z.object({
  identifier: z.string().nullable(),
  entry_id: z.string(),
  publisher: publisherTagSchema,
  reason: z.string(),
  http_status: z.number().int().nullable().optional(),
  timestamp: z.string(),
});

type FailureRow = z.infer<typeof failureRowSchema>;

export function toFailureRow(record: FailureRecord): FailureRow {
  return {
    identifier: record.identifier,
    entry_id: record.entryId,
    publisher: record.publisherTag,
    reason: record.reason,
    http_status: record.statusCode ?? null,
    timestamp: record.timestamp,
  };
}

export function fromFailureRow(row: FailureRow): FailureRecord {
  const record: FailureRecord = {
    identifier: row.identifier,
    entryId: row.entry_id,
    publisherTag: row.publisher,
    reason: row.reason,
    timestamp: row.timestamp,
  };
  if (typeof row.http_status === "number") record.statusCode = row.http_status;
  return record;
}

/**
 * JSON array on disk, rewritten on every append. Appends from concurrent
 * workers queue on one promise chain.
 */
export class JsonFileFailureLog implements FailureLog {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  append(record: FailureRecord): Promise<void> {
    const run = this.tail.then(async () => {
      try {
        const rows = await this.readRows();
        rows.push(toFailureRow(record));
        await mkdir(path.dirname(this.filePath), { recursive: true });
        await writeFile(this.filePath, `${JSON.stringify(rows, null, 2)}\n`, "utf8");
      } catch (error) {
        console.warn("[failure-log] append failed:", errorMessage(error));
      }
    });
    this.tail = run;
    return run;
  }

  async list(): Promise<FailureRecord[]> {
    await this.tail;
    return (await this.readRows()).map(fromFailureRow);
  }

  private async readRows(): Promise<FailureRow[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const parsed = z.array(failureRowSchema).safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`failure log ${this.filePath} is malformed; refusing to overwrite it`);
    }
    return parsed.data;
  }
}
