import { randomUUID } from "node:crypto";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { ChangeEvent, FailureRecord, RawRecord } from "../../domain/models/reconciliation.ts";
import type { ChangeSink } from "../../../_shared/change-ledger.ts";
import { normalizeIdentifier } from "../../../_shared/identifier-resolver.ts";
import type { FailureLog } from "./failure-log.ts";
import { rawRecordSchema, type RecordCache } from "./record-cache.ts";

export const RECORD_CACHE_TABLE = "bib_record_cache";
export const FAILURE_LOG_TABLE = "bib_failure_log";
export const CHANGE_EVENTS_TABLE = "bib_change_events";

const cacheRowSchema = z.object({
  identifier: z.string(),
  record: rawRecordSchema,
  stored_at: z.string(),
});

const failureRowSchema = z.object({
  identifier: z.string().nullable(),
  entry_id: z.string(),
  publisher: z.enum(["IEEE", "ACM", "SPRINGER", "ELSEVIER", "ARXIV", "UNKNOWN"]),
  reason: z.string(),
  http_status: z.number().int().nullable(),
  failed_at: z.string(),
});

export interface ReconciliationStoreOptions {
  maxAgeMs: number;
  runId?: string;
  now?: () => number;
}

/**
 * Shared cache, failure log and change-event sink on Supabase tables (see
 * `sql/reconciliation_schema.sql`). Read errors behave as misses; write
 * errors are logged.
 */
export class ReconciliationStore implements RecordCache, FailureLog, ChangeSink {
  readonly runId: string;
  private readonly now: () => number;

  constructor(private readonly client: SupabaseClient, private readonly options: ReconciliationStoreOptions) {
    this.runId = options.runId ?? randomUUID();
    this.now = options.now ?? (() => Date.now());
  }

  async get(identifier: string): Promise<RawRecord | null> {
    const key = normalizeIdentifier(identifier) ?? identifier;
    const { data, error } = await this.client
      .from(RECORD_CACHE_TABLE)
      .select("identifier,record,stored_at")
      .eq("identifier", key)
      .limit(1);

    if (error) {
      console.warn("[reconciliation-store] cache read failed:", error.message);
      return null;
    }

    const parsed = cacheRowSchema.safeParse(Array.isArray(data) ? data[0] : undefined);
    if (!parsed.success) return null;

    const storedAt = Date.parse(parsed.data.stored_at);
    if (!Number.isFinite(storedAt) || this.now() - storedAt > this.options.maxAgeMs) return null;
    return parsed.data.record;
  }

  async put(identifier: string, record: RawRecord): Promise<void> {
    const payload = {
      identifier: normalizeIdentifier(identifier) ?? identifier,
      source_tag: record.sourceTag,
      record: { sourceTag: record.sourceTag, fields: record.fields, ...(record.entryType ? { entryType: record.entryType } : {}) },
      stored_at: new Date(this.now()).toISOString(),
    };

    const { error } = await this.client
      .from(RECORD_CACHE_TABLE)
      .upsert(payload, { onConflict: "identifier" });
    if (error) {
      console.warn("[reconciliation-store] cache upsert failed:", error.message);
    }
  }

  async append(record: FailureRecord): Promise<void> {
    const payload = {
      run_id: this.runId,
      identifier: record.identifier,
      entry_id: record.entryId,
      publisher: record.publisherTag,
      reason: record.reason,
      http_status: record.statusCode ?? null,
      failed_at: record.timestamp,
    };

    const { error } = await this.client.from(FAILURE_LOG_TABLE).insert(payload);
    if (error) {
      console.warn("[reconciliation-store] failure insert failed:", error.message);
    }
  }

  async list(): Promise<FailureRecord[]> {
    const { data, error } = await this.client
      .from(FAILURE_LOG_TABLE)
      .select("identifier,entry_id,publisher,reason,http_status,failed_at")
      .eq("run_id", this.runId)
      .order("failed_at", { ascending: true });

    if (error || !Array.isArray(data)) {
      if (error) console.warn("[reconciliation-store] failure read failed:", error.message);
      return [];
    }

    const records: FailureRecord[] = [];
    for (const row of data) {
      const parsed = failureRowSchema.safeParse(row);
      if (!parsed.success) continue;
      const record: FailureRecord = {
        identifier: parsed.data.identifier,
        entryId: parsed.data.entry_id,
        publisherTag: parsed.data.publisher,
        reason: parsed.data.reason,
        timestamp: parsed.data.failed_at,
      };
      if (parsed.data.http_status !== null) record.statusCode = parsed.data.http_status;
      records.push(record);
    }
    return records;
  }

  async write(events: readonly ChangeEvent[]): Promise<void> {
    if (events.length === 0) return;
    const payload = events.map((event) => ({
      run_id: this.runId,
      entry_id: event.entryId,
      kind: event.kind,
      field: event.field ?? null,
      old_value: event.oldValue ?? null,
      new_value: event.newValue,
      source_tag: event.sourceTag,
      occurred_at: event.timestamp,
    }));

    const { error } = await this.client.from(CHANGE_EVENTS_TABLE).insert(payload);
    if (error) {
      console.warn("[reconciliation-store] change event insert failed:", error.message);
    }
  }
}

export function createReconciliationStore(params: {
  url: string;
  serviceRoleKey: string;
  maxAgeMs: number;
}): ReconciliationStore {
  const client = createClient(params.url, params.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return new ReconciliationStore(client, { maxAgeMs: params.maxAgeMs });
}
