import type { ChangeEvent, ChangeKind } from "../reconcile/domain/models/reconciliation.ts";
import { errorMessage } from "../reconcile/domain/models/errors.ts";

export interface ChangeSink {
  write(events: readonly ChangeEvent[]): Promise<void>;
}

/**
 * Append-only record of every change made during a run. Appends are queued
 * on a single promise chain so that concurrent workers never interleave a
 * batch, and the optional sink sees batches in the same order.
 */
export class ChangeLedger {
  private readonly entries: ChangeEvent[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly sink?: ChangeSink) {}

  append(events: readonly ChangeEvent[]): Promise<void> {
    const batch = events.map((event) => (Object.isFrozen(event) ? event : Object.freeze({ ...event })));
    const run = this.tail.then(async () => {
      this.entries.push(...batch);
      if (!this.sink || batch.length === 0) return;
      try {
        await this.sink.write(batch);
      } catch (error) {
        console.warn("[ChangeLedger] sink write failed:", errorMessage(error));
      }
    });
    this.tail = run;
    return run;
  }

  flush(): Promise<void> {
    return this.tail;
  }

  events(): readonly ChangeEvent[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  forEntry(entryId: string): ChangeEvent[] {
    return this.entries.filter((event) => event.entryId === entryId);
  }

  sortedByEntry(): ChangeEvent[] {
    return this.entries
      .map((event, idx) => ({ event, idx }))
      .sort((a, b) => a.event.entryId.localeCompare(b.event.entryId) || a.idx - b.idx)
      .map(({ event }) => event);
  }

  countsByKind(): Record<ChangeKind, number> {
    const counts: Record<ChangeKind, number> = { FIELD_ADDED: 0, FIELD_UPDATED: 0, RECORD_REPLACED: 0 };
    for (const event of this.entries) counts[event.kind] += 1;
    return counts;
  }

  modifiedEntryIds(): string[] {
    return [...new Set(this.entries.map((event) => event.entryId))].sort((a, b) => a.localeCompare(b));
  }
}
