import type { FetchResult } from "../domain/models/reconciliation.ts";

/**
 * Shares one in-flight fetch between callers asking the same source for the
 * same identifier. The lookup and registration happen in the same tick, so a
 * second caller arriving while the first is still pacing joins it.
 */
export class FetchCoalescer {
  private readonly inFlight = new Map<string, Promise<FetchResult>>();
  private sharedCount = 0;

  static keyFor(sourceTag: string, identifier: string): string {
    return `${sourceTag}:${identifier}`;
  }

  run(key: string, start: () => Promise<FetchResult>): Promise<FetchResult> {
    const existing = this.inFlight.get(key);
    if (existing) {
      this.sharedCount += 1;
      return existing;
    }

    const promise = start().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }

  get shared(): number {
    return this.sharedCount;
  }

  get pending(): number {
    return this.inFlight.size;
  }
}
