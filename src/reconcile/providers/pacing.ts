import type { AdapterTier } from "../domain/models/reconciliation.ts";
import { sleep as defaultSleep } from "./http.ts";

export interface RequestPacerOptions {
  requestDelayMs: number;
  cacheHitDelayMs: number;
  searchDelayMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Shared across all workers. Each network call reserves the next free slot
 * synchronously, so concurrent callers queue up one `requestDelayMs` apart
 * instead of all waking at the same moment.
 */
export class RequestPacer {
  private lastNetworkAt = Number.NEGATIVE_INFINITY;
  private lastSearchAt = Number.NEGATIVE_INFINITY;
  private heldUntil = Number.NEGATIVE_INFINITY;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: RequestPacerOptions) {
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? defaultSleep;
  }

  async beforeNetworkCall(tier: AdapterTier): Promise<number> {
    const now = this.now();
    let slot = Math.max(now, this.lastNetworkAt + this.options.requestDelayMs, this.heldUntil);
    if (tier === "search") {
      slot = Math.max(slot, this.lastSearchAt + this.options.searchDelayMs);
      this.lastSearchAt = slot;
    }
    this.lastNetworkAt = slot;

    const waitMs = slot - now;
    if (waitMs > 0) await this.sleep(waitMs);
    return waitMs;
  }

  /** A source answered 429; no network call starts until `ms` from now. */
  holdOff(ms: number): void {
    this.heldUntil = Math.max(this.heldUntil, this.now() + ms);
  }

  async afterCacheHit(): Promise<void> {
    if (this.options.cacheHitDelayMs > 0) await this.sleep(this.options.cacheHitDelayMs);
  }
}

export function createUnpacedPacer(): RequestPacer {
  return new RequestPacer({ requestDelayMs: 0, cacheHitDelayMs: 0, searchDelayMs: 0 });
}
