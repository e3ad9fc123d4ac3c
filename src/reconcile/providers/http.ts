import { errorMessage, ReconcileError } from "../domain/models/errors.ts";

export interface HttpClientOptions {
  timeoutMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
}

export interface RetryNotice {
  attempt: number;
  delayMs: number;
  reason: string;
}

export interface FetchRetryOptions extends HttpClientOptions {
  label: string;
  timeoutMs: number;
  maxDelayMs?: number;
  onRetry?: (notice: RetryNotice) => void;
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 1_000;
const DEFAULT_MAX_DELAY_MS = 8_000;

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** The pause a `Retry-After` header asks for, given in seconds or as an HTTP date. */
export function retryAfterMs(header: string | null, now: number = Date.now()): number | null {
  const value = header?.trim();
  if (!value) return null;
  if (/^\d+$/.test(value)) return Number(value) * 1_000;
  const at = Date.parse(value);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now);
}

function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function backoffMs(attempt: number, options: FetchRetryOptions): number {
  const base = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  return Math.min(options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS, base * 2 ** attempt);
}

/**
 * A single request bounded by `timeoutMs`. An abort from the caller's own
 * signal is rethrown unchanged; only the timeout is reported as one.
 */
async function attemptFetch(url: string, init: RequestInit, timeoutMs: number, label: string): Promise<Response> {
  const caller = init.signal ?? undefined;
  const bounded = new AbortController();
  const timer = setTimeout(() => bounded.abort(), timeoutMs);
  const relay = () => bounded.abort(caller?.reason);

  if (caller?.aborted) relay();
  else caller?.addEventListener("abort", relay, { once: true });

  try {
    return await fetch(url, { ...init, signal: bounded.signal });
  } catch (error) {
    if (bounded.signal.aborted && !caller?.aborted) {
      throw new Error(`${label} timed out after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
    caller?.removeEventListener("abort", relay);
  }
}

/**
 * Retries network errors and transient statuses (429, 5xx) with exponential
 * backoff. A `Retry-After` header longer than the backoff wins. The last
 * response is returned as is, whatever its status; a cancelled caller is
 * never retried.
 */
export async function fetchWithRetry(url: string, init: RequestInit, options: FetchRetryOptions): Promise<Response> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;

  for (let attempt = 0; ; attempt += 1) {
    let delayMs: number;
    let reason: string;
    try {
      const response = await attemptFetch(url, init, options.timeoutMs, `${options.label}#${attempt + 1}`);
      if (!isTransientStatus(response.status) || attempt >= maxRetries) return response;
      delayMs = Math.max(backoffMs(attempt, options), retryAfterMs(response.headers.get("retry-after")) ?? 0);
      reason = `status ${response.status}`;
    } catch (error) {
      if (init.signal?.aborted || attempt >= maxRetries) throw error;
      delayMs = backoffMs(attempt, options);
      reason = errorMessage(error);
    }
    options.onRetry?.({ attempt: attempt + 1, delayMs, reason });
    await sleep(delayMs);
  }
}

/**
 * Maps a non-2xx response onto the error taxonomy: gone or missing records
 * are empty results, everything else means the source is unavailable. A 429
 * carries the pause the source asked for.
 */
export function responseError(source: string, response: Response): ReconcileError {
  const status = response.status;
  if (status === 404 || status === 410) {
    return new ReconcileError("ADAPTER_EMPTY", `${source} has no record (HTTP ${status})`, { statusCode: status });
  }

  const pause = status === 429 ? retryAfterMs(response.headers.get("retry-after")) : null;
  if (pause === null) {
    return new ReconcileError("ADAPTER_UNAVAILABLE", `${source} API error ${status}`, { statusCode: status });
  }
  return new ReconcileError(
    "ADAPTER_UNAVAILABLE",
    `${source} API error ${status}, retry after ${Math.ceil(pause / 1_000)}s`,
    { statusCode: status, retryAfterMs: pause },
  );
}

export async function readJson(source: string, response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch (error) {
    throw new ReconcileError("ADAPTER_EMPTY", `${source} returned an unreadable body`, {
      statusCode: response.status,
      cause: error,
    });
  }
}
