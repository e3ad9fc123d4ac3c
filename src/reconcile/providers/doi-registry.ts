import { errorMessage } from "../domain/models/errors.ts";
import { fetchWithRetry, type HttpClientOptions } from "./http.ts";
import type { AdapterCallContext, RegistryChecker, RegistryCheckResult } from "./types.ts";

const DOI_REGISTRY_TIMEOUT_MS = 10_000;
const RESOLVED_STATUSES = new Set([200, 301, 302, 303, 307, 308]);

/** Existence check against the DOI resolver; a redirect means the DOI is registered. */
export class DoiRegistryChecker implements RegistryChecker {
  constructor(private readonly options: HttpClientOptions = {}) {}

  async check(identifier: string, context: AdapterCallContext = {}): Promise<RegistryCheckResult> {
    if (!identifier.startsWith("10.")) {
      return { ok: false, reason: `invalid DOI format (must start with "10."): ${identifier}` };
    }
    if (!identifier.includes("/")) {
      return { ok: false, reason: `invalid DOI structure (missing "/"): ${identifier}` };
    }

    let response: Response;
    try {
      response = await fetchWithRetry(
        `https://doi.org/${identifier}`,
        { method: "HEAD", redirect: "manual", signal: context.signal },
        {
          label: "doi-registry",
          timeoutMs: this.options.timeoutMs ?? DOI_REGISTRY_TIMEOUT_MS,
          maxRetries: this.options.maxRetries ?? 2,
          baseDelayMs: this.options.baseDelayMs,
          onRetry: ({ attempt, delayMs, reason }) => {
            console.warn(`[DoiRegistry] Retry #${attempt} in ${delayMs}ms (${reason})`);
          },
        },
      );
    } catch (error) {
      return { ok: false, reason: `DOI resolution failed (network error): ${errorMessage(error)}` };
    }

    const status = response.status;
    if (RESOLVED_STATUSES.has(status)) return { ok: true, statusCode: status };
    if (status === 404) {
      return { ok: false, reason: "DOI not found in DOI.org database (HTTP 404)", statusCode: status };
    }
    if (status === 403) {
      return { ok: false, reason: "Access forbidden to DOI resource (HTTP 403)", statusCode: status };
    }
    return { ok: false, reason: `DOI resolution returned HTTP ${status}`, statusCode: status };
  }
}
