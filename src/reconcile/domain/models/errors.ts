import type { Diagnostic, ReconcileErrorCode, SourceTag } from "./reconciliation.ts";

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode;
  readonly statusCode?: number;
  readonly retryAfterMs?: number;
  readonly cause?: unknown;

  constructor(
    code: ReconcileErrorCode,
    message: string,
    options?: { statusCode?: number; retryAfterMs?: number; cause?: unknown },
  ) {
    super(message);
    this.name = "ReconcileError";
    this.code = code;
    this.statusCode = options?.statusCode;
    this.retryAfterMs = options?.retryAfterMs;
    this.cause = options?.cause;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toDiagnostic(sourceTag: Diagnostic["sourceTag"], error: unknown): Diagnostic {
  if (error instanceof ReconcileError) {
    return {
      sourceTag,
      code: error.code,
      reason: error.message,
      ...(error.statusCode !== undefined ? { statusCode: error.statusCode } : {}),
      ...(error.retryAfterMs !== undefined ? { retryAfterMs: error.retryAfterMs } : {}),
    };
  }
  return { sourceTag, code: "ADAPTER_UNAVAILABLE", reason: errorMessage(error) };
}

export function emptyDiagnostic(sourceTag: SourceTag, reason: string, statusCode?: number): Diagnostic {
  return {
    sourceTag,
    code: "ADAPTER_EMPTY",
    reason,
    ...(statusCode !== undefined ? { statusCode } : {}),
  };
}
