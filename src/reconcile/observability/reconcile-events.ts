import type {
  Diagnostic,
  SourceTag,
  VerdictKind,
} from "../domain/models/reconciliation.ts";

export type ReconcileStageName =
  | "SKIP_COMPLETE"
  | "RESOLVE"
  | "CORRECTION"
  | "PREFLIGHT"
  | "LOCATE_PUBLISHED"
  | "FETCH"
  | "VALIDATE"
  | "MERGE"
  | "EXHAUSTED"
  | "CANCELLED";

export interface ReconcileEvent {
  entryId: string;
  stage: ReconcileStageName;
  status: "completed" | "failed" | "skipped";
  at: string;
  sourceTag?: SourceTag;
  identifier?: string | null;
  cacheHit?: boolean;
  verdict?: VerdictKind;
  code?: Diagnostic["code"];
  message?: string;
}

export type ReconcileEventEmitter = (event: ReconcileEvent) => void;

export function formatReconcileEvent(event: ReconcileEvent): string {
  const parts = [
    "[Orchestrator]",
    `entry=${event.entryId}`,
    `stage=${event.stage}`,
    `status=${event.status}`,
  ];
  if (event.sourceTag) parts.push(`source=${event.sourceTag}`);
  if (event.identifier) parts.push(`identifier=${event.identifier}`);
  if (event.cacheHit) parts.push("cache_hit=true");
  if (event.verdict) parts.push(`verdict=${event.verdict}`);
  if (event.code) parts.push(`code=${event.code}`);
  if (event.message) parts.push(`message=${event.message}`);
  return parts.join(" ");
}

/** Progress goes to `console.log` unless quiet; failures always reach `console.warn`. */
export function createConsoleEventEmitter(options: { quiet?: boolean } = {}): ReconcileEventEmitter {
  return (event) => {
    if (event.status === "failed") {
      console.warn(formatReconcileEvent(event));
      return;
    }
    if (!options.quiet) console.log(formatReconcileEvent(event));
  };
}

export const silentEventEmitter: ReconcileEventEmitter = () => undefined;
