export type * from "./domain/models/reconciliation.ts";
export { emptyDiagnostic, errorMessage, ReconcileError, toDiagnostic } from "./domain/models/errors.ts";

export { completeEntry } from "./application/complete-entry.ts";
export type { CompleteEntryDeps, CompleteEntryOptions, CompleteEntryResult } from "./application/complete-entry.ts";
export { runReconciliationBatch, summarizeOutcomes } from "./application/run-batch.ts";
export type { BatchDeps, BatchOptions, BatchResult } from "./application/run-batch.ts";
export { alwaysReject, serializeDecisions } from "./application/decision-channel.ts";
export type { DecisionChannel, DecisionRequest } from "./application/decision-channel.ts";
export { FetchCoalescer } from "./application/fetch-coalescer.ts";

export * from "./providers/index.ts";

export { JsonDirectoryRecordCache, MemoryRecordCache } from "./infrastructure/repositories/record-cache.ts";
export type { RecordCache, RecordCacheOptions } from "./infrastructure/repositories/record-cache.ts";
export { JsonFileFailureLog, MemoryFailureLog } from "./infrastructure/repositories/failure-log.ts";
export type { FailureLog } from "./infrastructure/repositories/failure-log.ts";
export {
  loadCorrectionTable,
  parseCorrectionFile,
  StaticCorrectionTable,
} from "./infrastructure/repositories/correction-table.ts";
export type { CorrectionTable } from "./infrastructure/repositories/correction-table.ts";
export { createReconciliationStore, ReconciliationStore } from "./infrastructure/repositories/reconciliation-store.ts";

export {
  createConsoleEventEmitter,
  formatReconcileEvent,
  silentEventEmitter,
} from "./observability/reconcile-events.ts";
export type { ReconcileEvent, ReconcileEventEmitter } from "./observability/reconcile-events.ts";

export { parseBibtex, serializeBibtex, serializeEntry } from "../_shared/bibtex.ts";
export { ChangeLedger } from "../_shared/change-ledger.ts";
export type { ChangeSink } from "../_shared/change-ledger.ts";
export { formatBatchSummary, renderChangeReport } from "../_shared/change-report.ts";
export { validate } from "../_shared/candidate-validator.ts";
export { checkCompleteness, importantFieldsFor, merge, reconcile, replaceRecord } from "../_shared/field-merge.ts";
export {
  extractArxivId,
  isPreprintEntry,
  isWellFormedIdentifier,
  normalizeIdentifier,
  resolve,
  resolvePublisherTag,
} from "../_shared/identifier-resolver.ts";
export { DEFAULT_RUNTIME_CONFIG, getReconcileRuntimeConfig, loadConfigFile } from "../_shared/runtime-config.ts";
export type { ReconcileRuntimeConfig } from "../_shared/runtime-config.ts";
