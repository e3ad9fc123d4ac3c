import type { BatchTotals, ChangeEvent, FailureRecord } from "../reconcile/domain/models/reconciliation.ts";
import type { ChangeLedger } from "./change-ledger.ts";

export interface ChangeReportInput {
  ledger: ChangeLedger;
  totals: BatchTotals;
  failures: readonly FailureRecord[];
  title?: string;
  generatedAt?: Date;
}

export function escapeMarkdownCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function describeChange(event: ChangeEvent): string {
  switch (event.kind) {
    case "FIELD_ADDED":
      return `- added \`${event.field ?? "?"}\` = \`${event.newValue}\` (${event.sourceTag})`;
    case "FIELD_UPDATED":
      return `- updated \`${event.field ?? "?"}\`: \`${event.oldValue ?? ""}\` → \`${event.newValue}\` (${event.sourceTag})`;
    case "RECORD_REPLACED":
      return `- replaced record \`${event.oldValue ?? ""}\` → \`${event.newValue}\` (${event.sourceTag})`;
  }
}

function summaryRows(totals: BatchTotals): Array<[string, number]> {
  return [
    ["Processed", totals.processed],
    ["Modified", totals.modified],
    ["Unchanged", totals.unchanged],
    ["Skipped (complete)", totals.skippedComplete],
    ["Failed", totals.failed],
    ["Cancelled", totals.cancelled],
    ["Cache hits", totals.cacheHits],
    ["Pre-flight failures", totals.preflightFailures],
  ];
}

export function renderChangeReport(input: ChangeReportInput): string {
  const lines: string[] = [
    `# ${input.title ?? "Bibliography change report"}`,
    "",
    `Generated: ${(input.generatedAt ?? new Date()).toISOString()}`,
    "",
    "## Summary",
    "",
    "| Metric | Count |",
    "| --- | --- |",
    ...summaryRows(input.totals).map(([label, count]) => `| ${label} | ${count} |`),
    "",
    "## Changes by kind",
    "",
  ];

  const counts = input.ledger.countsByKind();
  lines.push(
    `- FIELD_ADDED: ${counts.FIELD_ADDED}`,
    `- FIELD_UPDATED: ${counts.FIELD_UPDATED}`,
    `- RECORD_REPLACED: ${counts.RECORD_REPLACED}`,
    "",
    "## Entries",
    "",
  );

  const sorted = input.ledger.sortedByEntry();
  if (sorted.length === 0) {
    lines.push("_No changes._", "");
  } else {
    let current: string | null = null;
    for (const event of sorted) {
      if (event.entryId !== current) {
        if (current !== null) lines.push("");
        current = event.entryId;
        lines.push(`### ${event.entryId}`, "");
      }
      lines.push(describeChange(event));
    }
    lines.push("");
  }

  lines.push("## Failures", "");
  if (input.failures.length === 0) {
    lines.push("_No failures._");
  } else {
    lines.push("| Entry | Identifier | Publisher | Status | Reason |", "| --- | --- | --- | --- | --- |");
    const failures = [...input.failures].sort((a, b) => a.entryId.localeCompare(b.entryId));
    for (const failure of failures) {
      lines.push(
        `| ${escapeMarkdownCell(failure.entryId)} | ${escapeMarkdownCell(failure.identifier ?? "-")} | ${failure.publisherTag} | ${failure.statusCode ?? "-"} | ${escapeMarkdownCell(failure.reason)} |`,
      );
    }
  }

  return `${lines.join("\n")}\n`;
}

export function formatBatchSummary(totals: BatchTotals): string {
  return [
    `Processed: ${totals.processed} | modified: ${totals.modified} | unchanged: ${totals.unchanged} | skipped complete: ${totals.skippedComplete} | failed: ${totals.failed} | cancelled: ${totals.cancelled}`,
    `Cache hits: ${totals.cacheHits} | pre-flight failures: ${totals.preflightFailures}`,
  ].join("\n");
}
