import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { CorrectionRule } from "../../domain/models/reconciliation.ts";
import { normalizeIdentifier } from "../../../_shared/identifier-resolver.ts";

export interface CorrectionTable {
  lookup(identifier: string): CorrectionRule | null;
}

const correctionRowSchema = z.object({
  original_doi: z.string().min(1),
  corrected_doi: z.string().min(1).nullable().optional(),
  status: z.enum(["corrected", "invalid", "pending"]),
  reason: z.string().default(""),
});

export const correctionFileSchema = z.object({
  corrections: z.array(correctionRowSchema),
});

export class StaticCorrectionTable implements CorrectionTable {
  private readonly rules = new Map<string, CorrectionRule>();

  constructor(rules: readonly CorrectionRule[] = []) {
    for (const rule of rules) {
      const key = normalizeIdentifier(rule.originalIdentifier);
      if (key) this.rules.set(key, rule);
    }
  }

  lookup(identifier: string): CorrectionRule | null {
    const key = normalizeIdentifier(identifier);
    return key ? this.rules.get(key) ?? null : null;
  }

  get size(): number {
    return this.rules.size;
  }
}

export function parseCorrectionFile(json: unknown, source = "corrections"): StaticCorrectionTable {
  const parsed = correctionFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`Correction table ${source} is invalid: ${issues.join("; ")}`);
  }

  const rules: CorrectionRule[] = [];
  for (const row of parsed.data.corrections) {
    if (row.status === "corrected" && !row.corrected_doi) {
      console.warn(`[correction-table] ${row.original_doi} is marked corrected without a replacement; ignored`);
      continue;
    }
    rules.push({
      originalIdentifier: row.original_doi,
      replacementIdentifier: normalizeIdentifier(row.corrected_doi),
      status: row.status,
      reason: row.reason,
    });
  }
  return new StaticCorrectionTable(rules);
}

export async function loadCorrectionTable(filePath: string): Promise<StaticCorrectionTable> {
  const text = await readFile(filePath, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new Error(`Correction table ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseCorrectionFile(json, filePath);
}
