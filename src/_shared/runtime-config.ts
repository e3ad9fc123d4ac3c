import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { PreprintPolicy } from "../reconcile/domain/models/reconciliation.ts";

export interface ReconcileRuntimeConfig {
  maxWorkers: number;
  timeoutMs: number | null;
  requestDelayMs: number;
  cacheHitDelayMs: number;
  searchDelayMs: number;
  httpTimeoutMs: number;
  retryMax: number;
  cacheMaxAgeMs: number;
  preflight: boolean;
  fetchDespitePreflightFailure: boolean;
  titleSearchFallback: boolean;
  tryFlaggedIdentifiers: boolean;
  skipComplete: boolean;
  interactive: boolean;
  preprintPolicy: PreprintPolicy;
  quiet: boolean;
  ieeeApiKey: string | null;
  semanticScholarApiKey: string | null;
  crossrefMailto: string | null;
  supabaseUrl: string | null;
  supabaseServiceRoleKey: string | null;
}

export type ReconcileConfigOverrides = Partial<ReconcileRuntimeConfig>;

type Env = Record<string, string | undefined>;

const DAY_MS = 24 * 60 * 60 * 1_000;

export const DEFAULT_RUNTIME_CONFIG: ReconcileRuntimeConfig = {
  maxWorkers: 4,
  timeoutMs: null,
  requestDelayMs: 500,
  cacheHitDelayMs: 200,
  searchDelayMs: 1_000,
  httpTimeoutMs: 15_000,
  retryMax: 3,
  cacheMaxAgeMs: 30 * DAY_MS,
  preflight: true,
  fetchDespitePreflightFailure: false,
  titleSearchFallback: true,
  tryFlaggedIdentifiers: false,
  skipComplete: true,
  interactive: false,
  preprintPolicy: "keep",
  quiet: false,
  ieeeApiKey: null,
  semanticScholarApiKey: null,
  crossrefMailto: null,
  supabaseUrl: null,
  supabaseServiceRoleKey: null,
};

const preprintPolicySchema = z.enum(["keep", "replace_with_published"]);

export const configFileSchema = z
  .object({
    maxWorkers: z.number().int().positive(),
    timeoutMs: z.number().int().nonnegative().nullable(),
    requestDelayMs: z.number().int().nonnegative(),
    cacheHitDelayMs: z.number().int().nonnegative(),
    searchDelayMs: z.number().int().nonnegative(),
    httpTimeoutMs: z.number().int().positive(),
    retryMax: z.number().int().nonnegative(),
    cacheMaxAgeDays: z.number().positive(),
    preflight: z.boolean(),
    fetchDespitePreflightFailure: z.boolean(),
    titleSearchFallback: z.boolean(),
    tryFlaggedIdentifiers: z.boolean(),
    skipComplete: z.boolean(),
    interactive: z.boolean(),
    preprintPolicy: preprintPolicySchema,
    quiet: z.boolean(),
    crossrefMailto: z.string().email(),
  })
  .partial()
  .strict();

export type ReconcileConfigFile = z.infer<typeof configFileSchema>;

function parseIntWithDefault(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const normalized = raw.trim().toLowerCase();
  if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
  return undefined;
}

function parseSecret(raw: string | undefined): string | null {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : null;
}

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.trunc(value)));
}

function defined<T extends object>(input: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(input)) {
    if (!isKeyOf(input, key)) continue;
    if (input[key] !== undefined) out[key] = input[key];
  }
  return out;
}

function isKeyOf<T extends object>(input: T, key: PropertyKey): key is keyof T {
  return key in input;
}

export function configFromEnv(env: Env = process.env): ReconcileConfigOverrides {
  const d = DEFAULT_RUNTIME_CONFIG;
  const timeoutRaw = env.BIB_RECONCILE_TIMEOUT_MS;
  const timeoutMs = timeoutRaw === undefined ? undefined : parseIntWithDefault(timeoutRaw, 0);
  const policy = preprintPolicySchema.safeParse(env.BIB_RECONCILE_PREPRINT_POLICY);

  return defined<ReconcileConfigOverrides>({
    maxWorkers: env.BIB_RECONCILE_WORKERS ? parseIntWithDefault(env.BIB_RECONCILE_WORKERS, d.maxWorkers) : undefined,
    timeoutMs: timeoutMs === undefined ? undefined : timeoutMs > 0 ? timeoutMs : null,
    requestDelayMs: env.BIB_RECONCILE_REQUEST_DELAY_MS
      ? parseIntWithDefault(env.BIB_RECONCILE_REQUEST_DELAY_MS, d.requestDelayMs)
      : undefined,
    cacheHitDelayMs: env.BIB_RECONCILE_CACHE_HIT_DELAY_MS
      ? parseIntWithDefault(env.BIB_RECONCILE_CACHE_HIT_DELAY_MS, d.cacheHitDelayMs)
      : undefined,
    searchDelayMs: env.BIB_RECONCILE_SEARCH_DELAY_MS
      ? parseIntWithDefault(env.BIB_RECONCILE_SEARCH_DELAY_MS, d.searchDelayMs)
      : undefined,
    httpTimeoutMs: env.BIB_RECONCILE_HTTP_TIMEOUT_MS
      ? parseIntWithDefault(env.BIB_RECONCILE_HTTP_TIMEOUT_MS, d.httpTimeoutMs)
      : undefined,
    retryMax: env.BIB_RECONCILE_RETRY_MAX ? parseIntWithDefault(env.BIB_RECONCILE_RETRY_MAX, d.retryMax) : undefined,
    cacheMaxAgeMs: env.BIB_RECONCILE_CACHE_MAX_AGE_DAYS
      ? parseIntWithDefault(env.BIB_RECONCILE_CACHE_MAX_AGE_DAYS, 30) * DAY_MS
      : undefined,
    preflight: parseBool(env.BIB_RECONCILE_PREFLIGHT),
    skipComplete: parseBool(env.BIB_RECONCILE_SKIP_COMPLETE),
    titleSearchFallback: parseBool(env.BIB_RECONCILE_TITLE_SEARCH),
    preprintPolicy: policy.success ? policy.data : undefined,
    quiet: parseBool(env.BIB_RECONCILE_QUIET),
    ieeeApiKey: parseSecret(env.IEEE_API_KEY) ?? undefined,
    semanticScholarApiKey: parseSecret(env.SEMANTIC_SCHOLAR_API_KEY) ?? undefined,
    crossrefMailto: parseSecret(env.CROSSREF_MAILTO) ?? undefined,
    supabaseUrl: parseSecret(env.SUPABASE_URL) ?? undefined,
    supabaseServiceRoleKey: parseSecret(env.SUPABASE_SERVICE_ROLE_KEY) ?? undefined,
  });
}

export function configFromFile(file: ReconcileConfigFile): ReconcileConfigOverrides {
  const { cacheMaxAgeDays, timeoutMs, ...rest } = file;
  return defined<ReconcileConfigOverrides>({
    ...rest,
    timeoutMs: timeoutMs === undefined ? undefined : timeoutMs && timeoutMs > 0 ? timeoutMs : null,
    cacheMaxAgeMs: cacheMaxAgeDays === undefined ? undefined : cacheMaxAgeDays * DAY_MS,
  });
}

export async function loadConfigFile(path: string): Promise<ReconcileConfigFile> {
  const text = await readFile(path, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new Error(`Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`Config file ${path} is invalid: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function clampConfig(config: ReconcileRuntimeConfig): ReconcileRuntimeConfig {
  return {
    ...config,
    maxWorkers: clampInt(config.maxWorkers, 1, 32),
    timeoutMs: config.timeoutMs === null ? null : clampInt(config.timeoutMs, 1_000, 24 * 60 * 60 * 1_000),
    requestDelayMs: clampInt(config.requestDelayMs, 0, 60_000),
    cacheHitDelayMs: clampInt(config.cacheHitDelayMs, 0, 60_000),
    searchDelayMs: clampInt(config.searchDelayMs, 0, 60_000),
    httpTimeoutMs: clampInt(config.httpTimeoutMs, 1_000, 120_000),
    retryMax: clampInt(config.retryMax, 0, 8),
    cacheMaxAgeMs: Math.max(60_000, config.cacheMaxAgeMs),
  };
}

/**
 * Layers defaults, the optional config file, the environment and explicit
 * overrides (CLI flags), later layers winning.
 */
export function getReconcileRuntimeConfig(options: {
  env?: Env;
  file?: ReconcileConfigFile;
  overrides?: ReconcileConfigOverrides;
} = {}): ReconcileRuntimeConfig {
  return clampConfig({
    ...DEFAULT_RUNTIME_CONFIG,
    ...(options.file ? configFromFile(options.file) : {}),
    ...configFromEnv(options.env ?? process.env),
    ...defined(options.overrides ?? {}),
  });
}
