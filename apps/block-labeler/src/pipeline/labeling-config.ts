import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";

const unitInterval = z.number().min(0).max(1);
const positiveInt = z.number().int().positive();

export const labelingConfigSchema = z
  .object({
    version: z.string(),
    normalization: z.object({
      unicode_form: z.enum(["NFC", "NFD", "NFKC", "NFKD"]),
    }),
    reconciliation: z.object({
      overlap_fraction: unitInterval,
      near_duplicate_similarity: unitInterval,
    }),
    matching: z.object({
      acceptance_threshold: unitInterval,
      floor_similarity: unitInterval,
      initial_window: positiveInt,
      window_step: positiveInt,
      max_window: positiveInt,
      max_concatenated_spans: positiveInt,
      min_query_chars: z.number().int().min(0),
      global_search_per_document: z.number().int().min(0),
    }),
    resolution: z.object({
      classifier_threshold: unitInterval,
      tier3_alarm_fraction: unitInterval,
      use_layout_prediction: z.boolean(),
    }),
    classifier: z.object({
      endpoint: z.string().url().nullable(),
      token_env: z.string(),
      timeout_ms: positiveInt,
    }),
    batch: z.object({
      concurrency: positiveInt,
    }),
    logging: z.object({
      level: z.string(),
      per_document_logs: z.boolean(),
      keep_logs: z.boolean(),
    }),
  })
  .refine((config) => config.matching.initial_window <= config.matching.max_window, {
    message: "matching.initial_window must not exceed matching.max_window",
    path: ["matching", "initial_window"],
  });

export type LabelingConfig = z.infer<typeof labelingConfigSchema>;

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<unknown>
    ? T[K]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export type LabelingConfigOverrides = DeepPartial<LabelingConfig>;

export type LabelingConfigSources = {
  configPath: string;
  loadedFromFile: boolean;
  overrides?: LabelingConfigOverrides;
  envOverrides: LabelingConfigOverrides;
};

export const defaultLabelingConfig: LabelingConfig = {
  version: "0.1.0",
  normalization: { unicode_form: "NFKC" },
  reconciliation: { overlap_fraction: 0.5, near_duplicate_similarity: 0.9 },
  matching: {
    acceptance_threshold: 0.8,
    floor_similarity: 0.5,
    initial_window: 3,
    window_step: 2,
    max_window: 10,
    max_concatenated_spans: 3,
    min_query_chars: 10,
    global_search_per_document: 1,
  },
  resolution: {
    classifier_threshold: 0.8,
    tier3_alarm_fraction: 0.3,
    use_layout_prediction: true,
  },
  classifier: {
    endpoint: null,
    token_env: "BLOCK_LABELER_CLASSIFIER_TOKEN",
    timeout_ms: 5000,
  },
  batch: { concurrency: 4 },
  logging: { level: "info", per_document_logs: true, keep_logs: true },
};

const resolveConfigPath = (configPath?: string): string =>
  configPath ??
  process.env.BLOCK_LABELER_CONFIG_PATH ??
  path.join(process.cwd(), "spec", "labeling_config.yaml");

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const mergeDeep = (
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> => {
  const output: Record<string, unknown> = { ...target };
  Object.entries(source).forEach(([key, value]) => {
    if (value === undefined) return;
    const base = output[key];
    if (isPlainObject(value) && isPlainObject(base)) {
      output[key] = mergeDeep(base, value);
      return;
    }
    output[key] = value;
  });
  return output;
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null) {
    Object.values(value).forEach((entry) => deepFreeze(entry));
    Object.freeze(value);
  }
  return value;
};

const toRecord = (value: unknown): Record<string, unknown> => (isPlainObject(value) ? value : {});

const parseMerged = (merged: Record<string, unknown>): LabelingConfig => {
  const result = labelingConfigSchema.safeParse(merged);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid labeling config: ${detail}`);
  }
  return deepFreeze(result.data);
};

export type LoadedLabelingConfig = {
  config: LabelingConfig;
  configPath: string;
  loadedFromFile: boolean;
};

export const loadLabelingConfig = async (configPath?: string): Promise<LoadedLabelingConfig> => {
  const resolvedPath = resolveConfigPath(configPath);
  const defaults = deepFreeze(structuredClone(defaultLabelingConfig));
  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf-8");
  } catch {
    return { config: defaults, configPath: resolvedPath, loadedFromFile: false };
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch {
    return { config: defaults, configPath: resolvedPath, loadedFromFile: false };
  }
  if (!isPlainObject(parsed)) {
    return { config: defaults, configPath: resolvedPath, loadedFromFile: false };
  }
  const merged = mergeDeep(toRecord(structuredClone(defaultLabelingConfig)), parsed);
  return { config: parseMerged(merged), configPath: resolvedPath, loadedFromFile: true };
};

const readEnvOverrides = (env: Record<string, string | undefined>): LabelingConfigOverrides => {
  const envOverrides: LabelingConfigOverrides = {};
  const acceptance = Number(env.BLOCK_LABELER_ACCEPTANCE_THRESHOLD);
  const concurrency = Number(env.BLOCK_LABELER_CONCURRENCY);
  if (env.BLOCK_LABELER_ACCEPTANCE_THRESHOLD && Number.isFinite(acceptance)) {
    envOverrides.matching = { acceptance_threshold: acceptance };
  }
  if (Number.isInteger(concurrency) && concurrency > 0) {
    envOverrides.batch = { concurrency };
  }
  return envOverrides;
};

export const resolveLabelingConfig = (
  baseConfig: LabelingConfig,
  options?: {
    overrides?: LabelingConfigOverrides;
    env?: Record<string, string | undefined>;
    configPath?: string;
    loadedFromFile?: boolean;
  }
): { resolvedConfig: LabelingConfig; sources: LabelingConfigSources } => {
  const overrides = options?.overrides;
  const envOverrides = readEnvOverrides(options?.env ?? {});

  const merged = mergeDeep(
    mergeDeep(toRecord(structuredClone(baseConfig)), toRecord(overrides)),
    toRecord(envOverrides)
  );

  return {
    resolvedConfig: parseMerged(merged),
    sources: {
      configPath: options?.configPath ?? resolveConfigPath(),
      loadedFromFile: options?.loadedFromFile ?? false,
      overrides,
      envOverrides,
    },
  };
};

export const createLabelingConfig = (overrides?: LabelingConfigOverrides): LabelingConfig =>
  resolveLabelingConfig(defaultLabelingConfig, { overrides }).resolvedConfig;
