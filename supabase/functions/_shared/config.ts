// Pipeline configuration: defaults → NEWS_PIPELINE_* env → JSON file → explicit overrides.
// The merged result is validated once; anything invalid is a ConfigurationError
// raised before the first article is touched.

import { readFileSync } from "node:fs";
import { z } from "zod";

import { ConfigurationError, errorMessage } from "./errors.ts";
import { GENERATOR_METHODS, type GeneratorMethod } from "./types.ts";

// ─── Schema ───────────────────────────────────────────────────────────────────

const Score  = z.number().min(0).max(1);
const Weight = z.number().min(0);

const GeneratorToggle = z.object({ enabled: z.boolean() });

export const PipelineConfigSchema = z.object({
  generators: z.object({
    substring: GeneratorToggle,
    fuzzy:     GeneratorToggle,
    ner:       GeneratorToggle,
    semantic:  GeneratorToggle,
  }),
  weights: z.object({
    substring: Weight,
    fuzzy:     Weight,
    ner:       Weight,
    semantic:  Weight,
  }),
  fusionMode:              z.enum(["max", "additive"]),
  threshold:               Score,
  concurrency:             z.number().int().min(1),
  generatorTimeoutMs:      z.number().int().positive(),
  fuzzyFloor:              Score,
  nerFloor:                Score,
  semanticFloor:           Score,
  semanticWindowChars:     z.number().int().min(50),
  semanticMaxWindows:      z.number().int().min(1),
  summaryUtcOffsetMinutes: z.number().int().min(-720).max(840),
  lockStaleSeconds:        z.number().int().positive(),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type FusionMode     = PipelineConfig["fusionMode"];

const OverridesSchema = z.object({
  generators: z.object({
    substring: GeneratorToggle.partial(),
    fuzzy:     GeneratorToggle.partial(),
    ner:       GeneratorToggle.partial(),
    semantic:  GeneratorToggle.partial(),
  }).partial(),
  weights: z.object({
    substring: z.number(),
    fuzzy:     z.number(),
    ner:       z.number(),
    semantic:  z.number(),
  }).partial(),
  fusionMode:              z.string(),
  threshold:               z.number(),
  concurrency:             z.number(),
  generatorTimeoutMs:      z.number(),
  fuzzyFloor:              z.number(),
  nerFloor:                z.number(),
  semanticFloor:           z.number(),
  semanticWindowChars:     z.number(),
  semanticMaxWindows:      z.number(),
  summaryUtcOffsetMinutes: z.number(),
  lockStaleSeconds:        z.number(),
}).partial().strict();

export type PipelineConfigOverrides = z.infer<typeof OverridesSchema>;

// ─── Defaults ─────────────────────────────────────────────────────────────────

export const DEFAULT_CONFIG: PipelineConfig = {
  generators: {
    substring: { enabled: true },
    fuzzy:     { enabled: true },
    ner:       { enabled: true },
    semantic:  { enabled: true },
  },
  weights: { substring: 1.0, fuzzy: 0.8, ner: 0.9, semantic: 0.7 },
  fusionMode:              "max",
  threshold:               0.75,
  concurrency:             5,
  generatorTimeoutMs:      10_000,
  fuzzyFloor:              0.75,
  nerFloor:                0.5,
  semanticFloor:           0.6,
  semanticWindowChars:     1_000,
  semanticMaxWindows:      4,
  summaryUtcOffsetMinutes: 0,
  lockStaleSeconds:        3_600,
};

// ─── Env parsing ──────────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

const PREFIX = "NEWS_PIPELINE_";

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[PREFIX + key];
  if (raw === undefined || raw.trim() === "") return undefined;
  return Number(raw);
}

function envBool(env: Env, key: string): boolean | undefined {
  const raw = env[PREFIX + key];
  if (raw === undefined || raw.trim() === "") return undefined;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

function overridesFromEnv(env: Env): PipelineConfigOverrides {
  const generators: NonNullable<PipelineConfigOverrides["generators"]> = {};
  const weights:    NonNullable<PipelineConfigOverrides["weights"]>    = {};

  for (const method of GENERATOR_METHODS) {
    const key     = method.toUpperCase();
    const enabled = envBool(env, `${key}_ENABLED`);
    const weight  = envNumber(env, `WEIGHT_${key}`);
    if (enabled !== undefined) generators[method] = { enabled };
    if (weight  !== undefined) weights[method]    = weight;
  }

  const out: PipelineConfigOverrides = { generators, weights };
  const numeric: Array<[keyof PipelineConfigOverrides, string]> = [
    ["threshold",               "THRESHOLD"],
    ["concurrency",             "CONCURRENCY"],
    ["generatorTimeoutMs",      "GENERATOR_TIMEOUT_MS"],
    ["fuzzyFloor",              "FUZZY_FLOOR"],
    ["nerFloor",                "NER_FLOOR"],
    ["semanticFloor",           "SEMANTIC_FLOOR"],
    ["semanticWindowChars",     "SEMANTIC_WINDOW_CHARS"],
    ["semanticMaxWindows",      "SEMANTIC_MAX_WINDOWS"],
    ["summaryUtcOffsetMinutes", "SUMMARY_UTC_OFFSET_MINUTES"],
    ["lockStaleSeconds",        "LOCK_STALE_SECONDS"],
  ];
  for (const [field, key] of numeric) {
    const value = envNumber(env, key);
    if (value !== undefined) Object.assign(out, { [field]: value });
  }

  const mode = env[PREFIX + "FUSION_MODE"];
  if (mode) out.fusionMode = mode.trim();

  return out;
}

function overridesFromFile(path: string): PipelineConfigOverrides {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`cannot read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return parseOverrides(parsed, path);
}

function parseOverrides(value: unknown, origin: string): PipelineConfigOverrides {
  const res = OverridesSchema.safeParse(value);
  if (!res.success) {
    throw new ConfigurationError(`invalid config in ${origin}: ${formatIssues(res.error)}`);
  }
  return res.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(i => `${i.path.join(".") || "(root)"} ${i.message}`)
    .join("; ");
}

// ─── Merge + validate ─────────────────────────────────────────────────────────

type Candidate = Omit<PipelineConfig, "fusionMode"> & { fusionMode: string };

function applyOverrides(base: Candidate, patch: PipelineConfigOverrides): Candidate {
  const { generators, weights, ...scalars } = patch;
  const next: Candidate = {
    ...base,
    ...scalars,
    generators: { ...base.generators },
    weights:    { ...base.weights, ...weights },
  };
  for (const method of GENERATOR_METHODS) {
    const toggle = generators?.[method];
    if (toggle) next.generators[method] = { ...base.generators[method], ...toggle };
  }
  return next;
}

/** Validates a fully merged config. Throws ConfigurationError. */
export function validateConfig(candidate: unknown): PipelineConfig {
  const res = PipelineConfigSchema.safeParse(candidate);
  if (!res.success) {
    throw new ConfigurationError(`invalid pipeline config: ${formatIssues(res.error)}`);
  }
  return res.data;
}

export function loadPipelineConfig(
  env:       Env = process.env,
  overrides: PipelineConfigOverrides = {},
): PipelineConfig {
  let merged: Candidate = applyOverrides(DEFAULT_CONFIG, overridesFromEnv(env));

  const file = env[PREFIX + "CONFIG"];
  if (file) merged = applyOverrides(merged, overridesFromFile(file));

  merged = applyOverrides(merged, parseOverrides(overrides, "overrides"));
  return validateConfig(merged);
}

/** Methods switched on for this run. */
export function enabledMethods(config: PipelineConfig): GeneratorMethod[] {
  return GENERATOR_METHODS.filter(m => config.generators[m].enabled);
}
