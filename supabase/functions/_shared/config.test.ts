import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import {
  DEFAULT_CONFIG,
  enabledMethods,
  loadPipelineConfig,
  validateConfig,
} from "./config.ts";
import { ConfigurationError } from "./errors.ts";

function configFile(content: unknown): string {
  const dir  = mkdtempSync(join(tmpdir(), "pipeline-config-"));
  const path = join(dir, "config.json");
  writeFileSync(path, JSON.stringify(content), "utf-8");
  return path;
}

describe("loadPipelineConfig", () => {
  it("returns the defaults for an empty env", () => {
    expect(loadPipelineConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("reads NEWS_PIPELINE_* variables", () => {
    const config = loadPipelineConfig({
      NEWS_PIPELINE_THRESHOLD:       "0.6",
      NEWS_PIPELINE_FUZZY_ENABLED:   "false",
      NEWS_PIPELINE_WEIGHT_SEMANTIC: "0.5",
      NEWS_PIPELINE_FUSION_MODE:     "additive",
      NEWS_PIPELINE_CONCURRENCY:     "2",
    });
    expect(config.threshold).toBe(0.6);
    expect(config.generators.fuzzy.enabled).toBe(false);
    expect(config.generators.substring.enabled).toBe(true);
    expect(config.weights.semantic).toBe(0.5);
    expect(config.weights.substring).toBe(1.0);
    expect(config.fusionMode).toBe("additive");
    expect(config.concurrency).toBe(2);
  });

  it("applies the JSON file over env and explicit overrides over both", () => {
    const path = configFile({ threshold: 0.8, weights: { ner: 0.95 } });
    const env  = { NEWS_PIPELINE_THRESHOLD: "0.6", NEWS_PIPELINE_CONFIG: path };

    expect(loadPipelineConfig(env).threshold).toBe(0.8);
    expect(loadPipelineConfig(env).weights.ner).toBe(0.95);
    expect(loadPipelineConfig(env, { threshold: 0.9 }).threshold).toBe(0.9);
  });

  it("rejects unknown keys in the JSON file", () => {
    const path = configFile({ treshold: 0.5 });
    expect(() => loadPipelineConfig({ NEWS_PIPELINE_CONFIG: path })).toThrow(ConfigurationError);
  });

  it("rejects an unreadable JSON file", () => {
    expect(() => loadPipelineConfig({ NEWS_PIPELINE_CONFIG: "/nonexistent/pipeline.json" }))
      .toThrow(ConfigurationError);
  });

  it.each([
    ["threshold above 1",   { threshold: 1.5 }],
    ["negative threshold",  { threshold: -0.1 }],
    ["negative weight",     { weights: { fuzzy: -1 } }],
    ["zero concurrency",    { concurrency: 0 }],
    ["fractional workers",  { concurrency: 2.5 }],
    ["zero timeout",        { generatorTimeoutMs: 0 }],
    ["unknown fusion mode", { fusionMode: "sum" }],
  ])("rejects %s", (_label, overrides) => {
    expect(() => loadPipelineConfig({}, overrides)).toThrow(ConfigurationError);
  });

  it("rejects a non-numeric env value", () => {
    expect(() => loadPipelineConfig({ NEWS_PIPELINE_THRESHOLD: "high" })).toThrow(ConfigurationError);
  });

  it("names the offending field", () => {
    expect(() => loadPipelineConfig({}, { threshold: 2 })).toThrow(/threshold/);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
  });

  it("rejects a partial object", () => {
    expect(() => validateConfig({ threshold: 0.5 })).toThrow(ConfigurationError);
  });
});

describe("enabledMethods", () => {
  it("lists switched-on methods in declaration order", () => {
    const config = loadPipelineConfig({}, { generators: { fuzzy: { enabled: false } } });
    expect(enabledMethods(config)).toEqual(["substring", "ner", "semantic"]);
  });
});
