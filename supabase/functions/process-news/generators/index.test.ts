import { describe, expect, it, vi } from "vitest";

import type { EmbeddingProvider } from "../../_shared/capabilities.ts";
import { DEFAULT_CONFIG, type PipelineConfig } from "../../_shared/config.ts";
import type { Logger } from "../../_shared/logger.ts";
import { AbortedError } from "../../_shared/pool.ts";
import type { CandidateSignal, SignalMap, Ticker } from "../../_shared/types.ts";
import { buildDictionary, runGenerators, selectGenerators, type CandidateGenerator } from "./index.ts";

function fakeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const embeddings: EmbeddingProvider = {
  model: "fake",
  embed: async texts => texts.map(() => [1, 0]),
};

const dictionary = buildDictionary([{ id: 1, symbol: "GAZP", name: "Газпром", aliases: [] } satisfies Ticker]);

const fixed = (method: "substring" | "fuzzy", score: number): CandidateGenerator => {
  const signal: CandidateSignal = { ticker_id: 1, mention_text: "GAZP", mention_type: "symbol", method, raw_score: score };
  return { method, generate: () => new Map([[1, signal]]) };
};

describe("selectGenerators", () => {
  it("skips semantic with a warning when no embedding provider is given", () => {
    const log = fakeLogger();
    const gens = selectGenerators(DEFAULT_CONFIG, {}, log);
    expect(gens.map(g => g.method)).toEqual(["substring", "fuzzy", "ner"]);
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it("includes semantic when embeddings are available", () => {
    const gens = selectGenerators(DEFAULT_CONFIG, { embeddings }, fakeLogger());
    expect(gens.map(g => g.method)).toEqual(["substring", "fuzzy", "ner", "semantic"]);
  });

  it("honours enable flags", () => {
    const config: PipelineConfig = {
      ...DEFAULT_CONFIG,
      generators: { ...DEFAULT_CONFIG.generators, fuzzy: { enabled: false }, ner: { enabled: false } },
    };
    expect(selectGenerators(config, { embeddings }, fakeLogger()).map(g => g.method)).toEqual(["substring", "semantic"]);
  });
});

describe("runGenerators", () => {
  it("returns one map per generator in order", async () => {
    const maps = await runGenerators([fixed("substring", 1), fixed("fuzzy", 0.8)], "GAZP", dictionary, DEFAULT_CONFIG, {});
    expect(maps.map(m => m.get(1)?.raw_score)).toEqual([1, 0.8]);
  });

  it("degrades a throwing generator to an empty map", async () => {
    const broken: CandidateGenerator = {
      method:   "ner",
      generate: () => { throw new Error("model unavailable"); },
    };
    const maps = await runGenerators([broken, fixed("substring", 1)], "GAZP", dictionary, DEFAULT_CONFIG, {});
    expect(maps[0].size).toBe(0);
    expect(maps[1].size).toBe(1);
  });

  it("degrades a generator that exceeds the timeout", async () => {
    const hung: CandidateGenerator = {
      method:   "semantic",
      generate: () => new Promise<SignalMap>(() => {}),
    };
    const config = { ...DEFAULT_CONFIG, generatorTimeoutMs: 20 };
    const maps   = await runGenerators([hung, fixed("substring", 1)], "GAZP", dictionary, config, {});
    expect(maps[0].size).toBe(0);
    expect(maps[1].get(1)?.raw_score).toBe(1);
  });

  it("rejects instead of degrading when cancelled mid-generation", async () => {
    const hung: CandidateGenerator = {
      method:   "semantic",
      generate: () => new Promise<SignalMap>(() => {}),
    };
    const controller = new AbortController();
    const config     = { ...DEFAULT_CONFIG, generatorTimeoutMs: 60_000 };
    const pending    = runGenerators([hung], "GAZP", dictionary, config, { signal: controller.signal });
    setTimeout(() => controller.abort(), 5);

    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });
});
