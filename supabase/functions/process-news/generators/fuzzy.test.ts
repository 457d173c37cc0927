import { describe, expect, it } from "vitest";

import { DEFAULT_CONFIG } from "../../_shared/config.ts";
import { tokenize } from "../../_shared/text.ts";
import type { Ticker } from "../../_shared/types.ts";
import { fuzzyGenerator, similarity } from "./fuzzy.ts";
import { buildDictionary } from "./types.ts";

const TICKERS: Ticker[] = [
  { id: 1, symbol: "GAZP", name: "Газпром",        aliases: ["Gazprom"] },
  { id: 2, symbol: "SBER", name: "Сбербанк",       aliases: ["Sberbank"] },
  { id: 3, symbol: "GMKN", name: "Norilsk Nickel", aliases: [] },
  { id: 4, symbol: "MTSS", name: "МТС",            aliases: [] },
];
const dictionary = buildDictionary(TICKERS);

const run = async (text: string) => fuzzyGenerator.generate(text, dictionary, DEFAULT_CONFIG);

describe("similarity", () => {
  it("is 1 for equal strings", async () => {
    expect(similarity("газпром", "газпром")).toBe(1);
  });

  it("is 1 − distance / longer length", async () => {
    expect(similarity("kitten", "sitting")).toBeCloseTo(4 / 7);
  });
});

describe("fuzzyGenerator", () => {
  it("catches an inflected name", async () => {
    expect((await run("Акционеры Газпрома одобрили дивиденды")).get(1)).toEqual({
      ticker_id:    1,
      mention_text: "Газпрома",
      mention_type: "name",
      method:       "fuzzy",
      raw_score:    0.875,
    });
  });

  it("catches a misspelled alias at the floor", async () => {
    expect((await run("Sberbnak shares slipped")).get(2)).toMatchObject({
      mention_text: "Sberbnak",
      mention_type: "alias",
      raw_score:    0.75,
    });
  });

  it("matches multi-word names over token n-grams", async () => {
    const signal = (await run("Shares of Norilsk Nikel fell")).get(3);
    expect(signal?.mention_text).toBe("Norilsk Nikel");
    expect(signal?.raw_score).toBeCloseTo(13 / 14);
  });

  it("caps exact spans below 1.0", async () => {
    expect((await run("Газпром отчитался")).get(1)?.raw_score).toBe(0.99);
  });

  it("skips names shorter than four characters", async () => {
    expect((await run("МТС и МТЦ")).has(4)).toBe(false);
  });

  it("honours the configured floor", async () => {
    const strict = { ...DEFAULT_CONFIG, fuzzyFloor: 0.9 };
    expect((await fuzzyGenerator.generate("Акционеры Газпрома", dictionary, strict)).has(1)).toBe(false);
  });

  it("uses precomputed tokens when given", async () => {
    const text = "Газпрома";
    const out  = await fuzzyGenerator.generate(text, dictionary, DEFAULT_CONFIG, { tokens: tokenize(text) });
    expect(out.get(1)?.raw_score).toBe(0.875);
  });

  it("returns an empty map for empty text", async () => {
    expect((await run("")).size).toBe(0);
  });
});
