import { describe, expect, it } from "vitest";

import { DEFAULT_CONFIG } from "../../_shared/config.ts";
import type { Ticker } from "../../_shared/types.ts";
import { substringGenerator } from "./substring.ts";
import { buildDictionary } from "./types.ts";

const TICKERS: Ticker[] = [
  { id: 1, symbol: "GAZP", name: "Газпром",  aliases: ["Gazprom"] },
  { id: 2, symbol: "SBER", name: "Сбербанк", aliases: ["Sberbank", "Сбер"] },
];
const dictionary = buildDictionary(TICKERS);

const run = async (text: string) => substringGenerator.generate(text, dictionary, DEFAULT_CONFIG);

describe("substringGenerator", () => {
  it("scores an exact symbol at 1.0", async () => {
    expect(await run("Акции GAZP выросли на 3%")).toEqual(new Map([
      [1, { ticker_id: 1, mention_text: "GAZP", mention_type: "symbol", method: "substring", raw_score: 1.0 }],
    ]));
  });

  it("scores a name at 0.8 and keeps the matched span", async () => {
    const signal = (await run("СБЕРБАНК повысил ставки")).get(2);
    expect(signal).toEqual({
      ticker_id: 2, mention_text: "СБЕРБАНК", mention_type: "name", method: "substring", raw_score: 0.8,
    });
  });

  it("falls back to aliases, longest first", async () => {
    expect((await run("Sberbank raised rates")).get(2)?.mention_text).toBe("Sberbank");
    expect((await run("Сбер запустил сервис")).get(2)).toMatchObject({ mention_text: "Сбер", mention_type: "alias" });
  });

  it("prefers the symbol over a name in the same text", async () => {
    expect((await run("Газпром (GAZP) отчитался")).get(1)?.mention_type).toBe("symbol");
  });

  it("ignores matches inside longer words", async () => {
    expect((await run("GAZPROMBANK and Сбербанкомат")).size).toBe(0);
  });

  it("returns an empty map for text without known tickers", async () => {
    expect((await run("Рынок закрылся без изменений")).size).toBe(0);
  });
});
