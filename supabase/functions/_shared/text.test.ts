import { describe, expect, it } from "vitest";

import { articleText, normalizeName, tokenize, wordPattern } from "./text.ts";

describe("wordPattern", () => {
  it("matches a symbol as a whole word", () => {
    expect(wordPattern("GAZP").exec("Акции GAZP выросли")?.[0]).toBe("GAZP");
  });

  it("does not match inside a longer Latin word", () => {
    expect(wordPattern("GAZP").test("GAZPROM shares")).toBe(false);
  });

  it("does not match inside a longer Cyrillic word", () => {
    expect(wordPattern("Газпром").test("Газпромнефть нарастила добычу")).toBe(false);
  });

  it("is case-insensitive for Cyrillic", () => {
    expect(wordPattern("газпром").exec("ГАЗПРОМ объявил")?.[0]).toBe("ГАЗПРОМ");
  });

  it("lets inner whitespace stretch", () => {
    expect(wordPattern("Norilsk Nickel").exec("Norilsk   Nickel fell")?.[0]).toBe("Norilsk   Nickel");
  });

  it("escapes regex metacharacters", () => {
    expect(wordPattern("X5 (Retail)").test("X5 (Retail) results")).toBe(true);
  });
});

describe("tokenize", () => {
  it("lowercases tokens and keeps offsets into the original text", () => {
    expect(tokenize("Hello, Мир 42")).toEqual([
      { text: "hello", start: 0,  end: 5 },
      { text: "мир",   start: 7,  end: 10 },
      { text: "42",    start: 11, end: 13 },
    ]);
  });
});

describe("normalizeName", () => {
  it("drops punctuation and collapses whitespace", () => {
    expect(normalizeName("  Norilsk-Nickel,  PJSC ")).toBe("norilsk nickel pjsc");
  });
});

describe("articleText", () => {
  it("joins title and body", () => {
    expect(articleText("Title", "Body")).toBe("Title\nBody");
  });

  it("is just the title for an empty body", () => {
    expect(articleText("Title", "")).toBe("Title");
  });
});
