// Approximate matching of token n-grams against ticker names and aliases.
// Catches inflected and misspelled forms ("Газпрома", "Sberbnak") that exact matching misses.

import { distance } from "fastest-levenshtein";

import { normalizeName, tokenize, type Token } from "../../_shared/text.ts";
import type { MentionType, SignalMap, Ticker } from "../../_shared/types.ts";
import type { CandidateGenerator } from "./types.ts";

const MIN_PHRASE_LENGTH = 4;     // shorter names are too ambiguous to fuzz
const MAX_SCORE         = 0.99;  // exact spans are substring evidence, not fuzzy

interface Phrase {
  text:  string;   // normalized
  words: number;
  type:  MentionType;
}

/** 1 − edit distance / longer length, in [0, 1]. */
export function similarity(a: string, b: string): number {
  if (a === b) return 1;
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 0;
  return Math.max(0, 1 - distance(a, b) / maxLen);
}

function phrasesOf(ticker: Ticker): Phrase[] {
  const seen = new Set<string>();
  const out:  Phrase[] = [];
  const add = (raw: string, type: MentionType) => {
    const text = normalizeName(raw);
    if (text.length < MIN_PHRASE_LENGTH || seen.has(text)) return;
    seen.add(text);
    out.push({ text, words: text.split(" ").length, type });
  };
  add(ticker.name, "name");
  for (const alias of ticker.aliases) add(alias, "alias");
  return out;
}

interface Best {
  score: number;
  start: number;
  end:   number;
  type:  MentionType;
}

function bestGram(tokens: Token[], phrase: Phrase, floor: number): Best | null {
  let best: Best | null = null;

  for (let i = 0; i + phrase.words <= tokens.length; i++) {
    const last = tokens[i + phrase.words - 1];
    const gram = tokens.slice(i, i + phrase.words).map(t => t.text).join(" ");

    // Length gap alone already rules out reaching the floor
    const maxLen = Math.max(gram.length, phrase.text.length);
    if (Math.abs(gram.length - phrase.text.length) / maxLen > 1 - floor) continue;

    const score = similarity(gram, phrase.text);
    if (score >= floor && (!best || score > best.score)) {
      best = { score, start: tokens[i].start, end: last.end, type: phrase.type };
    }
  }

  return best;
}

export const fuzzyGenerator: CandidateGenerator<"fuzzy"> = {
  method: "fuzzy",

  generate(text, dictionary, config, context): SignalMap {
    const out:    SignalMap = new Map();
    const tokens = context?.tokens ?? tokenize(text);
    if (tokens.length === 0) return out;

    for (const ticker of dictionary.tickers) {
      let best: Best | null = null;
      for (const phrase of phrasesOf(ticker)) {
        const hit = bestGram(tokens, phrase, config.fuzzyFloor);
        if (hit && (!best || hit.score > best.score)) best = hit;
      }
      if (!best) continue;

      out.set(ticker.id, {
        ticker_id:    ticker.id,
        mention_text: text.slice(best.start, best.end),
        mention_type: best.type,
        method:       "fuzzy",
        raw_score:    Math.min(best.score, MAX_SCORE),
      });
    }

    return out;
  },
};
