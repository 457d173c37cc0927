// Cosine similarity between article windows and ticker descriptions in an
// externally supplied embedding space.

import type { EmbeddingProvider } from "../../_shared/capabilities.ts";
import type { SignalMap, Ticker } from "../../_shared/types.ts";
import type { CandidateGenerator, TickerDictionary } from "./types.ts";

export function tickerDescription(ticker: Ticker): string {
  return [ticker.symbol, ticker.name, ...ticker.aliases, ticker.description ?? ""]
    .map(s => s.trim())
    .filter(Boolean)
    .join(" ");
}

export function cosine(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0, na = 0, nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na  += a[i] * a[i];
    nb  += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/** Splits text into at most `max` windows of ≤ `size` chars, cutting at whitespace. */
export function textWindows(text: string, size: number, max: number): string[] {
  const words   = text.split(/\s+/).filter(Boolean);
  const windows: string[] = [];
  let current = "";

  for (const word of words) {
    if (current && current.length + 1 + word.length > size) {
      windows.push(current);
      if (windows.length >= max) return windows;
      current = "";
    }
    current = current ? `${current} ${word}` : word.slice(0, size);
  }
  if (current) windows.push(current);
  return windows;
}

export type SemanticGenerator = CandidateGenerator<"semantic"> & {
  /** Ticker vectors for a dictionary snapshot, embedded once and memoised. */
  tickerVectors(dictionary: TickerDictionary): Promise<Map<number, number[]>>;
};

export function createSemanticGenerator(provider: EmbeddingProvider): SemanticGenerator {
  const memo = new WeakMap<TickerDictionary, Promise<Map<number, number[]>>>();

  async function embedTickers(dictionary: TickerDictionary): Promise<Map<number, number[]>> {
    const vectors = new Map<number, number[]>();
    const missing: Ticker[] = [];

    for (const t of dictionary.tickers) {
      if (t.embedding && t.embedding.length > 0) vectors.set(t.id, t.embedding);
      else missing.push(t);
    }
    if (missing.length > 0) {
      const embedded = await provider.embed(missing.map(tickerDescription));
      missing.forEach((t, i) => {
        const v = embedded[i];
        if (v) vectors.set(t.id, v);
      });
    }
    return vectors;
  }

  const tickerVectors = (dictionary: TickerDictionary): Promise<Map<number, number[]>> => {
    let pending = memo.get(dictionary);
    if (!pending) {
      pending = embedTickers(dictionary);
      memo.set(dictionary, pending);
      // Rejected batches leave the memo; the next article retries
      void pending.catch(() => memo.delete(dictionary));
    }
    return pending;
  };

  return {
    method: "semantic",
    tickerVectors,

    async generate(text, dictionary, config): Promise<SignalMap> {
      const out: SignalMap = new Map();
      const windows = textWindows(text, config.semanticWindowChars, config.semanticMaxWindows);
      if (windows.length === 0 || dictionary.tickers.length === 0) return out;

      const [tickerVecs, windowVecs] = await Promise.all([
        tickerVectors(dictionary),
        provider.embed(windows),
      ]);

      for (const ticker of dictionary.tickers) {
        const tv = tickerVecs.get(ticker.id);
        if (!tv) continue;

        let best = 0;
        for (const wv of windowVecs) best = Math.max(best, cosine(wv, tv));
        if (best < config.semanticFloor) continue;

        out.set(ticker.id, {
          ticker_id:    ticker.id,
          mention_text: ticker.name,
          mention_type: "name",
          method:       "semantic",
          raw_score:    Math.min(best, 1),
        });
      }
      return out;
    },
  };
}
