// Exact whole-word matching of symbols, names and aliases.
// Symbol hits are the highest-precision evidence (1.0); name/alias hits score 0.8.

import { wordPattern } from "../../_shared/text.ts";
import type { CandidateSignal, MentionType, SignalMap } from "../../_shared/types.ts";
import type { CandidateGenerator } from "./types.ts";

const SYMBOL_SCORE = 1.0;
const NAME_SCORE   = 0.8;

function findSpan(text: string, phrase: string): string | null {
  if (!phrase.trim()) return null;
  const m = wordPattern(phrase).exec(text);
  return m ? m[0] : null;
}

export const substringGenerator: CandidateGenerator<"substring"> = {
  method: "substring",

  generate(text, dictionary): SignalMap {
    const out: SignalMap = new Map();

    for (const ticker of dictionary.tickers) {
      const symbolSpan = findSpan(text, ticker.symbol);
      if (symbolSpan) {
        out.set(ticker.id, signal(ticker.id, symbolSpan, "symbol", SYMBOL_SCORE));
        continue;
      }

      // Name first, then aliases longest-first (most specific)
      const phrases: Array<[string, MentionType]> = [
        [ticker.name, "name"],
        ...[...ticker.aliases]
          .sort((a, b) => b.length - a.length)
          .map((a): [string, MentionType] => [a, "alias"]),
      ];
      for (const [phrase, type] of phrases) {
        const span = findSpan(text, phrase);
        if (span) {
          out.set(ticker.id, signal(ticker.id, span, type, NAME_SCORE));
          break;
        }
      }
    }

    return out;
  },
};

function signal(tickerId: number, span: string, type: MentionType, score: number): CandidateSignal {
  return {
    ticker_id:    tickerId,
    mention_text: span,
    mention_type: type,
    method:       "substring",
    raw_score:    score,
  };
}
