// Organisation-name extraction followed by resolution against the ticker dictionary.
//
// Built-in extraction is pattern based:
//   ПАО «Газпром», АО "Россети", PJSC Lukoil   (legal-form prefix)
//   Apple Inc, Orlen S.A., Polymetal PLC          (legal-form suffix)
//   «Норникель», "Magnit"                          (quoted names)
//   Bank Pekao, Norilsk Nickel                     (runs of capitalised words)
//   (GAZP), $SBER                                  (ticker-style tokens)
// An EntityExtractor (NLP service, LLM) can replace it.

import type { EntityExtractor, ExtractedEntity } from "../../_shared/capabilities.ts";
import { normalizeName } from "../../_shared/text.ts";
import type { MentionType, SignalMap, Ticker } from "../../_shared/types.ts";
import { similarity } from "./fuzzy.ts";
import type { CandidateGenerator } from "./types.ts";

const EXACT_SCORE       = 0.95;
const CONTAINS_SCORE    = 0.85;
const FUZZY_MIN_RATIO   = 0.8;
const FUZZY_BASE        = 0.5;
const MIN_CONTAINED_LEN = 4;

const LEGAL_PREFIX = "ПАО|ОАО|ЗАО|НАО|АО|ООО|PJSC|OJSC|JSC";
const LEGAL_SUFFIX = "Inc\\.?|Corp\\.?|Corporation|Ltd\\.?|Limited|PLC|Group|Holding|AG|SE|NV|S\\.A\\.|SA|LLC";
const WORD         = "\\p{Lu}[\\p{L}\\p{N}&'\\-]*";

const PATTERNS: RegExp[] = [
  new RegExp(`(?<![\\p{L}])(?:${LEGAL_PREFIX})\\s+[«"“]?([^»"”\\n,.;:()]{2,60}?)[»"”]?(?=[\\s,.;:()]|$)`, "gu"),
  new RegExp(`((?:${WORD}\\s+){0,3}${WORD})\\s+(?:${LEGAL_SUFFIX})(?![\\p{L}])`, "gu"),
  /[«“"]([^»”"\n]{2,60})[»”"]/gu,
  new RegExp(`(${WORD}(?:\\s+${WORD})+)`, "gu"),
  /\((\p{Lu}{2,6})\)/gu,
  /\$(\p{Lu}{1,6})(?![\p{L}])/gu,
];

const LEGAL_WORDS = new Set(
  ["пао", "оао", "зао", "нао", "ао", "ооо", "pjsc", "ojsc", "jsc", "inc", "corp", "corporation",
   "ltd", "limited", "plc", "llc", "ag", "se", "nv", "sa", "s", "a"],
);

/** Pattern-based ORG extraction. Returns unique spans in order of first appearance. */
export function extractOrganizations(text: string): ExtractedEntity[] {
  const seen = new Set<string>();
  const out:  ExtractedEntity[] = [];
  for (const re of PATTERNS) {
    for (const m of text.matchAll(re)) {
      const span = (m[1] ?? "").trim();
      if (span.length < 2 || seen.has(span)) continue;
      seen.add(span);
      out.push({ text: span, label: "ORG" });
    }
  }
  return out;
}

function stripLegalForms(normalized: string): string {
  return normalized
    .split(" ")
    .filter(w => !LEGAL_WORDS.has(w))
    .join(" ");
}

interface Resolution {
  score: number;
  type:  MentionType;
}

function resolve(entity: string, ticker: Ticker): Resolution | null {
  const e = stripLegalForms(normalizeName(entity));
  if (!e) return null;

  if (e === ticker.symbol.toLowerCase()) return { score: EXACT_SCORE, type: "symbol" };

  let best: Resolution | null = null;
  const consider = (raw: string, type: MentionType) => {
    const n = stripLegalForms(normalizeName(raw));
    if (!n) return;

    let score = 0;
    if (n === e) {
      score = EXACT_SCORE;
    } else {
      const [short, long] = n.length <= e.length ? [n, e] : [e, n];
      if (short.length >= MIN_CONTAINED_LEN && ` ${long} `.includes(` ${short} `)) {
        score = CONTAINS_SCORE;
      } else {
        const r = similarity(e, n);
        if (r >= FUZZY_MIN_RATIO) score = FUZZY_BASE + (r - FUZZY_MIN_RATIO);
      }
    }
    if (score > 0 && (!best || score > best.score)) best = { score, type };
  };

  consider(ticker.name, "name");
  for (const alias of ticker.aliases) consider(alias, "alias");
  return best;
}

export function createNerGenerator(extractor?: EntityExtractor): CandidateGenerator<"ner"> {
  return {
    method: "ner",

    async generate(text, dictionary, config): Promise<SignalMap> {
      const entities = extractor
        ? (await extractor.extract(text)).filter(e => e.label === "ORG" || e.label === "PRODUCT")
        : extractOrganizations(text);

      const out: SignalMap = new Map();
      for (const entity of entities) {
        for (const ticker of dictionary.tickers) {
          const res = resolve(entity.text, ticker);
          if (!res || res.score < config.nerFloor) continue;

          const prev = out.get(ticker.id);
          if (prev && prev.raw_score >= res.score) continue;
          out.set(ticker.id, {
            ticker_id:    ticker.id,
            mention_text: entity.text,
            mention_type: res.type,
            method:       "ner",
            raw_score:    res.score,
          });
        }
      }
      return out;
    },
  };
}

export const nerGenerator = createNerGenerator();
