// Row-shaped domain types. Field names follow the table columns.

// ─── Reference data ───────────────────────────────────────────────────────────

export interface Source {
  id:   number;
  name: string;
}

export interface Ticker {
  id:           number;
  symbol:       string;
  name:         string;
  aliases:      string[];
  description?: string | null;
  embedding?:   number[] | null;  // cached vector for the semantic generator
}

// ─── Articles ─────────────────────────────────────────────────────────────────

/** Article as handed over by the fetcher. */
export interface RawArticle {
  title:        string;
  url:          string;
  published_at: string;
  body?:        string | null;
  summary?:     string | null;
  source_id:    number;
}

export interface ArticleRecord {
  title:        string;
  body:         string;
  url:          string;
  published_at: string;
  source_id:    number;
  hash:         string;
}

export interface StoredArticle extends ArticleRecord {
  id: number;
}

// ─── Signals and mentions ─────────────────────────────────────────────────────

export type GeneratorMethod = "substring" | "fuzzy" | "ner" | "semantic";
export type MentionType     = "symbol" | "name" | "alias";

export const GENERATOR_METHODS: readonly GeneratorMethod[] = ["substring", "fuzzy", "ner", "semantic"];

export interface CandidateSignal {
  ticker_id:    number;
  mention_text: string;
  mention_type: MentionType;
  method:       GeneratorMethod;
  raw_score:    number;
}

export type SignalMap = Map<number, CandidateSignal>;

export interface FusedResult {
  ticker_id:     number;
  fused_score:   number;
  mention_text:  string;
  mention_type:  MentionType;
  method:        GeneratorMethod;                          // representative evidence
  methods:       GeneratorMethod[];                        // every contributing method
  contributions: Partial<Record<GeneratorMethod, number>>; // weighted score per method
}

export interface MentionRecord {
  article_id:   number;
  ticker_id:    number;
  mention_text: string;
  mention_type: MentionType;
  fused_score:  number;
  confirmed:    boolean;
}

// ─── Runs ─────────────────────────────────────────────────────────────────────

export type RunStatus = "success" | "failed" | "partial";

export interface ProcessingRun {
  started_at:      string;
  finished_at:     string;
  new_articles:    number;
  duplicates:      number;
  failed_articles: number;
  mentions:        number;
  status:          RunStatus;
  log:             string | null;
}

/** Confirmed mention joined to its article, as read by the summary. */
export interface MentionFact {
  article_id:   number;
  ticker_id:    number;
  source_id:    number;
  published_at: string;
}
