// Repository contract of the pipeline. The orchestrator opens one session per
// run, passes it explicitly to every call and releases it on every exit path.

import type {
  ArticleRecord,
  MentionFact,
  MentionRecord,
  ProcessingRun,
  Ticker,
} from "./types.ts";

export interface InsertArticleResult {
  article_id: number;
  was_new:    boolean;
}

export interface NewsSession {
  /** Atomic on `hash`: a colliding insert is a no-op returning the stored id. */
  insertArticleIfNew(article: ArticleRecord): Promise<InsertArticleResult>;
  /** No-op when the (article_id, ticker_id) pair already exists. */
  insertMention(mention: MentionRecord): Promise<void>;
  recordRun(run: ProcessingRun): Promise<void>;
  /** Confirmed mentions whose article was published in [startIso, endIso). */
  mentionsForDate(startIso: string, endIso: string): Promise<MentionFact[]>;
  loadTickers(): Promise<Ticker[]>;
  storeTickerEmbedding(tickerId: number, vector: number[]): Promise<void>;
  /** Returns false when a fresh lock is held by another run. */
  acquireRunLock(staleAfterSeconds: number): Promise<boolean>;
  releaseRunLock(): Promise<void>;
  release(): Promise<void>;
}

export interface NewsStore {
  /** Throws PersistenceFailure when the backend cannot be reached. */
  connect(): Promise<NewsSession>;
}
