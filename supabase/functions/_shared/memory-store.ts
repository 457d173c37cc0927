// In-process NewsStore: used by dry runs and tests.
// Each method body runs without an intermediate await, so check-and-insert is atomic.

import type { InsertArticleResult, NewsSession, NewsStore } from "./news-store.ts";
import type {
  ArticleRecord,
  MentionFact,
  MentionRecord,
  ProcessingRun,
  StoredArticle,
  Ticker,
} from "./types.ts";

export interface MemoryState {
  articles: StoredArticle[];
  mentions: MentionRecord[];
  runs:     ProcessingRun[];
  tickers:  Ticker[];
  lock:     { locked: boolean; locked_at: number | null };
}

export class MemoryNewsStore implements NewsStore {
  readonly state: MemoryState;
  openSessions = 0;

  constructor(seed: { tickers?: Ticker[]; articles?: StoredArticle[]; mentions?: MentionRecord[] } = {}) {
    this.state = {
      articles: [...(seed.articles ?? [])],
      mentions: [...(seed.mentions ?? [])],
      runs:     [],
      tickers:  (seed.tickers ?? []).map(t => ({ ...t, aliases: [...t.aliases] })),
      lock:     { locked: false, locked_at: null },
    };
  }

  async connect(): Promise<NewsSession> {
    this.openSessions++;
    return new MemoryNewsSession(this.state, () => { this.openSessions--; });
  }
}

class MemoryNewsSession implements NewsSession {
  private released = false;

  constructor(
    private readonly state: MemoryState,
    private readonly onRelease: () => void,
  ) {}

  async insertArticleIfNew(article: ArticleRecord): Promise<InsertArticleResult> {
    const existing = this.state.articles.find(a => a.hash === article.hash);
    if (existing) return { article_id: existing.id, was_new: false };

    const id = this.state.articles.reduce((max, a) => Math.max(max, a.id), 0) + 1;
    this.state.articles.push({ ...article, id });
    return { article_id: id, was_new: true };
  }

  async insertMention(mention: MentionRecord): Promise<void> {
    const dup = this.state.mentions.some(
      m => m.article_id === mention.article_id && m.ticker_id === mention.ticker_id,
    );
    if (!dup) this.state.mentions.push({ ...mention });
  }

  async recordRun(run: ProcessingRun): Promise<void> {
    this.state.runs.push({ ...run });
  }

  async mentionsForDate(startIso: string, endIso: string): Promise<MentionFact[]> {
    const start = Date.parse(startIso);
    const end   = Date.parse(endIso);
    const byId  = new Map(this.state.articles.map(a => [a.id, a]));

    const facts: MentionFact[] = [];
    for (const m of this.state.mentions) {
      if (!m.confirmed) continue;
      const article = byId.get(m.article_id);
      if (!article) continue;
      const ts = Date.parse(article.published_at);
      if (Number.isNaN(ts) || ts < start || ts >= end) continue;
      facts.push({
        article_id:   m.article_id,
        ticker_id:    m.ticker_id,
        source_id:    article.source_id,
        published_at: article.published_at,
      });
    }
    return facts;
  }

  async loadTickers(): Promise<Ticker[]> {
    return this.state.tickers.map(t => ({ ...t, aliases: [...t.aliases] }));
  }

  async storeTickerEmbedding(tickerId: number, vector: number[]): Promise<void> {
    const ticker = this.state.tickers.find(t => t.id === tickerId);
    if (ticker) ticker.embedding = [...vector];
  }

  async acquireRunLock(staleAfterSeconds: number): Promise<boolean> {
    const { lock } = this.state;
    const now      = Date.now();
    const stale    = lock.locked_at !== null && now - lock.locked_at >= staleAfterSeconds * 1000;
    if (lock.locked && !stale) return false;
    lock.locked    = true;
    lock.locked_at = now;
    return true;
  }

  async releaseRunLock(): Promise<void> {
    this.state.lock.locked    = false;
    this.state.lock.locked_at = null;
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    this.onRelease();
  }
}
