// Supabase-backed NewsStore.
//
// Dedup relies on the UNIQUE (hash) constraint: upsert with
// ON CONFLICT (hash) DO NOTHING, then read back the id of the existing row.
// Mentions use the same strategy on UNIQUE (article_id, ticker_id).

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";

import { PersistenceFailure } from "./errors.ts";
import { createLogger } from "./logger.ts";
import type { InsertArticleResult, NewsSession, NewsStore } from "./news-store.ts";
import type { ArticleRecord, MentionFact, MentionRecord, ProcessingRun, Ticker } from "./types.ts";

const log = createLogger("supabase-store");

const PAGE_SIZE = 1000;  // PostgREST default max-rows
const LOCK_ID   = 1;

// ─── Row schemas ──────────────────────────────────────────────────────────────

const IdRows = z.array(z.object({ id: z.number() }));

const TickerRows = z.array(z.object({
  id:          z.number(),
  symbol:      z.string(),
  name:        z.string(),
  aliases:     z.array(z.string()).nullable().transform(a => a ?? []),
  description: z.string().nullable().optional(),
  embedding:   z.array(z.number()).nullable().optional(),
}));

const JoinedArticle = z.object({
  source_id:    z.number(),
  published_at: z.string(),
});

const MentionRows = z.array(z.object({
  article_id: z.number(),
  ticker_id:  z.number(),
  // many-to-one embeds come back as an object; older PostgREST returns a 1-element array
  articles:   z.preprocess(v => (Array.isArray(v) ? v[0] : v), JoinedArticle),
}));

interface PostgrestErrorLike { message: string; code?: string }

function fail(op: string, error: PostgrestErrorLike): PersistenceFailure {
  const code = error.code ? ` (${error.code})` : "";
  return new PersistenceFailure(`${op}: ${error.message}${code}`);
}

function parseRows<S extends z.ZodTypeAny>(op: string, schema: S, data: unknown): z.output<S> {
  const res = schema.safeParse(data ?? []);
  if (!res.success) {
    throw new PersistenceFailure(`${op}: unexpected row shape: ${res.error.issues[0]?.message ?? "invalid"}`);
  }
  return res.data;
}

// ─── Session ──────────────────────────────────────────────────────────────────

class SupabaseNewsSession implements NewsSession {
  constructor(private readonly supabase: SupabaseClient) {}

  async insertArticleIfNew(article: ArticleRecord): Promise<InsertArticleResult> {
    const { data, error } = await this.supabase
      .from("articles")
      .upsert(article, { onConflict: "hash", ignoreDuplicates: true })
      .select("id");
    if (error) throw fail("insert article", error);

    const inserted = parseRows("insert article", IdRows, data);
    if (inserted.length > 0) return { article_id: inserted[0].id, was_new: true };

    const { data: existing, error: lookupErr } = await this.supabase
      .from("articles")
      .select("id")
      .eq("hash", article.hash)
      .limit(1);
    if (lookupErr) throw fail("lookup article", lookupErr);

    const rows = parseRows("lookup article", IdRows, existing);
    if (rows.length === 0) {
      throw new PersistenceFailure(`insert article: hash ${article.hash} neither inserted nor found`);
    }
    return { article_id: rows[0].id, was_new: false };
  }

  async insertMention(mention: MentionRecord): Promise<void> {
    const { error } = await this.supabase
      .from("article_ticker")
      .upsert(mention, { onConflict: "article_id,ticker_id", ignoreDuplicates: true });
    if (error) throw fail("insert mention", error);
  }

  async recordRun(run: ProcessingRun): Promise<void> {
    const { error } = await this.supabase.from("processing_runs").insert(run);
    if (error) throw fail("record run", error);
  }

  async mentionsForDate(startIso: string, endIso: string): Promise<MentionFact[]> {
    const facts: MentionFact[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.supabase
        .from("article_ticker")
        .select("article_id, ticker_id, articles!inner(source_id, published_at)")
        .eq("confirmed", true)
        .gte("articles.published_at", startIso)
        .lt("articles.published_at", endIso)
        .order("id", { ascending: true })
        .range(from, from + PAGE_SIZE - 1);
      if (error) throw fail("mentions for date", error);

      const rows = parseRows("mentions for date", MentionRows, data);
      for (const r of rows) {
        facts.push({
          article_id:   r.article_id,
          ticker_id:    r.ticker_id,
          source_id:    r.articles.source_id,
          published_at: r.articles.published_at,
        });
      }
      if (rows.length < PAGE_SIZE) break;
    }

    return facts;
  }

  async loadTickers(): Promise<Ticker[]> {
    const { data, error } = await this.supabase
      .from("tickers")
      .select("id, symbol, name, aliases, description, embedding")
      .order("id", { ascending: true });
    if (error) throw fail("load tickers", error);
    return parseRows("load tickers", TickerRows, data);
  }

  async storeTickerEmbedding(tickerId: number, vector: number[]): Promise<void> {
    const { error } = await this.supabase
      .from("tickers")
      .update({ embedding: vector })
      .eq("id", tickerId);
    if (error) throw fail(`store embedding ${tickerId}`, error);
  }

  async acquireRunLock(staleAfterSeconds: number): Promise<boolean> {
    const now         = new Date();
    const staleBefore = new Date(now.getTime() - staleAfterSeconds * 1000).toISOString();

    // Single conditional UPDATE: takes the lock only if free or stale
    const { data, error } = await this.supabase
      .from("pipeline_lock")
      .update({ locked: true, locked_at: now.toISOString(), pid: process.pid })
      .eq("id", LOCK_ID)
      .or(`locked.eq.false,locked_at.is.null,locked_at.lt.${staleBefore}`)
      .select("id");
    if (error) throw fail("acquire lock", error);

    return parseRows("acquire lock", IdRows, data).length > 0;
  }

  async releaseRunLock(): Promise<void> {
    const { error } = await this.supabase
      .from("pipeline_lock")
      .update({ locked: false, locked_at: null, pid: null })
      .eq("id", LOCK_ID);
    if (error) throw fail("release lock", error);
  }

  async release(): Promise<void> {
    await this.supabase.removeAllChannels();
  }
}

// ─── Store ────────────────────────────────────────────────────────────────────

export class SupabaseNewsStore implements NewsStore {
  constructor(private readonly clientFactory: () => SupabaseClient) {}

  async connect(): Promise<NewsSession> {
    const supabase = this.clientFactory();

    const { error } = await supabase.from("sources").select("id").limit(1);
    if (error) {
      log.error("connection check failed", error.message);
      throw fail("connect", error);
    }
    return new SupabaseNewsSession(supabase);
  }
}
