// supabase/functions/process-news/index.ts
// News → ticker mention pipeline.
//
// Per article: hash → insert-if-new → candidate generators (concurrently, each
// under a timeout) → weighted fusion → confirmation → mention rows.
// Articles run through a bounded pool; a duplicate hash short-circuits before
// any generator is invoked.
//
// Invoked by scripts/run-pipeline.ts (CLI / cron). No HTTP surface.

import type { EmbeddingProvider, EntityExtractor } from "../_shared/capabilities.ts";
import { validateConfig, type PipelineConfig } from "../_shared/config.ts";
import {
  errorMessage,
  PersistenceFailure,
  PipelineError,
  RunLockedError,
} from "../_shared/errors.ts";
import { articleHash } from "../_shared/hash.ts";
import { createLogger, type Logger } from "../_shared/logger.ts";
import type { NewsSession, NewsStore } from "../_shared/news-store.ts";
import { runPool } from "../_shared/pool.ts";
import { articleText, tokenize } from "../_shared/text.ts";
import type {
  FusedResult,
  ProcessingRun,
  RawArticle,
  RunStatus,
  Ticker,
} from "../_shared/types.ts";
import { ArticleLifecycle, type ArticleState } from "./article-state.ts";
import { confirm, fuse, fuseOptions } from "./fuser.ts";
import {
  buildDictionary,
  runGenerators,
  selectGenerators,
  type CandidateGenerator,
  type TickerDictionary,
} from "./generators/index.ts";

// ─── Types ────────────────────────────────────────────────────────────────────

export interface PipelineDeps {
  store:       NewsStore;
  embeddings?: EmbeddingProvider;
  entities?:   EntityExtractor;
  logger?:     Logger;
}

export interface PipelineInput {
  articles: readonly RawArticle[];
  /** Ticker snapshot for this run. Loaded from the store when absent. */
  tickers?: readonly Ticker[];
}

export interface ProgressEvent {
  processed: number;        // articles settled so far
  total:     number;        // articles in the batch
  index:     number;        // input position of the article just settled
  state:     ArticleState;
}

export interface PipelineOptions {
  config:      PipelineConfig;
  signal?:     AbortSignal;
  now?:        () => Date;
  onProgress?: (event: ProgressEvent) => void;
}

export interface ArticleOutcome {
  index:      number;
  hash:       string | null;
  article_id: number | null;
  was_new:    boolean;
  state:      ArticleState;
  candidates: number;         // fused tickers before confirmation
  mentions:   FusedResult[];  // confirmed and persisted
  error?:     string;
}

export interface RunReport extends ProcessingRun {
  skipped:     number;            // articles never started (cancel / fatal error)
  candidates:  number;
  duration_ms: number;
  error:       string | null;     // fatal error message, if any
  outcomes:    ArticleOutcome[];  // input order, started articles only
}

interface RunScope {
  session:    NewsSession;
  dictionary: TickerDictionary;
  generators: readonly CandidateGenerator[];
  config:     PipelineConfig;
  log:        Logger;
  signal?:    AbortSignal;
}

/** A stored article whose mention writes broke off still reports what it completed. */
interface ArticleResult {
  outcome: ArticleOutcome;
  fatal:   PersistenceFailure | null;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** Runs a repository call; anything it throws becomes a PersistenceFailure. */
async function persist<T>(op: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof PersistenceFailure) throw err;
    throw new PersistenceFailure(`${op}: ${errorMessage(err)}`, { cause: err });
  }
}

export function runStatus(fatal: boolean, cancelled: boolean, failedArticles: number): RunStatus {
  if (fatal) return "failed";
  if (cancelled || failedArticles > 0) return "partial";
  return "success";
}

// ─── Process a single article ─────────────────────────────────────────────────

async function processArticle(raw: RawArticle, index: number, scope: RunScope): Promise<ArticleResult> {
  const { session, dictionary, generators, config, log, signal } = scope;
  const lifecycle = new ArticleLifecycle();
  const outcome: ArticleOutcome = {
    index,
    hash:       null,
    article_id: null,
    was_new:    false,
    state:      lifecycle.state,
    candidates: 0,
    mentions:   [],
  };

  const fail = (err: unknown, fatal: PersistenceFailure | null = null): ArticleResult => {
    lifecycle.advance("FAILED");
    outcome.state = lifecycle.state;
    outcome.error = errorMessage(err);
    log.warn(`article #${index} failed: ${outcome.error}`);
    return { outcome, fatal };
  };

  // ── Step 1: hash ───────────────────────────────────────────────────────────
  let hash: string;
  try {
    hash = articleHash(raw.title, raw.url);
    if (Number.isNaN(Date.parse(raw.published_at))) {
      throw new Error(`invalid published_at "${raw.published_at}"`);
    }
  } catch (err) {
    return fail(err);
  }
  lifecycle.advance("HASHED");
  outcome.hash = hash;

  // ── Step 2: insert-if-new (atomic on hash) ─────────────────────────────────
  const body     = raw.body ?? raw.summary ?? "";
  const inserted = await persist("insertArticleIfNew", () => session.insertArticleIfNew({
    title:        raw.title,
    body,
    url:          raw.url,
    published_at: raw.published_at,
    source_id:    raw.source_id,
    hash,
  }));
  outcome.article_id = inserted.article_id;
  outcome.was_new    = inserted.was_new;

  if (!inserted.was_new) {
    lifecycle.advance("DUPLICATE");
    outcome.state = lifecycle.state;
    log.debug(`article ${inserted.article_id}: duplicate ${hash.slice(0, 12)}`);
    return { outcome, fatal: null };
  }
  lifecycle.advance("NEW");

  // ── Step 3: generate → fuse → confirm ──────────────────────────────────────
  let confirmed: Map<number, FusedResult>;
  try {
    lifecycle.advance("GENERATING");
    const text    = articleText(raw.title, body);
    const signals = await runGenerators(generators, text, dictionary, config, { tokens: tokenize(text), signal });

    lifecycle.advance("FUSING");
    const fused = fuse(signals, fuseOptions(config));
    outcome.candidates = fused.size;

    lifecycle.advance("CONFIRMING");
    confirmed = confirm(fused, config.threshold);
  } catch (err) {
    return fail(err);
  }

  // ── Step 4: persist mentions ───────────────────────────────────────────────
  // The article row exists from here on; a failed write returns what was written.
  try {
    for (const result of confirmed.values()) {
      await persist("insertMention", () => session.insertMention({
        article_id:   inserted.article_id,
        ticker_id:    result.ticker_id,
        mention_text: result.mention_text,
        mention_type: result.mention_type,
        fused_score:  result.fused_score,
        confirmed:    true,
      }));
      outcome.mentions.push(result);
    }
  } catch (err) {
    if (!(err instanceof PersistenceFailure)) throw err;
    return fail(err, err);
  }
  lifecycle.advance("PERSISTED");
  outcome.state = lifecycle.state;

  const confStr = outcome.mentions
    .map(m => `${dictionary.byId.get(m.ticker_id)?.symbol ?? m.ticker_id}:${m.fused_score.toFixed(2)}`)
    .join(",");
  log.info(`article ${inserted.article_id}: tickers=[${confStr || "none"}] ✓`);

  return { outcome, fatal: null };
}

// ─── Run ──────────────────────────────────────────────────────────────────────

/**
 * Processes one batch of fetched articles. Never throws for article-level or
 * persistence problems: those end up in the returned report (and in the
 * processing_runs row when the store is reachable). Throws ConfigurationError
 * for an invalid config before anything is touched.
 */
export async function runPipeline(
  deps:    PipelineDeps,
  input:   PipelineInput,
  options: PipelineOptions,
): Promise<RunReport> {
  const config = validateConfig(options.config);
  const log    = deps.logger ?? createLogger("process-news");
  const now    = options.now ?? (() => new Date());
  const signal = options.signal;

  const started   = now();
  const startedAt = started.toISOString();
  const total     = input.articles.length;
  const outcomes: ArticleOutcome[] = [];
  const notes:    string[]         = [];

  let newArticles    = 0;
  let duplicates     = 0;
  let failedArticles = 0;
  let mentions       = 0;
  let candidates     = 0;
  let processed      = 0;
  let skipped        = total;
  let fatal: PipelineError | null = null;

  let session: NewsSession | null = null;
  let locked = false;

  log.info(`run started: ${total} articles, concurrency=${config.concurrency}`);

  try {
    session = await persist("connect", () => deps.store.connect());
    const active = session;

    locked = await persist("acquireRunLock", () => active.acquireRunLock(config.lockStaleSeconds));
    if (!locked) throw new RunLockedError("another pipeline run holds the lock");

    const tickers = input.tickers ?? await persist("loadTickers", () => active.loadTickers());
    const scope: RunScope = {
      session:    active,
      dictionary: buildDictionary(tickers),
      generators: selectGenerators(config, deps, log),
      config,
      log,
      signal,
    };
    log.info(`${tickers.length} tickers, generators=[${scope.generators.map(g => g.method).join(",")}]`);

    const pool = await runPool(
      input.articles,
      (raw, index) => processArticle(raw, index, scope),
      (result, _raw, index) => {
        processed++;
        let state: ArticleState = "FAILED";

        if (result.status === "rejected") {
          const err = result.reason;
          if (err instanceof PersistenceFailure) {
            fatal ??= err;
          } else {
            failedArticles++;
            notes.push(`article #${index}: ${errorMessage(err)}`);
          }
        } else {
          const { outcome, fatal: failure } = result.value;
          if (failure) fatal ??= failure;
          outcomes.push(outcome);
          state = outcome.state;
          if (outcome.was_new) newArticles++;
          if (outcome.state === "DUPLICATE") duplicates++;
          if (outcome.state === "FAILED") {
            failedArticles++;
            notes.push(`article #${index}: ${outcome.error ?? "failed"}`);
          }
          candidates += outcome.candidates;
          mentions   += outcome.mentions.length;
        }

        try {
          options.onProgress?.({ processed, total, index, state });
        } catch (err) {
          log.warn(`progress callback failed: ${errorMessage(err)}`);
        }
      },
      {
        concurrency: config.concurrency,
        shouldStop:  () => fatal !== null || signal?.aborted === true,
      },
    );
    skipped = pool.skipped;
  } catch (err) {
    fatal = err instanceof PipelineError
      ? err
      : new PersistenceFailure(errorMessage(err), { cause: err });
  }

  const cancelled = signal?.aborted === true;
  if (cancelled) notes.push(`cancelled, ${skipped} articles not started`);
  if (fatal)     notes.unshift(`${fatal.name}: ${fatal.message}`);

  const finished = now();
  const run: ProcessingRun = {
    started_at:      startedAt,
    finished_at:     finished.toISOString(),
    new_articles:    newArticles,
    duplicates,
    failed_articles: failedArticles,
    mentions,
    status:          runStatus(fatal !== null, cancelled, failedArticles),
    log:             notes.length > 0 ? notes.join("\n") : null,
  };

  // ── Record run + release (every exit path) ─────────────────────────────────
  if (session) {
    try {
      await session.recordRun(run);
    } catch (err) {
      log.error(`recordRun failed: ${errorMessage(err)}`);
    }
    if (locked) {
      try {
        await session.releaseRunLock();
      } catch (err) {
        log.error(`releaseRunLock failed: ${errorMessage(err)}`);
      }
    }
    try {
      await session.release();
    } catch (err) {
      log.error(`session release failed: ${errorMessage(err)}`);
    }
  } else {
    log.error("store unreachable, run not recorded");
  }

  const durationMs = finished.getTime() - started.getTime();
  const summary    = `status=${run.status} new=${newArticles} dup=${duplicates} failed=${failedArticles} candidates=${candidates} mentions=${mentions} skipped=${skipped} ${durationMs}ms`;
  if (fatal) log.error(`run finished: ${summary}`, fatal.message);
  else       log.info(`run finished: ${summary}`);

  outcomes.sort((a, b) => a.index - b.index);
  return {
    ...run,
    skipped,
    candidates,
    duration_ms: durationMs,
    error:       fatal ? fatal.message : null,
    outcomes,
  };
}
