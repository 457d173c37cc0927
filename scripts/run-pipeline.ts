// scripts/run-pipeline.ts
// Runs the news → ticker pipeline over a JSON array of fetched articles.
// Run: npx tsx scripts/run-pipeline.ts <articles.json> [--dry-run] [--tickers <tickers.json>]
//
// --dry-run uses the in-memory store (no Supabase writes); tickers then come
// from --tickers. Exit code: 0 success, 2 partial, 1 failed.

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import type { EmbeddingProvider } from "../supabase/functions/_shared/capabilities.ts";
import { loadPipelineConfig } from "../supabase/functions/_shared/config.ts";
import { errorMessage } from "../supabase/functions/_shared/errors.ts";
import { createGeminiEmbeddings } from "../supabase/functions/_shared/gemini.ts";
import { createLogger } from "../supabase/functions/_shared/logger.ts";
import { MemoryNewsStore } from "../supabase/functions/_shared/memory-store.ts";
import type { NewsStore } from "../supabase/functions/_shared/news-store.ts";
import { createServiceClient } from "../supabase/functions/_shared/supabase-client.ts";
import { SupabaseNewsStore } from "../supabase/functions/_shared/supabase-store.ts";
import type { RunStatus } from "../supabase/functions/_shared/types.ts";
import { runPipeline } from "../supabase/functions/process-news/index.ts";
import { loadEnv, type Env } from "./lib/env.ts";

const log = createLogger("run-pipeline");

const PROGRESS_EVERY = 50;

// ── Input schemas ─────────────────────────────────────────────────────────────

export const RawArticleSchema = z.object({
  title:        z.string().min(1),
  url:          z.string().min(1),
  published_at: z.string().refine(s => !Number.isNaN(Date.parse(s)), "not a timestamp"),
  body:         z.string().nullish(),
  summary:      z.string().nullish(),
  source_id:    z.number().int(),
});

export const TickerSchema = z.object({
  id:          z.number().int(),
  symbol:      z.string().min(1),
  name:        z.string().min(1),
  aliases:     z.array(z.string()).default([]),
  description: z.string().nullish(),
  embedding:   z.array(z.number()).nullish(),
});

function readJsonArray<S extends z.ZodTypeAny>(path: string, schema: S): Array<z.output<S>> {
  const parsed = z.array(schema).safeParse(JSON.parse(readFileSync(path, "utf-8")));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`${path}: ${issue.path.join(".")} ${issue.message}`);
  }
  return parsed.data;
}

// ── Args ──────────────────────────────────────────────────────────────────────

export interface CliArgs {
  articlesPath: string;
  dryRun:       boolean;
  tickersPath:  string | null;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  let articlesPath: string | null = null;
  let tickersPath:  string | null = null;
  let dryRun = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--dry-run") dryRun = true;
    else if (arg === "--tickers") tickersPath = argv[++i] ?? null;
    else if (!arg.startsWith("--") && articlesPath === null) articlesPath = arg;
    else throw new Error(`unexpected argument: ${arg}`);
  }
  if (!articlesPath) throw new Error("usage: run-pipeline <articles.json> [--dry-run] [--tickers <tickers.json>]");
  return { articlesPath, dryRun, tickersPath };
}

export function exitCode(status: RunStatus): number {
  return status === "success" ? 0 : status === "partial" ? 2 : 1;
}

function embeddingsFromEnv(env: Env): EmbeddingProvider | undefined {
  if (!env.GOOGLE_AI_KEY) {
    log.warn("GOOGLE_AI_KEY not set, semantic generator disabled");
    return undefined;
  }
  return createGeminiEmbeddings(env.GOOGLE_AI_KEY, env.GEMINI_EMBEDDING_MODEL || undefined, env);
}

// ── Main ──────────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
  const env     = loadEnv();
  const args    = parseArgs(process.argv.slice(2));
  const config  = loadPipelineConfig(env);
  const tickers = args.tickersPath ? readJsonArray(args.tickersPath, TickerSchema) : undefined;

  const articles = readJsonArray(args.articlesPath, RawArticleSchema);
  const store: NewsStore = args.dryRun
    ? new MemoryNewsStore({ tickers })
    : new SupabaseNewsStore(() => createServiceClient(env));

  const controller = new AbortController();
  process.once("SIGINT", () => {
    log.warn("SIGINT, cancelling run");
    controller.abort();
  });

  const report = await runPipeline(
    { store, embeddings: embeddingsFromEnv(env), logger: log },
    { articles, tickers },
    {
      config,
      signal:     controller.signal,
      onProgress: ({ processed, total }) => {
        if (processed % PROGRESS_EVERY === 0 || processed === total) log.info(`progress ${processed}/${total}`);
      },
    },
  );

  console.log(JSON.stringify({
    status:          report.status,
    new_articles:    report.new_articles,
    duplicates:      report.duplicates,
    failed_articles: report.failed_articles,
    candidates:      report.candidates,
    mentions:        report.mentions,
    skipped:         report.skipped,
    duration_ms:     report.duration_ms,
    error:           report.error,
    dry_run:         args.dryRun,
  }, null, 2));

  return exitCode(report.status);
}

if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().then(
    code => process.exit(code),
    err  => {
      log.error("fatal", errorMessage(err));
      process.exit(1);
    },
  );
}
