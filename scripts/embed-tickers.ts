// scripts/embed-tickers.ts
// Precomputes tickers.embedding for the semantic generator.
// Run: npx tsx scripts/embed-tickers.ts [--all]
//
// Without --all only tickers with no stored vector are embedded.

import { errorMessage } from "../supabase/functions/_shared/errors.ts";
import { createGeminiEmbeddings } from "../supabase/functions/_shared/gemini.ts";
import { createLogger } from "../supabase/functions/_shared/logger.ts";
import { createServiceClient } from "../supabase/functions/_shared/supabase-client.ts";
import { SupabaseNewsStore } from "../supabase/functions/_shared/supabase-store.ts";
import { tickerDescription } from "../supabase/functions/process-news/generators/semantic.ts";
import { loadEnv } from "./lib/env.ts";

const log = createLogger("embed-tickers");

async function main(): Promise<void> {
  const env      = loadEnv();
  const all      = process.argv.includes("--all");
  const provider = createGeminiEmbeddings(env.GOOGLE_AI_KEY, env.GEMINI_EMBEDDING_MODEL || undefined, env);

  const store   = new SupabaseNewsStore(() => createServiceClient(env));
  const session = await store.connect();
  try {
    const tickers = (await session.loadTickers())
      .filter(t => all || !t.embedding || t.embedding.length === 0);
    if (tickers.length === 0) {
      log.info("all tickers already embedded");
      return;
    }

    log.info(`embedding ${tickers.length} tickers with ${provider.model}`);
    const vectors = await provider.embed(tickers.map(tickerDescription));

    let stored = 0;
    for (let i = 0; i < tickers.length; i++) {
      await session.storeTickerEmbedding(tickers[i].id, vectors[i]);
      stored++;
    }
    log.info(`stored ${stored} embeddings`);
  } finally {
    await session.release();
  }
}

main().catch(err => {
  log.error("fatal", errorMessage(err));
  process.exit(1);
});
