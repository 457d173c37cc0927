// scripts/daily-summary.ts
// Writes daily_summary_<date>.json for one day of confirmed mentions.
// Run: npx tsx scripts/daily-summary.ts [YYYY-MM-DD] [outDir] [--limit N]
//
// Date defaults to today in the configured summary zone
// (NEWS_PIPELINE_SUMMARY_UTC_OFFSET_MINUTES); outDir defaults to ./reports.

import { resolve } from "node:path";

import {
  generateSummary,
  localDate,
  writeSummaryToFile,
} from "../supabase/functions/aggregate-mentions/index.ts";
import { loadPipelineConfig } from "../supabase/functions/_shared/config.ts";
import { errorMessage } from "../supabase/functions/_shared/errors.ts";
import { createLogger } from "../supabase/functions/_shared/logger.ts";
import { createServiceClient } from "../supabase/functions/_shared/supabase-client.ts";
import { SupabaseNewsStore } from "../supabase/functions/_shared/supabase-store.ts";
import { loadEnv, ROOT } from "./lib/env.ts";

const log = createLogger("daily-summary");

async function main(): Promise<void> {
  const env    = loadEnv();
  const config = loadPipelineConfig(env);
  const offset = config.summaryUtcOffsetMinutes;

  const positional: string[] = [];
  let limit: number | undefined;
  const argv = process.argv.slice(2);
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === "--limit") limit = Number(argv[++i]);
    else positional.push(argv[i]);
  }

  const date   = positional[0] ?? localDate(new Date(), offset);
  const outDir = resolve(positional[1] ?? resolve(ROOT, "reports"));

  const store   = new SupabaseNewsStore(() => createServiceClient(env));
  const session = await store.connect();
  try {
    const summary = await generateSummary(session, date, { limit, utcOffsetMinutes: offset, logger: log });
    const path    = await writeSummaryToFile(summary, outDir);
    log.info(`${summary.top_mentions.length} tickers, ${summary.clusters.length} clusters → ${path}`);
  } finally {
    await session.release();
  }
}

main().catch(err => {
  log.error("fatal", errorMessage(err));
  process.exit(1);
});
