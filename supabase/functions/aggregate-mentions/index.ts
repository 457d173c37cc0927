// supabase/functions/aggregate-mentions/index.ts
// Daily summary of confirmed mentions: top tickers by mention count and
// per-ticker source clusters. Pure read; re-running a day yields the same lists.
//
// Invoked by scripts/daily-summary.ts.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { ConfigurationError } from "../_shared/errors.ts";
import { createLogger, type Logger } from "../_shared/logger.ts";
import type { NewsSession } from "../_shared/news-store.ts";

// ─── Types ────────────────────────────────────────────────────────────────────

export interface TopMention {
  ticker: number;
  count:  number;
}

export interface SourceCluster {
  ticker:        number;
  sources_count: number;
}

export interface DailySummary {
  date:         string;   // YYYY-MM-DD
  generated_at: string;
  top_mentions: TopMention[];
  clusters:     SourceCluster[];
}

export interface SummaryOptions {
  limit?:            number;
  utcOffsetMinutes?: number;
  now?:              () => Date;
  logger?:           Logger;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

const DAY_MS  = 24 * 3600 * 1000;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** [start, end) of a calendar day in a zone `offsetMinutes` east of UTC, as ISO instants. */
export function dayBounds(date: string, offsetMinutes = 0): { start: string; end: string } {
  const m = DATE_RE.exec(date);
  if (!m) throw new ConfigurationError(`invalid summary date "${date}", expected YYYY-MM-DD`);

  const midnightUtc = Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
  if (new Date(midnightUtc).toISOString().slice(0, 10) !== date) {
    throw new ConfigurationError(`invalid summary date "${date}"`);
  }

  const start = midnightUtc - offsetMinutes * 60_000;
  return {
    start: new Date(start).toISOString(),
    end:   new Date(start + DAY_MS).toISOString(),
  };
}

/** Calendar date of `at` in a zone `offsetMinutes` east of UTC. */
export function localDate(at: Date, offsetMinutes = 0): string {
  return new Date(at.getTime() + offsetMinutes * 60_000).toISOString().slice(0, 10);
}

// ─── Summary ──────────────────────────────────────────────────────────────────

export async function generateSummary(
  session: NewsSession,
  date:    string,
  options: SummaryOptions = {},
): Promise<DailySummary> {
  const log    = options.logger ?? createLogger("aggregate-mentions");
  const now    = options.now ?? (() => new Date());
  const limit  = options.limit;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new ConfigurationError(`invalid summary limit ${limit}`);
  }

  const { start, end } = dayBounds(date, options.utcOffsetMinutes ?? 0);
  const facts = await session.mentionsForDate(start, end);

  const counts  = new Map<number, number>();
  const sources = new Map<number, Set<number>>();
  for (const f of facts) {
    counts.set(f.ticker_id, (counts.get(f.ticker_id) ?? 0) + 1);
    const set = sources.get(f.ticker_id) ?? new Set<number>();
    set.add(f.source_id);
    sources.set(f.ticker_id, set);
  }

  const top_mentions = [...counts.entries()]
    .map(([ticker, count]) => ({ ticker, count }))
    .sort((a, b) => b.count - a.count || a.ticker - b.ticker);

  const clusters = [...sources.entries()]
    .map(([ticker, set]) => ({ ticker, sources_count: set.size }))
    .sort((a, b) => b.sources_count - a.sources_count || a.ticker - b.ticker);

  log.info(`${date}: ${facts.length} mentions, ${counts.size} tickers [${start}, ${end})`);

  return {
    date,
    generated_at: now().toISOString(),
    top_mentions: limit === undefined ? top_mentions : top_mentions.slice(0, limit),
    clusters,
  };
}

/** Writes `daily_summary_<date>.json` into `dir` and returns its path. */
export async function writeSummaryToFile(summary: DailySummary, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, `daily_summary_${summary.date}.json`);
  await writeFile(path, JSON.stringify(summary, null, 2) + "\n", "utf-8");
  return path;
}
