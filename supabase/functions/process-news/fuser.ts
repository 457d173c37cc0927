// Signal fusion and confirmation.
// One FusedResult per ticker; scores are clamped to [0, 1].

import type { FusionMode, PipelineConfig } from "../_shared/config.ts";
import type {
  CandidateSignal,
  FusedResult,
  GeneratorMethod,
  SignalMap,
} from "../_shared/types.ts";

export interface FuseOptions {
  weights: Record<GeneratorMethod, number>;
  mode:    FusionMode;
}

// Representative evidence on equal weighted score: earlier wins
const PRECEDENCE: readonly GeneratorMethod[] = ["substring", "ner", "fuzzy", "semantic"];

const rank = (method: GeneratorMethod): number => PRECEDENCE.indexOf(method);

export function fuseOptions(config: PipelineConfig): FuseOptions {
  return { weights: config.weights, mode: config.fusionMode };
}

/**
 * Merges per-method signals into one result per ticker.
 * `max`: best weighted contribution. `additive`: sum of the best weighted
 * contribution of each distinct method, capped at 1.
 */
export function fuse(signalsByMethod: readonly SignalMap[], options: FuseOptions): Map<number, FusedResult> {
  const grouped = new Map<number, CandidateSignal[]>();
  for (const signals of signalsByMethod) {
    for (const signal of signals.values()) {
      const list = grouped.get(signal.ticker_id);
      if (list) list.push(signal);
      else grouped.set(signal.ticker_id, [signal]);
    }
  }

  const fused = new Map<number, FusedResult>();
  for (const [tickerId, signals] of grouped) {
    fused.set(tickerId, fuseTicker(tickerId, signals, options));
  }
  return fused;
}

function fuseTicker(tickerId: number, signals: CandidateSignal[], options: FuseOptions): FusedResult {
  const contributions: Partial<Record<GeneratorMethod, number>> = {};
  let best:       CandidateSignal = signals[0];
  let bestScore = weighted(best, options);

  for (const signal of signals) {
    const score = weighted(signal, options);
    contributions[signal.method] = Math.max(contributions[signal.method] ?? 0, score);

    if (score > bestScore || (score === bestScore && rank(signal.method) < rank(best.method))) {
      best      = signal;
      bestScore = score;
    }
  }

  const methods = PRECEDENCE.filter(m => contributions[m] !== undefined);
  const total   = options.mode === "additive"
    ? methods.reduce((sum, m) => sum + (contributions[m] ?? 0), 0)
    : bestScore;

  return {
    ticker_id:     tickerId,
    fused_score:   clamp01(total),
    mention_text:  best.mention_text,
    mention_type:  best.mention_type,
    method:        best.method,
    methods,
    contributions,
  };
}

function weighted(signal: CandidateSignal, options: FuseOptions): number {
  return options.weights[signal.method] * clamp01(signal.raw_score);
}

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

/** Keeps entries at or above the threshold. */
export function confirm(fused: ReadonlyMap<number, FusedResult>, threshold: number): Map<number, FusedResult> {
  const confirmed = new Map<number, FusedResult>();
  for (const [tickerId, result] of fused) {
    if (result.fused_score >= threshold) confirmed.set(tickerId, result);
  }
  return confirmed;
}
