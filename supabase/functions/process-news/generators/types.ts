import type { PipelineConfig } from "../../_shared/config.ts";
import type { Token } from "../../_shared/text.ts";
import type { GeneratorMethod, SignalMap, Ticker } from "../../_shared/types.ts";

/** Read-only ticker snapshot shared by every generator in a run. */
export interface TickerDictionary {
  readonly tickers: readonly Ticker[];
  readonly byId:    ReadonlyMap<number, Ticker>;
}

/** Optional precomputed input. Generators must work without it. */
export interface GeneratorContext {
  tokens?: Token[];
  /** Operator cancellation. */
  signal?: AbortSignal;
}

export interface CandidateGenerator<M extends GeneratorMethod = GeneratorMethod> {
  readonly method: M;
  generate(
    text:       string,
    dictionary: TickerDictionary,
    config:     PipelineConfig,
    context?:   GeneratorContext,
  ): SignalMap | Promise<SignalMap>;
}

export function buildDictionary(tickers: readonly Ticker[]): TickerDictionary {
  return {
    tickers,
    byId: new Map(tickers.map(t => [t.id, t])),
  };
}
