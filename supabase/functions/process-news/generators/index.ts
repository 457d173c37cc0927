import type { EmbeddingProvider, EntityExtractor } from "../../_shared/capabilities.ts";
import { enabledMethods, type PipelineConfig } from "../../_shared/config.ts";
import { errorMessage, GeneratorFailure } from "../../_shared/errors.ts";
import { createLogger, type Logger } from "../../_shared/logger.ts";
import { AbortedError, TimeoutError, withTimeout } from "../../_shared/pool.ts";
import type { GeneratorMethod, SignalMap } from "../../_shared/types.ts";
import { fuzzyGenerator } from "./fuzzy.ts";
import { createNerGenerator, nerGenerator } from "./ner.ts";
import { createSemanticGenerator } from "./semantic.ts";
import { substringGenerator } from "./substring.ts";
import type { CandidateGenerator, GeneratorContext, TickerDictionary } from "./types.ts";

export { buildDictionary } from "./types.ts";
export type { CandidateGenerator, GeneratorContext, TickerDictionary } from "./types.ts";

export interface GeneratorCapabilities {
  embeddings?: EmbeddingProvider;
  entities?:   EntityExtractor;
}

/** One generator per method switched on in config. Semantic needs an embedding provider. */
export function selectGenerators(
  config: PipelineConfig,
  caps:   GeneratorCapabilities,
  log:    Logger,
): CandidateGenerator[] {
  const selected: CandidateGenerator[] = [];

  for (const method of enabledMethods(config)) {
    const gen = build(method, caps);
    if (gen) selected.push(gen);
    else log.warn(`generator ${method} enabled but no capability supplied, skipped`);
  }
  return selected;
}

function build(method: GeneratorMethod, caps: GeneratorCapabilities): CandidateGenerator | null {
  switch (method) {
    case "substring": return substringGenerator;
    case "fuzzy":     return fuzzyGenerator;
    case "ner":       return caps.entities ? createNerGenerator(caps.entities) : nerGenerator;
    case "semantic":  return caps.embeddings ? createSemanticGenerator(caps.embeddings) : null;
  }
}

/**
 * Runs every generator on the same text concurrently. A generator that throws
 * or exceeds the timeout contributes an empty map and a warning. Cancellation
 * through `context.signal` is not degraded: it rejects with AbortedError.
 */
export async function runGenerators(
  generators: readonly CandidateGenerator[],
  text:       string,
  dictionary: TickerDictionary,
  config:     PipelineConfig,
  context:    GeneratorContext,
): Promise<SignalMap[]> {
  return Promise.all(generators.map(async gen => {
    try {
      return await withTimeout(
        Promise.resolve().then(() => gen.generate(text, dictionary, config, context)),
        config.generatorTimeoutMs,
        context.signal,
      );
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      const reason  = err instanceof TimeoutError ? err.message : errorMessage(err);
      const failure = new GeneratorFailure(gen.method, reason, { cause: err });
      createLogger(`generator:${gen.method}`).warn(`degraded to empty result: ${failure.message}`);
      const empty: SignalMap = new Map();
      return empty;
    }
  }));
}
