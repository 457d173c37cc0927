// Error taxonomy of the news pipeline.
// Duplicates and empty fusion input are normal outcomes and have no class here.

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** One detector failed or timed out. Recovered locally as an empty signal set. */
export class GeneratorFailure extends PipelineError {
  constructor(
    readonly method: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${method}: ${message}`, options);
  }
}

/** Repository unreachable or a constraint other than hash uniqueness failed. Fatal to the run. */
export class PersistenceFailure extends PipelineError {}

/** Invalid threshold, weight or limit. Raised before any article is processed. */
export class ConfigurationError extends PipelineError {}

/** Another run holds the pipeline lock. */
export class RunLockedError extends PipelineError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
