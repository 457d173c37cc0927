// Bounded async worker pool and timeout helper.

export interface PoolOptions {
  concurrency: number;
  /** Checked before each item is started; once true no new items start. */
  shouldStop?: () => boolean;
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight.
 * `onSettled` is invoked from the coordinating loop for each finished item
 * (in completion order), so callers can tally without sharing state with workers.
 * Items never started are returned as `skipped`.
 */
export async function runPool<T, R>(
  items:     readonly T[],
  worker:    (item: T, index: number) => Promise<R>,
  onSettled: (result: PromiseSettledResult<R>, item: T, index: number) => void,
  options:   PoolOptions,
): Promise<{ started: number; skipped: number }> {
  let next    = 0;
  let started = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      if (options.shouldStop?.()) return;
      const index = next++;
      const item  = items[index];
      started++;
      let result: PromiseSettledResult<R>;
      try {
        result = { status: "fulfilled", value: await worker(item, index) };
      } catch (reason) {
        result = { status: "rejected", reason };
      }
      onSettled(result, item, index);
    }
  };

  const lanes = Math.max(1, Math.min(options.concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, lane));

  return { started, skipped: items.length - started };
}

export class TimeoutError extends Error {
  constructor(readonly ms: number) {
    super(`timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

export class AbortedError extends Error {
  constructor() {
    super("aborted");
    this.name = "AbortedError";
  }
}

/**
 * Rejects with TimeoutError when `work` does not settle within `ms`,
 * or with AbortedError as soon as `signal` fires.
 */
export async function withTimeout<T>(work: Promise<T>, ms: number, signal?: AbortSignal): Promise<T> {
  if (signal?.aborted) throw new AbortedError();

  let fail: (err: Error) => void = () => {};
  const timeout = new Promise<never>((_, reject) => { fail = reject; });
  const timer   = setTimeout(() => fail(new TimeoutError(ms)), ms);
  const onAbort = () => fail(new AbortedError());
  signal?.addEventListener("abort", onAbort, { once: true });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}
