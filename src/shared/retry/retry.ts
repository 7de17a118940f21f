export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type BackoffOptions = {
  minDelayMs: number;       // delay before the first retry
  maxDelayMs: number;       // cap applied before jitter
  randomFn?: () => number;
  jitterRatio?: number;
};

export type RetryOptions = BackoffOptions & {
  retries: number;          // max attempts after initial try (e.g. 5 means up to 6 total tries)
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  signal?: AbortSignal;
};

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

/**
 * Exponential backoff: `minDelayMs * 2^attempt`, capped at `maxDelayMs`, plus up to
 * `jitterRatio` of that value as random jitter. `attempt` is zero-based.
 */
export const computeBackoffDelay = (attempt: number, opts: BackoffOptions): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0 } = opts;
  const backoff = Math.min(maxDelayMs, minDelayMs * Math.pow(2, Math.max(0, attempt)));
  const jitter = Math.floor(backoff * clamp01(jitterRatio) * clamp01(randomFn()));
  return backoff + jitter;
};

export const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    minDelayMs,
    maxDelayMs,
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2,
    signal
  } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry || signal?.aborted) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const waitMs = customDelayMs != null
        ? computeBackoffDelay(0, { minDelayMs: customDelayMs, maxDelayMs, randomFn, jitterRatio })
        : computeBackoffDelay(attempt, { minDelayMs, maxDelayMs, randomFn, jitterRatio });
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs, signal);
      attempt += 1;
    }
  }
};
