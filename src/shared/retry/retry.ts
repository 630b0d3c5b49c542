export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number; // server-provided wait, e.g. Retry-After
    };

export type RetryPolicy = {
  retries: number; // extra attempts after the first one; 0 disables retrying
  minDelayMs: number;
  maxDelayMs: number;
  jitterRatio?: number;
  randomFn?: () => number;
};

export type RetryOptions = RetryPolicy & {
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

/**
 * Exponential backoff capped at `maxDelayMs`, plus up to `jitterRatio` of it as jitter.
 * A valid requested delay replaces the exponential step but is still capped.
 */
export const computeBackoffMs = (policy: RetryPolicy, attemptIndex: number, requestedDelayMs?: number): number => {
  const base =
    typeof requestedDelayMs === "number" && Number.isFinite(requestedDelayMs) && requestedDelayMs >= 0
      ? Math.min(policy.maxDelayMs, requestedDelayMs)
      : Math.min(policy.maxDelayMs, policy.minDelayMs * Math.pow(2, attemptIndex));
  const jitterRatio = clamp01(policy.jitterRatio ?? 0.2);
  const random = clamp01((policy.randomFn ?? Math.random)());
  return base + Math.floor(base * jitterRatio * random);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const maxAttempts = Math.max(0, opts.retries) + 1;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = opts.shouldRetry(err);
      const normalized = typeof decision === "boolean" ? { retry: decision, delayMs: undefined } : decision;

      if (attempt >= maxAttempts || !normalized.retry) {
        opts.onGiveUp?.({ attempt, maxAttempts, error: err });
        throw err;
      }

      const delayMs = computeBackoffMs(opts, attempt - 1, normalized.delayMs);
      opts.onRetry?.({ attempt, maxAttempts, delayMs, error: err });
      await sleep(delayMs);
    }
  }
};
