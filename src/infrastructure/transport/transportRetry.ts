import { FeedTransportError } from "../../core/feeds/FeedTransportError";
import type { RetryOptions } from "../../shared/retry/retry";

export type TransportRetryPolicy = {
  retries: number;
  minDelayMs: number;
  maxDelayMs: number;
};

export const defaultTransportRetryPolicy: TransportRetryPolicy = {
  retries: 2,
  minDelayMs: 500,
  maxDelayMs: 10000
};

const statusOf = (error: unknown): number | null =>
  error instanceof FeedTransportError && typeof error.status === "number" ? error.status : null;

/**
 * Retry wiring shared by the network transports: only transient
 * `FeedTransportError`s are retried, and log lines carry the sanitized URL only.
 */
export const transportRetryOptions = (
  policy: TransportRetryPolicy,
  safeUrl: string,
  protocol: "http" | "ftp" = "http"
): RetryOptions => ({
  ...policy,
  shouldRetry: (err) => {
    if (!(err instanceof FeedTransportError) || !err.transient) return false;
    return { retry: true, delayMs: err.retryDelayMs };
  },
  onRetry: ({ attempt, maxAttempts, error }) => {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: `${protocol}.retry`,
      status: statusOf(error),
      url: safeUrl,
      attempt,
      maxAttempts
    }));
  },
  onGiveUp: ({ attempt, maxAttempts, error }) => {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: `${protocol}.give_up`,
      status: statusOf(error),
      url: safeUrl,
      attempt,
      maxAttempts
    }));
  }
});
