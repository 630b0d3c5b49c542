import type { MalformedFeedRecord } from "../../core/feeds/parseFeedList";
import { FeedTransportError, type FeedTransportErrorKind } from "../../core/feeds/FeedTransportError";

export type SyncFailureCode =
  | "malformed_feed_spec"
  | "feed_info_fetch_failed"
  | "probe_failed"
  | "fetch_failed"
  | "cache_io_failed"
  | "build_failed";

export type SyncFailureContext = {
  graph?: string;
  feed?: string;
  line?: number;
};

export type SyncFailure = SyncFailureContext & {
  code: SyncFailureCode;
  message: string;
  transport?: FeedTransportErrorKind;
  url?: string;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export const malformedRecordFailure = (record: MalformedFeedRecord): SyncFailure => ({
  code: "malformed_feed_spec",
  message: `Incorrect feed spec at line ${record.line}: ${record.reason}`,
  line: record.line
});

/**
 * Maps a transport-level failure onto the sync taxonomy. Anything that is not a
 * `FeedTransportError` came from our own side (filesystem, hashing) and is
 * reported as a cache I/O failure instead of the requested code.
 */
export const classifyFeedFailure = (
  code: Extract<SyncFailureCode, "feed_info_fetch_failed" | "probe_failed" | "fetch_failed">,
  reason: unknown,
  context: SyncFailureContext
): SyncFailure => {
  if (reason instanceof FeedTransportError) {
    return {
      code,
      message: reason.message,
      transport: reason.kind,
      url: reason.requestUrl,
      ...context
    };
  }
  return cacheFailure(reason, context);
};

export const cacheFailure = (reason: unknown, context: SyncFailureContext): SyncFailure => ({
  code: "cache_io_failed",
  message: toErrorMessage(reason),
  ...context
});

export const buildFailure = (message: string, graph: string): SyncFailure => ({
  code: "build_failed",
  message,
  graph
});

export const logFailure = (failure: SyncFailure): void => {
  // eslint-disable-next-line no-console
  console.warn(JSON.stringify({ event: "update.failure", ...failure }));
};

export type FeedVerdictCounts = {
  replaced: number;
  unchanged: number;
  failed: number;
  filtered: number;
};

export type UpdateRunSummary = {
  feedsProcessed: number;
  feeds: FeedVerdictCounts;
  updatedGraphs: number;
  graphsBuilt: number;
  graphsFailed: number;
  failuresByCode: Partial<Record<SyncFailureCode, number>>;
};

export const createUpdateRunSummaryTracker = () => {
  const feeds: FeedVerdictCounts = { replaced: 0, unchanged: 0, failed: 0, filtered: 0 };
  let updatedGraphs = 0;
  let graphsBuilt = 0;
  let graphsFailed = 0;
  const failuresByCode: Partial<Record<SyncFailureCode, number>> = {};

  return {
    addFeed: (verdict: keyof FeedVerdictCounts, count = 1) => {
      feeds[verdict] += count;
    },
    setUpdatedGraphs: (count: number) => {
      updatedGraphs = count;
    },
    addBuild: (ok: boolean) => {
      if (ok) graphsBuilt += 1;
      else graphsFailed += 1;
    },
    addFailure: (code: SyncFailureCode) => {
      failuresByCode[code] = (failuresByCode[code] ?? 0) + 1;
      return failuresByCode[code] ?? 0;
    },
    hadError: () => Object.keys(failuresByCode).length > 0,
    summary: (): UpdateRunSummary => ({
      feedsProcessed: feeds.replaced + feeds.unchanged + feeds.failed,
      feeds: { ...feeds },
      updatedGraphs,
      graphsBuilt,
      graphsFailed,
      failuresByCode: { ...failuresByCode }
    })
  };
};

export type UpdateRunSummaryTracker = ReturnType<typeof createUpdateRunSummaryTracker>;
