import type { FeedSpec } from "../../core/feeds/feedSpec";
import type { ParsedFeedList } from "../../core/feeds/parseFeedList";
import type { FeedTransport } from "../../ports/FeedTransport";
import type { GraphCache } from "../../ports/GraphCache";
import { settleWithConcurrency } from "../../shared/concurrency/limiter";
import { detectFeedChange, type FeedChangeOutcome } from "./detectFeedChange";
import { cacheFailure, logFailure, malformedRecordFailure, type SyncFailure } from "./sync.error-handler";

export type SyncOptions = {
  forceRebuild: boolean;
  onlyGraph?: string;
  concurrency: number;
};

export type FeedSyncRecord = {
  graph: string;
  feed: string;
  line: number;
  verdict: FeedChangeOutcome["verdict"];
  reason: FeedChangeOutcome["reason"] | "cache_io_failed";
  feedInfoStored: boolean;
};

export type SyncReport = {
  /** Graphs to rebuild, in order of first appearance in the feed list. */
  updatedGraphs: string[];
  feeds: FeedSyncRecord[];
  skippedByFilter: number;
  failures: SyncFailure[];
  hadError: boolean;
};

/**
 * Splits the feed list into per-graph batches. Sequential runs keep list order
 * by only merging adjacent feeds of the same graph; parallel runs gather every
 * feed of a graph into one batch so no two batches share a cache directory.
 */
const batchByGraph = (specs: readonly FeedSpec[], sequential: boolean): Array<[string, FeedSpec[]]> => {
  const batches: Array<[string, FeedSpec[]]> = [];
  const byGraph = new Map<string, FeedSpec[]>();
  for (const spec of specs) {
    let batch: FeedSpec[] | undefined;
    if (!sequential) {
      batch = byGraph.get(spec.graphName);
    } else if (batches.length > 0 && batches[batches.length - 1][0] === spec.graphName) {
      batch = batches[batches.length - 1][1];
    }
    if (batch) {
      batch.push(spec);
      continue;
    }
    const fresh: FeedSpec[] = [spec];
    byGraph.set(spec.graphName, fresh);
    batches.push([spec.graphName, fresh]);
  }
  return batches;
};

const toRecord = (feed: FeedSpec, outcome: Pick<FeedSyncRecord, "verdict" | "reason" | "feedInfoStored">): FeedSyncRecord => ({
  graph: feed.graphName,
  feed: feed.feedName,
  line: feed.line,
  ...outcome
});

/**
 * Brings every cached feed up to date and collects the graphs that need a rebuild.
 *
 * With `concurrency` 1 feeds are handled in feed-list order. Above that, feeds
 * are regrouped by graph: feeds of one graph still run one after another (they
 * share a cache directory) while distinct graphs run in parallel. Failures
 * stay inside the feed that caused them. The report is built only after every
 * graph has settled.
 */
export const syncFeeds = async (
  deps: { transport: FeedTransport; cache: GraphCache },
  input: { feedList: ParsedFeedList; options: SyncOptions }
): Promise<SyncReport> => {
  const { transport, cache } = deps;
  const { feedList, options } = input;
  const failures: SyncFailure[] = [];
  const marked = new Set<string>();

  const report = (failure: SyncFailure) => {
    failures.push(failure);
    logFailure(failure);
  };

  for (const record of feedList.malformed) {
    report(malformedRecordFailure(record));
  }

  const selected = feedList.specs.filter((spec) => options.onlyGraph == null || spec.graphName === options.onlyGraph);
  const groups = batchByGraph(selected, options.concurrency <= 1);

  const syncOne = async (feed: FeedSpec): Promise<FeedSyncRecord> => {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "feed.processing", graph: feed.graphName, feed: feed.feedName }));

    if (options.forceRebuild) {
      marked.add(feed.graphName);
    }

    try {
      const outcome = await detectFeedChange({ transport, cache, onFailure: report }, feed);
      if (outcome.verdict === "replace") marked.add(feed.graphName);
      return toRecord(feed, outcome);
    } catch (err) {
      report(cacheFailure(err, { graph: feed.graphName, feed: feed.feedName, line: feed.line }));
      return toRecord(feed, { verdict: "failed", reason: "cache_io_failed", feedInfoStored: false });
    }
  };

  const syncGraph = async ([graphName, feeds]: [string, FeedSpec[]]): Promise<FeedSyncRecord[]> => {
    try {
      if (await cache.ensureGraphDir(graphName)) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ event: "graph.dir_created", graph: graphName, path: cache.graphDir(graphName) }));
      }
    } catch (err) {
      report(cacheFailure(err, { graph: graphName }));
      if (options.forceRebuild) marked.add(graphName);
      return feeds.map((feed) => toRecord(feed, { verdict: "failed", reason: "cache_io_failed", feedInfoStored: false }));
    }

    const records: FeedSyncRecord[] = [];
    for (const feed of feeds) {
      records.push(await syncOne(feed));
    }
    return records;
  };

  const settled = await settleWithConcurrency(groups, options.concurrency, syncGraph);

  const feeds = settled.flatMap((result, index) => {
    if (result.status === "fulfilled") return result.value;
    report(cacheFailure(result.reason, { graph: groups[index][0] }));
    return [];
  });

  return {
    updatedGraphs: Array.from(new Set(selected.map((spec) => spec.graphName))).filter((graphName) => marked.has(graphName)),
    feeds,
    skippedByFilter: feedList.specs.length - selected.length,
    failures,
    hadError: failures.length > 0
  };
};
