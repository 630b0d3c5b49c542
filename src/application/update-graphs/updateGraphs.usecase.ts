import { randomUUID } from "crypto";
import { parseFeedList } from "../../core/feeds/parseFeedList";
import type { FeedTransport } from "../../ports/FeedTransport";
import type { GraphBuildRunner } from "../../ports/GraphBuildRunner";
import type { GraphCache } from "../../ports/GraphCache";
import type { UpdateRunRepository } from "../../ports/UpdateRunRepository";
import { type GraphBuildResult, rebuildGraphs } from "../rebuild-graphs/rebuildGraphs.usecase";
import {
  createUpdateRunSummaryTracker,
  type SyncFailure,
  type UpdateRunSummary
} from "../sync-feeds/sync.error-handler";
import { type FeedSyncRecord, syncFeeds } from "../sync-feeds/syncFeeds.usecase";
import type { UpdaterConfig } from "./updater.config";

export type UpdateRunReport = {
  startedAt: Date;
  finishedAt: Date;
  hadError: boolean;
  baseDir: string;
  onlyGraph?: string;
  forceRebuild: boolean;
  updatedGraphs: string[];
  feeds: FeedSyncRecord[];
  builds: GraphBuildResult[];
  failures: SyncFailure[];
  summary: UpdateRunSummary;
};

export type UpdateGraphsDeps = {
  transport: FeedTransport;
  cache: GraphCache;
  runner: GraphBuildRunner;
  readFeedList: (path: string) => Promise<string>;
  runs?: UpdateRunRepository;
  now?: () => Date;
};

/**
 * One full update run: parse the feed list, sync every feed, then rebuild the
 * graphs whose data changed. Rebuilds start only after the sync phase has
 * finished for all feeds.
 */
export const updateGraphs = async (deps: UpdateGraphsDeps, config: UpdaterConfig): Promise<UpdateRunReport> => {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();

  const feedList = parseFeedList(await deps.readFeedList(config.feedListPath));

  const sync = await syncFeeds(
    { transport: deps.transport, cache: deps.cache },
    {
      feedList,
      options: { forceRebuild: config.forceRebuild, onlyGraph: config.onlyGraph, concurrency: config.concurrency }
    }
  );

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event: "graphs.rebuild_pending", graphs: sync.updatedGraphs }));

  const rebuild = await rebuildGraphs(
    { runner: deps.runner, cache: deps.cache },
    { graphs: sync.updatedGraphs, options: { keepFailedGraphs: config.keepFailedGraphs, logDir: config.logDir } }
  );

  const tracker = createUpdateRunSummaryTracker();
  for (const feed of sync.feeds) {
    tracker.addFeed(feed.verdict === "replace" ? "replaced" : feed.verdict === "skip" ? "unchanged" : "failed");
  }
  tracker.addFeed("filtered", sync.skippedByFilter);
  tracker.setUpdatedGraphs(sync.updatedGraphs.length);
  for (const build of rebuild.builds) tracker.addBuild(build.status === "built");

  const failures = [...sync.failures, ...rebuild.failures];
  for (const failure of failures) tracker.addFailure(failure.code);

  const report: UpdateRunReport = {
    startedAt,
    finishedAt: now(),
    hadError: tracker.hadError(),
    baseDir: config.baseDir,
    onlyGraph: config.onlyGraph,
    forceRebuild: config.forceRebuild,
    updatedGraphs: sync.updatedGraphs,
    feeds: sync.feeds,
    builds: rebuild.builds,
    failures,
    summary: tracker.summary()
  };

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event: "update.completed", hadError: report.hadError, ...report.summary }));

  if (deps.runs) {
    try {
      await deps.runs.record({ _id: randomUUID(), ...report });
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "run.record_failed",
        message: err instanceof Error ? err.message : String(err)
      }));
    }
  }

  return report;
};
