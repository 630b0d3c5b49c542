import { describeFeedSource, type FeedSpec } from "../../core/feeds/feedSpec";
import { isLocalCopyCurrent } from "../../core/feeds/lastModified";
import type { FeedTransport } from "../../ports/FeedTransport";
import type { GraphCache } from "../../ports/GraphCache";
import { isSameContent } from "../../shared/hashing/contentDigest";
import { type StagedResource, withStagedResource } from "../../shared/staging/stagedResource";
import { classifyFeedFailure, type SyncFailure, type SyncFailureContext } from "./sync.error-handler";

export type FeedVerdict =
  | { verdict: "skip"; reason: "feed_info_unchanged" | "not_modified" | "content_unchanged" }
  | { verdict: "replace"; reason: "content_changed" | "first_ingestion" }
  | { verdict: "failed"; reason: "fetch_failed" };

export type FeedChangeOutcome = FeedVerdict & {
  feedInfoStored: boolean;
};

export type FeedChangeDeps = {
  transport: FeedTransport;
  cache: GraphCache;
  onFailure: (failure: SyncFailure) => void;
};

const log = (event: string, feed: FeedSpec, extra: Record<string, unknown> = {}) => {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event, graph: feed.graphName, feed: feed.feedName, ...extra }));
};

const failureContext = (feed: FeedSpec): SyncFailureContext => ({
  graph: feed.graphName,
  feed: feed.feedName,
  line: feed.line
});

/**
 * Timestamp pre-filter for http(s) feeds. A failed probe, including a 200
 * without a usable `last-modified`, is reported but only means the full
 * content comparison has to run.
 */
const isRemoteOlderThanLocal = async (deps: FeedChangeDeps, feed: FeedSpec, feedPath: string): Promise<boolean> => {
  const source = feed.feedSource;
  if (source.kind !== "http") return false;

  const probe = await deps.transport.probeLastModified(source);
  if (probe.status === "error") {
    deps.onFailure(classifyFeedFailure("probe_failed", probe.error, failureContext(feed)));
  } else if (probe.status === "not_found") {
    deps.onFailure({
      code: "probe_failed",
      message: "Failed to get last-modified from server: 404",
      transport: "not_found",
      url: describeFeedSource(source),
      ...failureContext(feed)
    });
  } else if (probe.lastModified == null) {
    deps.onFailure({
      code: "probe_failed",
      message: "Failed to get last-modified from server: header missing or unparsable",
      url: describeFeedSource(source),
      ...failureContext(feed)
    });
  }

  const remoteModifiedAt = probe.status === "ok" ? probe.lastModified : undefined;
  const localModifiedAt = await deps.cache.modifiedAt(feedPath);
  log("feed.probe", feed, {
    remoteUpdatedAt: remoteModifiedAt?.toISOString() ?? null,
    localUpdatedAt: localModifiedAt?.toISOString() ?? null
  });

  return localModifiedAt != null && remoteModifiedAt != null && isLocalCopyCurrent(localModifiedAt, remoteModifiedAt);
};

const checkMainFeed = async (deps: FeedChangeDeps, feed: FeedSpec): Promise<FeedVerdict> => {
  const { cache, transport } = deps;
  const feedPath = cache.feedPath(feed.graphName, feed.feedName);

  if (await isRemoteOlderThanLocal(deps, feed, feedPath)) {
    log("feed.up_to_date", feed);
    return { verdict: "skip", reason: "not_modified" };
  }

  log("feed.download", feed, { url: describeFeedSource(feed.feedSource) });
  let download: StagedResource;
  try {
    download = await transport.fetch(feed.feedSource);
  } catch (err) {
    deps.onFailure(classifyFeedFailure("fetch_failed", err, failureContext(feed)));
    return { verdict: "failed", reason: "fetch_failed" };
  }

  return withStagedResource<FeedVerdict>(download, async ({ path }) => {
    if ((await cache.modifiedAt(feedPath)) == null) {
      await cache.install(path, feedPath);
      log("feed.added", feed);
      return { verdict: "replace", reason: "first_ingestion" };
    }

    if (await isSameContent(path, feedPath)) {
      log("feed.unchanged", feed);
      return { verdict: "skip", reason: "content_unchanged" };
    }

    await cache.install(path, feedPath);
    log("feed.replaced", feed);
    return { verdict: "replace", reason: "content_changed" };
  });
};

/**
 * Decides whether one feed's cached payload is stale and replaces it if so.
 *
 * 1. feed_info.txt (when configured) is a cheap oracle: an identical snapshot
 *    ends the check without touching the main feed.
 * 2. For http(s) feeds a newer-or-equal local mtime than the remote
 *    `last-modified` skips the download.
 * 3. Otherwise the feed is downloaded and its SHA-256 compared with the cached
 *    copy, which is the only thing that decides "replace".
 *
 * A changed feed_info snapshot is stored once the main feed has been handled
 * without a fetch failure, so an interrupted download is retried next run.
 */
export const detectFeedChange = async (deps: FeedChangeDeps, feed: FeedSpec): Promise<FeedChangeOutcome> => {
  const { cache, transport } = deps;
  const feedInfoPath = cache.feedInfoPath(feed.graphName, feed.feedName);
  let snapshot: StagedResource | undefined;

  try {
    if (feed.feedInfoSource) {
      log("feed_info.check", feed, { url: describeFeedSource(feed.feedInfoSource) });
      try {
        snapshot = await transport.fetch(feed.feedInfoSource);
      } catch (err) {
        deps.onFailure(classifyFeedFailure("feed_info_fetch_failed", err, failureContext(feed)));
      }

      if (snapshot && (await cache.modifiedAt(feedInfoPath)) != null && (await isSameContent(snapshot.path, feedInfoPath))) {
        log("feed_info.unchanged", feed);
        return { verdict: "skip", reason: "feed_info_unchanged", feedInfoStored: false };
      }
    }

    const verdict = await checkMainFeed(deps, feed);
    if (!snapshot || verdict.verdict === "failed") {
      return { ...verdict, feedInfoStored: false };
    }

    await cache.install(snapshot.path, feedInfoPath);
    log("feed_info.stored", feed);
    return { ...verdict, feedInfoStored: true };
  } finally {
    await snapshot?.release();
  }
};
