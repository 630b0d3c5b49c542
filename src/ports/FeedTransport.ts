import type { FeedSource, HttpFeedSource } from "../core/feeds/feedSpec";
import type { StagedResource } from "../shared/staging/stagedResource";

export type RemoteProbe =
  | { status: "ok"; lastModified?: Date }
  | { status: "not_found" }
  | { status: "error"; error: unknown };

export interface FeedTransport {
  /** Resolves with a readable resource; the caller owns `release()`. */
  fetch(source: FeedSource): Promise<StagedResource>;
  probeLastModified(source: HttpFeedSource): Promise<RemoteProbe>;
}
