import type { FeedSource, HttpFeedSource } from "../../core/feeds/feedSpec";
import type { FeedTransport, RemoteProbe } from "../../ports/FeedTransport";
import type { StagedResource } from "../../shared/staging/stagedResource";
import type { FtpFeedClient } from "./FtpFeedClient";
import type { HttpFeedClient } from "./HttpFeedClient";
import type { LocalFileFeedClient } from "./LocalFileFeedClient";

export class FeedTransportRouter implements FeedTransport {
  constructor(
    private readonly http: HttpFeedClient,
    private readonly ftp: FtpFeedClient,
    private readonly local: LocalFileFeedClient
  ) {}

  fetch(source: FeedSource): Promise<StagedResource> {
    switch (source.kind) {
      case "http":
        return this.http.fetch(source);
      case "ftp":
        return this.ftp.fetch(source);
      case "file":
        return this.local.fetch(source);
    }
  }

  probeLastModified(source: HttpFeedSource): Promise<RemoteProbe> {
    return this.http.probeLastModified(source);
  }
}
