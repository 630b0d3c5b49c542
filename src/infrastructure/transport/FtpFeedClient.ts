import { type AccessOptions, Client, FTPError } from "basic-ftp";
import { describeFeedSource, type FtpFeedSource } from "../../core/feeds/feedSpec";
import { FeedTransportError } from "../../core/feeds/FeedTransportError";
import { retry } from "../../shared/retry/retry";
import { createStagingFile, type StagedResource } from "../../shared/staging/stagedResource";
import { defaultTransportRetryPolicy, type TransportRetryPolicy, transportRetryOptions } from "./transportRetry";

export type FtpClientLike = Pick<Client, "access" | "downloadTo" | "close">;

export type FtpTarget = {
  access: AccessOptions;
  remotePath: string;
};

const FTP_FILE_UNAVAILABLE = 550;

export const toFtpTarget = (rawUrl: string): FtpTarget => {
  const url = new URL(rawUrl);
  return {
    access: {
      host: url.hostname,
      port: url.port ? Number(url.port) : 21,
      user: url.username ? decodeURIComponent(url.username) : "anonymous",
      password: url.password ? decodeURIComponent(url.password) : "anonymous@",
      secure: false
    },
    remotePath: decodeURIComponent(url.pathname)
  };
};

const toTransportError = (err: unknown, safeUrl: string): FeedTransportError => {
  if (err instanceof FTPError) {
    return new FeedTransportError({
      kind: err.code === FTP_FILE_UNAVAILABLE ? "not_found" : "ftp",
      message: `FTP transfer failed: ${err.code} ${err.message}`,
      requestUrl: safeUrl,
      status: err.code,
      cause: err
    });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new FeedTransportError({
    kind: /timeout/i.test(message) ? "timeout" : "network",
    message: `FTP transfer failed: ${message}`,
    requestUrl: safeUrl,
    cause: err
  });
};

/**
 * FTP transport on basic-ftp. A transfer that completes without a protocol
 * error is a success; there is no modification-time probe for FTP.
 */
export class FtpFeedClient {
  constructor(
    private readonly timeoutMs = 30000,
    private readonly retryPolicy: TransportRetryPolicy = defaultTransportRetryPolicy,
    private readonly createClient: (timeoutMs: number) => FtpClientLike = (timeoutMs) => new Client(timeoutMs)
  ) {}

  async fetch(source: FtpFeedSource): Promise<StagedResource> {
    const safeUrl = describeFeedSource(source);
    return retry(() => this.download(source.url, safeUrl), transportRetryOptions(this.retryPolicy, safeUrl, "ftp"));
  }

  private async download(rawUrl: string, safeUrl: string): Promise<StagedResource> {
    const target = toFtpTarget(rawUrl);
    const client = this.createClient(this.timeoutMs);
    const staged = await createStagingFile();

    try {
      await client.access(target.access);
      await client.downloadTo(staged.path, target.remotePath);
      return staged;
    } catch (err) {
      await staged.release();
      throw toTransportError(err, safeUrl);
    } finally {
      client.close();
    }
  }
}
