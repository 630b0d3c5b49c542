import { createWriteStream } from "fs";
import { Readable, Transform } from "stream";
import { pipeline } from "stream/promises";
import { describeFeedSource, type HttpFeedSource } from "../../core/feeds/feedSpec";
import { FeedTransportError } from "../../core/feeds/FeedTransportError";
import { parseLastModifiedHeader } from "../../core/feeds/lastModified";
import type { RemoteProbe } from "../../ports/FeedTransport";
import { retry } from "../../shared/retry/retry";
import { createStagingFile, type StagedResource } from "../../shared/staging/stagedResource";
import { defaultTransportRetryPolicy, type TransportRetryPolicy, transportRetryOptions } from "./transportRetry";

type IdleTimeout = {
  signal: AbortSignal;
  touch: () => void;
  clear: () => void;
};

/** Aborts when no progress has been made for `timeoutMs`; `touch()` restarts the clock. */
const startIdleTimeout = (timeoutMs: number): IdleTimeout => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  return {
    signal: controller.signal,
    touch: () => {
      timer.refresh();
    },
    clear: () => clearTimeout(timer)
  };
};

/** Moves URL credentials into a basic auth header; fetch rejects URLs that carry them. */
const toRequestTarget = (rawUrl: string): { url: string; headers: Record<string, string> } => {
  const url = new URL(rawUrl);
  if (!url.username && !url.password) return { url: url.toString(), headers: {} };

  const credentials = `${decodeURIComponent(url.username)}:${decodeURIComponent(url.password)}`;
  url.username = "";
  url.password = "";
  return {
    url: url.toString(),
    headers: { authorization: `Basic ${Buffer.from(credentials).toString("base64")}` }
  };
};

const describeFailure = (err: unknown): string => {
  if (!(err instanceof Error)) return String(err);
  return err.cause instanceof Error ? `${err.message}: ${err.cause.message}` : err.message;
};

/**
 * HTTP/HTTPS transport on native fetch (Node 20).
 * - `fetch`: GET, only 200 is success, body streamed into a staged file
 * - `probeLastModified`: HEAD, no retry, never throws
 * The timeout is an idle timeout: it covers the wait for headers and every gap
 * between body chunks.
 */
export class HttpFeedClient {
  constructor(
    private readonly timeoutMs = 30000,
    private readonly retryPolicy: TransportRetryPolicy = defaultTransportRetryPolicy
  ) {}

  async fetch(source: HttpFeedSource): Promise<StagedResource> {
    const safeUrl = describeFeedSource(source);
    return retry(() => this.download(source.url, safeUrl), transportRetryOptions(this.retryPolicy, safeUrl));
  }

  async probeLastModified(source: HttpFeedSource): Promise<RemoteProbe> {
    const safeUrl = describeFeedSource(source);
    const timeout = startIdleTimeout(this.timeoutMs);
    try {
      const res = await this.send(source.url, "HEAD", timeout, safeUrl);
      if (res.status === 404) return { status: "not_found" };
      if (res.status !== 200) return { status: "error", error: this.statusError(res, safeUrl) };
      return { status: "ok", lastModified: parseLastModifiedHeader(res.headers.get("last-modified")) };
    } catch (err) {
      return { status: "error", error: err };
    } finally {
      timeout.clear();
    }
  }

  private async download(rawUrl: string, safeUrl: string): Promise<StagedResource> {
    const timeout = startIdleTimeout(this.timeoutMs);
    try {
      const res = await this.send(rawUrl, "GET", timeout, safeUrl);
      if (res.status !== 200) {
        await res.text().catch(() => "");
        throw this.statusError(res, safeUrl);
      }

      const staged = await createStagingFile();
      try {
        const progress = new Transform({
          transform(chunk, _encoding, callback) {
            timeout.touch();
            callback(null, chunk);
          }
        });
        const body = res.body ? Readable.fromWeb(res.body) : Readable.from([]);
        await pipeline(body, progress, createWriteStream(staged.path));
      } catch (err) {
        await staged.release();
        throw new FeedTransportError({
          kind: timeout.signal.aborted ? "timeout" : "network",
          message: timeout.signal.aborted
            ? `Feed download stalled for ${this.timeoutMs}ms`
            : `Feed download interrupted: ${describeFailure(err)}`,
          requestUrl: safeUrl,
          cause: err
        });
      }
      return staged;
    } finally {
      timeout.clear();
    }
  }

  private async send(rawUrl: string, method: "GET" | "HEAD", timeout: IdleTimeout, safeUrl: string): Promise<Response> {
    const target = toRequestTarget(rawUrl);
    try {
      return await fetch(target.url, { method, headers: target.headers, signal: timeout.signal });
    } catch (err) {
      if (timeout.signal.aborted) {
        throw new FeedTransportError({
          kind: "timeout",
          message: `Feed request timeout after ${this.timeoutMs}ms`,
          requestUrl: safeUrl,
          cause: err
        });
      }
      throw new FeedTransportError({
        kind: "network",
        message: `Feed request failed: ${describeFailure(err)}`,
        requestUrl: safeUrl,
        cause: err
      });
    }
  }

  private statusError(res: Response, safeUrl: string): FeedTransportError {
    const retryAfter = res.headers.get("retry-after");
    return new FeedTransportError({
      kind: res.status === 404 ? "not_found" : "http_status",
      message: `Feed request failed: ${res.status}`,
      requestUrl: safeUrl,
      status: res.status,
      retryDelayMs: res.status === 429 && retryAfter && /^\d+$/.test(retryAfter) ? Number(retryAfter) * 1000 : undefined
    });
  }
}
