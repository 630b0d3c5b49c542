import { FeedTransportError } from "../../src/core/feeds/FeedTransportError";
import { FeedTransportRouter } from "../../src/infrastructure/transport/FeedTransportRouter";
import { FtpFeedClient } from "../../src/infrastructure/transport/FtpFeedClient";
import { HttpFeedClient } from "../../src/infrastructure/transport/HttpFeedClient";
import { LocalFileFeedClient } from "../../src/infrastructure/transport/LocalFileFeedClient";
import { defaultTransportRetryPolicy, transportRetryOptions } from "../../src/infrastructure/transport/transportRetry";
import { borrowedResource } from "../../src/shared/staging/stagedResource";

const transportError = (kind: FeedTransportError["kind"], status?: number, retryDelayMs?: number) =>
  new FeedTransportError({ kind, message: "failed", requestUrl: "http://example.test/f.zip", status, retryDelayMs });

describe("FeedTransportError.transient", () => {
  it.each([
    ["timeout", undefined, true],
    ["network", undefined, true],
    ["http_status", 429, true],
    ["http_status", 502, true],
    ["http_status", 403, false],
    ["not_found", 404, false],
    ["ftp", 530, false],
    ["io", undefined, false]
  ] as const)("%s %p -> %p", (kind, status, expected) => {
    expect(transportError(kind, status).transient).toBe(expected);
  });
});

describe("transportRetryOptions", () => {
  const options = transportRetryOptions(defaultTransportRetryPolicy, "http://example.test/f.zip");

  it("keeps the configured policy", () => {
    expect(options).toMatchObject({ retries: 2, minDelayMs: 500, maxDelayMs: 10000 });
  });

  it("retries transient transport errors and forwards a server-requested delay", () => {
    expect(options.shouldRetry(transportError("http_status", 429, 2000))).toEqual({ retry: true, delayMs: 2000 });
    expect(options.shouldRetry(transportError("timeout"))).toEqual({ retry: true, delayMs: undefined });
  });

  it("does not retry permanent or foreign errors", () => {
    expect(options.shouldRetry(transportError("not_found", 404))).toBe(false);
    expect(options.shouldRetry(new Error("disk full"))).toBe(false);
  });
});

describe("FeedTransportRouter", () => {
  it("dispatches on the source kind and probes over http", async () => {
    const http = new HttpFeedClient();
    const ftp = new FtpFeedClient();
    const local = new LocalFileFeedClient();
    const httpFetch = jest.spyOn(http, "fetch").mockResolvedValue(borrowedResource("/staged/http"));
    const ftpFetch = jest.spyOn(ftp, "fetch").mockResolvedValue(borrowedResource("/staged/ftp"));
    const localFetch = jest.spyOn(local, "fetch").mockResolvedValue(borrowedResource("/data/local.zip"));
    const probe = jest.spyOn(http, "probeLastModified").mockResolvedValue({ status: "not_found" });

    const router = new FeedTransportRouter(http, ftp, local);

    expect((await router.fetch({ kind: "http", url: "http://example.test/a.zip" })).path).toBe("/staged/http");
    expect((await router.fetch({ kind: "ftp", url: "ftp://example.test/a.zip" })).path).toBe("/staged/ftp");
    expect((await router.fetch({ kind: "file", path: "/data/local.zip" })).path).toBe("/data/local.zip");
    expect(await router.probeLastModified({ kind: "http", url: "http://example.test/a.zip" })).toEqual({
      status: "not_found"
    });

    expect(httpFetch).toHaveBeenCalledTimes(1);
    expect(ftpFetch).toHaveBeenCalledTimes(1);
    expect(localFetch).toHaveBeenCalledTimes(1);
    expect(probe).toHaveBeenCalledWith({ kind: "http", url: "http://example.test/a.zip" });
  });
});
