import { loadUpdaterConfigFromEnv } from "../../src/shared/config/runtime.config";

describe("loadUpdaterConfigFromEnv", () => {
  it("leaves unset variables undefined", () => {
    expect(loadUpdaterConfigFromEnv({})).toEqual({});
  });

  it("reads every variable, trimming strings and accepting boundary values", () => {
    expect(loadUpdaterConfigFromEnv({
      OTP_BASE_DIR: " /srv/otp ",
      GTFS_FEED_LIST: "/srv/otp/feeds.conf",
      OTP_COMMAND: "/opt/otp/otp.sh",
      OTP_LOG_DIR: "/var/log/otp",
      UPDATE_ONLY_GRAPH: "berlin",
      UPDATE_FORCE_REBUILD: "yes",
      UPDATE_KEEP_FAILED_GRAPHS: "0",
      UPDATE_CONCURRENCY: "16",
      FEED_TIMEOUT_MS: "1000",
      FEED_FETCH_RETRIES: "0"
    })).toEqual({
      baseDir: "/srv/otp",
      feedListPath: "/srv/otp/feeds.conf",
      otpCommand: "/opt/otp/otp.sh",
      logDir: "/var/log/otp",
      onlyGraph: "berlin",
      forceRebuild: true,
      keepFailedGraphs: false,
      concurrency: 16,
      timeoutMs: 1000,
      fetchRetries: 0
    });
  });

  it.each([
    {
      env: { UPDATE_CONCURRENCY: "17" },
      message: "UPDATE_CONCURRENCY=17 is out of allowed range [1..16]"
    },
    {
      env: { UPDATE_CONCURRENCY: "1.5" },
      message: "UPDATE_CONCURRENCY=1.5 is out of allowed range [1..16]"
    },
    {
      env: { FEED_TIMEOUT_MS: "999" },
      message: "FEED_TIMEOUT_MS=999 is out of allowed range [1000..600000]"
    },
    {
      env: { FEED_FETCH_RETRIES: "11" },
      message: "FEED_FETCH_RETRIES=11 is out of allowed range [0..10]"
    },
    {
      env: { UPDATE_FORCE_REBUILD: "maybe" },
      message: "UPDATE_FORCE_REBUILD=maybe must be one of true, false, yes, no, 1, 0"
    }
  ])("rejects $env", ({ env, message }) => {
    expect(() => loadUpdaterConfigFromEnv(env)).toThrow(message);
  });
});
