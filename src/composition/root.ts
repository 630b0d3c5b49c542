import { readFile } from "fs/promises";
import { type UpdateRunReport, updateGraphs } from "../application/update-graphs/updateGraphs.usecase";
import { resolveUpdaterConfig, type UpdaterConfigInput } from "../application/update-graphs/updater.config";
import { FileSystemGraphCache } from "../infrastructure/filesystem/FileSystemGraphCache";
import { MongoUpdateRunRepository } from "../infrastructure/mongo/MongoUpdateRunRepository";
import { ChildProcessGraphBuildRunner } from "../infrastructure/process/ChildProcessGraphBuildRunner";
import { FeedTransportRouter } from "../infrastructure/transport/FeedTransportRouter";
import { FtpFeedClient } from "../infrastructure/transport/FtpFeedClient";
import { HttpFeedClient } from "../infrastructure/transport/HttpFeedClient";
import { LocalFileFeedClient } from "../infrastructure/transport/LocalFileFeedClient";
import { defaultTransportRetryPolicy } from "../infrastructure/transport/transportRetry";
import { loadEnv } from "../shared/config/env";
import { loadUpdaterConfigFromEnv } from "../shared/config/runtime.config";

/**
 * Resolves configuration (flags > environment > defaults), wires the
 * infrastructure and runs one update.
 */
export const runUpdate = async (flags: UpdaterConfigInput = {}): Promise<UpdateRunReport> => {
  const env = loadEnv();
  const config = resolveUpdaterConfig(loadUpdaterConfigFromEnv(), flags);

  const retryPolicy = { ...defaultTransportRetryPolicy, retries: config.fetchRetries };
  const transport = new FeedTransportRouter(
    new HttpFeedClient(config.timeoutMs, retryPolicy),
    new FtpFeedClient(config.timeoutMs, retryPolicy),
    new LocalFileFeedClient()
  );
  const cache = new FileSystemGraphCache(config.baseDir);
  const runner = new ChildProcessGraphBuildRunner(config.otpCommand);
  const runs = env.MONGO_URI ? new MongoUpdateRunRepository(env.MONGO_URI) : undefined;

  try {
    return await updateGraphs(
      { transport, cache, runner, runs, readFeedList: (path) => readFile(path, "utf8") },
      config
    );
  } finally {
    await runs?.close();
  }
};
