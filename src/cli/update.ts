import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { UpdaterConfigInput } from "../application/update-graphs/updater.config";
import { runUpdate } from "../composition/root";

type CliErrorEnvelope = {
  event: "update.failed";
  name: string;
  message: string;
  code?: string;
  status?: number;
  stack?: string;
};

type CliOptions = {
  otpBaseDir?: string;
  feedList?: string;
  otpCommand?: string;
  forceRebuild?: boolean;
  keepFailedGraphs?: boolean;
  logDir?: string;
  onlyGraph?: string;
  concurrency?: number;
  timeoutMs?: number;
  retries?: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "update.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const buildProgram = (): Command =>
  new Command()
    .name("otp-graph-updater")
    .description("Sync GTFS feeds and rebuild the OpenTripPlanner graphs whose data changed")
    .option("--otp-base-dir <path>", "directory holding graphs/<graph>/ (default: /var/otp)")
    .option("--feed-list <path>", "feed list file (default: /etc/gtfs-feeds.conf)")
    .option("--otp-command <path>", "launcher invoked as `<command> --build <graphDir>`")
    .option("--force-rebuild", "rebuild every listed graph even if no feed changed")
    .option("--keep-failed-graphs", "keep the directory of a graph whose build failed")
    .option("--log-dir <path>", "directory for otp-build-<graph>.log files (default: cwd)")
    .option("--only-graph <name>", "process only the feeds of this graph")
    .option("--concurrency <n>", "graphs synced in parallel (default: 1)", parseInteger)
    .option("--timeout-ms <ms>", "per-request idle timeout (default: 30000)", parseInteger)
    .option("--retries <n>", "retries for transient download failures (default: 2)", parseInteger)
    .exitOverride()
    .configureOutput({ outputError: () => undefined });

/**
 * Flag layer of the updater configuration. Flags left out stay `undefined`
 * so that the environment and defaults decide them.
 */
export const parseCliFlags = (argv: readonly string[]): UpdaterConfigInput => {
  const program = buildProgram();
  program.parse([...argv], { from: "user" });
  const opts = program.opts<CliOptions>();

  return {
    baseDir: opts.otpBaseDir,
    feedListPath: opts.feedList,
    otpCommand: opts.otpCommand,
    forceRebuild: opts.forceRebuild,
    keepFailedGraphs: opts.keepFailedGraphs,
    logDir: opts.logDir,
    onlyGraph: opts.onlyGraph,
    concurrency: opts.concurrency,
    timeoutMs: opts.timeoutMs,
    fetchRetries: opts.retries
  };
};

export const installInterruptHandlers = (): void => {
  const onSignal = (signal: NodeJS.Signals, exitCode: number) => () => {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({ event: "update.cancelled", signal }));
    process.exit(exitCode);
  };
  process.once("SIGINT", onSignal("SIGINT", 130));
  process.once("SIGTERM", onSignal("SIGTERM", 143));
};

/**
 * Exit status: 0 when the run recorded no failure, 1 when any feed or build
 * failed or the run could not start.
 */
export const executeUpdateCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  let exitCode: number;
  try {
    const report = await runUpdate(parseCliFlags(argv));
    exitCode = report.hadError ? 1 : 0;
  } catch (err) {
    if (err instanceof CommanderError && err.exitCode === 0) {
      exitCode = 0;
    } else {
      const envelope = buildCliErrorEnvelope(err, isDebugMode());
      // eslint-disable-next-line no-console
      console.error(JSON.stringify(envelope));
      exitCode = 1;
    }
  }
  process.exit(exitCode);
};
