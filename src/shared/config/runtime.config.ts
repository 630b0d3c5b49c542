import { type UpdaterConfigInput, updaterCaps } from "../../application/update-graphs/updater.config";

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") return true;
  if (normalized === "0" || normalized === "false" || normalized === "no") return false;
  throw new Error(`${name}=${raw} must be one of true, false, yes, no, 1, 0`);
};

const parseOptionalString = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
};

/**
 * Environment layer of the updater configuration. Unset variables stay
 * `undefined` so that flags and defaults decide them.
 */
export const loadUpdaterConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): UpdaterConfigInput => ({
  baseDir: parseOptionalString(env, "OTP_BASE_DIR"),
  feedListPath: parseOptionalString(env, "GTFS_FEED_LIST"),
  otpCommand: parseOptionalString(env, "OTP_COMMAND"),
  logDir: parseOptionalString(env, "OTP_LOG_DIR"),
  onlyGraph: parseOptionalString(env, "UPDATE_ONLY_GRAPH"),
  forceRebuild: parseOptionalBoolean(env, "UPDATE_FORCE_REBUILD"),
  keepFailedGraphs: parseOptionalBoolean(env, "UPDATE_KEEP_FAILED_GRAPHS"),
  concurrency: parseOptionalIntInRange(env, "UPDATE_CONCURRENCY", updaterCaps.concurrency),
  timeoutMs: parseOptionalIntInRange(env, "FEED_TIMEOUT_MS", updaterCaps.timeoutMs),
  fetchRetries: parseOptionalIntInRange(env, "FEED_FETCH_RETRIES", updaterCaps.fetchRetries)
});
