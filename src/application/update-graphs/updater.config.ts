export type UpdaterConfig = {
  baseDir: string;
  feedListPath: string;
  otpCommand: string;
  forceRebuild: boolean;
  keepFailedGraphs: boolean;
  logDir: string;
  onlyGraph?: string;
  concurrency: number;
  timeoutMs: number;
  fetchRetries: number;
};

export type UpdaterConfigInput = Partial<UpdaterConfig>;

export const defaultUpdaterConfig: Omit<UpdaterConfig, "otpCommand" | "logDir" | "onlyGraph"> = {
  baseDir: "/var/otp",
  feedListPath: "/etc/gtfs-feeds.conf",
  forceRebuild: false,
  keepFailedGraphs: false,
  concurrency: 1,
  timeoutMs: 30000,
  fetchRetries: 2
};

export const updaterCaps = {
  concurrency: { min: 1, max: 16 },
  timeoutMs: { min: 1000, max: 600000 },
  fetchRetries: { min: 0, max: 10 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

const assertNonEmpty = (name: string, value: string) => {
  if (value.trim() === "") {
    throw new Error(`${name} must not be empty`);
  }
};

export const validateUpdaterConfig = (config: UpdaterConfig): UpdaterConfig => {
  assertNonEmpty("baseDir", config.baseDir);
  assertNonEmpty("feedListPath", config.feedListPath);
  assertNonEmpty("logDir", config.logDir);
  if (config.otpCommand.trim() === "") {
    throw new Error("otpCommand is required (--otp-command or OTP_COMMAND)");
  }
  assertIntegerInRange("concurrency", config.concurrency, updaterCaps.concurrency.min, updaterCaps.concurrency.max);
  assertIntegerInRange("timeoutMs", config.timeoutMs, updaterCaps.timeoutMs.min, updaterCaps.timeoutMs.max);
  assertIntegerInRange("fetchRetries", config.fetchRetries, updaterCaps.fetchRetries.min, updaterCaps.fetchRetries.max);
  return config;
};

const normalizeOptionalString = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

/**
 * Resolves the options bundle from layers given in increasing precedence
 * (e.g. environment, then flags) over the built-in defaults. A layer only
 * overrides the fields it actually sets.
 */
export const resolveUpdaterConfig = (...layers: UpdaterConfigInput[]): UpdaterConfig => {
  const pick = <K extends keyof UpdaterConfig>(key: K): UpdaterConfig[K] | undefined => {
    for (let i = layers.length - 1; i >= 0; i -= 1) {
      const value = layers[i][key];
      if (value !== undefined) return value;
    }
    return undefined;
  };

  return validateUpdaterConfig({
    baseDir: pick("baseDir") ?? defaultUpdaterConfig.baseDir,
    feedListPath: pick("feedListPath") ?? defaultUpdaterConfig.feedListPath,
    otpCommand: pick("otpCommand") ?? "",
    forceRebuild: pick("forceRebuild") ?? defaultUpdaterConfig.forceRebuild,
    keepFailedGraphs: pick("keepFailedGraphs") ?? defaultUpdaterConfig.keepFailedGraphs,
    logDir: pick("logDir") ?? process.cwd(),
    onlyGraph: normalizeOptionalString(pick("onlyGraph")),
    concurrency: pick("concurrency") ?? defaultUpdaterConfig.concurrency,
    timeoutMs: pick("timeoutMs") ?? defaultUpdaterConfig.timeoutMs,
    fetchRetries: pick("fetchRetries") ?? defaultUpdaterConfig.fetchRetries
  });
};
