import { fileURLToPath } from "url";

export class InvalidFeedSpecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidFeedSpecError";
  }
}

export type HttpFeedSource = {
  kind: "http";
  url: string;
};

export type FtpFeedSource = {
  kind: "ftp";
  url: string;
};

export type LocalFileFeedSource = {
  kind: "file";
  path: string;
};

export type FeedSource = HttpFeedSource | FtpFeedSource | LocalFileFeedSource;

export type FeedSpec = {
  readonly graphName: string;
  readonly feedName: string;
  readonly feedSource: FeedSource;
  readonly feedInfoSource?: FeedSource;
  readonly line: number; // 1-based line in the feed list
};

/**
 * Classifies a feed URI once, at parse time. Everything downstream branches on
 * `kind` instead of re-inspecting the scheme.
 */
export const parseFeedSource = (raw: string): FeedSource => {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new InvalidFeedSpecError(`Invalid feed spec: not an absolute URI: ${raw}`);
  }

  switch (parsed.protocol) {
    case "http:":
    case "https:":
      return { kind: "http", url: parsed.toString() };
    case "ftp:":
      return { kind: "ftp", url: parsed.toString() };
    case "file:":
      try {
        return { kind: "file", path: fileURLToPath(parsed) };
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new InvalidFeedSpecError(`Invalid feed spec: unusable file URI ${raw}: ${reason}`);
      }
    default:
      throw new InvalidFeedSpecError(`Invalid feed spec: unsupported scheme ${parsed.protocol} in ${raw}`);
  }
};

const assertPathSegment = (label: string, value: string): string => {
  if (value.length === 0) {
    throw new InvalidFeedSpecError(`Invalid feed spec: ${label} is empty`);
  }
  if (value === "." || value === ".." || /[\\/]/.test(value)) {
    throw new InvalidFeedSpecError(`Invalid feed spec: ${label} must be a single path segment: ${value}`);
  }
  return value;
};

export const createFeedSpec = (fields: string[], line: number): FeedSpec => {
  if (fields.length < 3 || fields.length > 4) {
    throw new InvalidFeedSpecError(`Invalid feed spec: expected 3 or 4 fields, got ${fields.length}`);
  }

  const [graphName, feedName, feedUrl, feedInfoUrl] = fields.map((field) => field.trim());
  const spec: FeedSpec = {
    graphName: assertPathSegment("graph name", graphName ?? ""),
    feedName: assertPathSegment("feed name", feedName ?? ""),
    feedSource: parseFeedSource(feedUrl ?? ""),
    line
  };

  if (feedInfoUrl) {
    return { ...spec, feedInfoSource: parseFeedSource(feedInfoUrl) };
  }
  return spec;
};

/**
 * Renders a source for logs. Credentials embedded in http/ftp URLs are dropped.
 */
export const describeFeedSource = (source: FeedSource): string => {
  if (source.kind === "file") return `file://${source.path}`;

  const url = new URL(source.url);
  return `${url.protocol}//${url.host}${url.pathname}${url.search}`;
};
