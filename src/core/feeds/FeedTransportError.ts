export type FeedTransportErrorKind =
  | "http_status"
  | "not_found"
  | "timeout"
  | "network"
  | "ftp"
  | "io";

export class FeedTransportError extends Error {
  readonly kind: FeedTransportErrorKind;
  readonly requestUrl: string;
  readonly status?: number;
  readonly retryDelayMs?: number;

  constructor(args: {
    kind: FeedTransportErrorKind;
    message: string;
    requestUrl: string;
    status?: number;
    retryDelayMs?: number;
    cause?: unknown;
  }) {
    super(args.message, { cause: args.cause });
    this.name = "FeedTransportError";
    this.kind = args.kind;
    this.requestUrl = args.requestUrl;
    this.status = args.status;
    this.retryDelayMs = args.retryDelayMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get transient(): boolean {
    if (this.kind === "timeout" || this.kind === "network") return true;
    if (this.kind === "http_status" && typeof this.status === "number") {
      return this.status === 429 || this.status >= 500;
    }
    return false;
  }
}
