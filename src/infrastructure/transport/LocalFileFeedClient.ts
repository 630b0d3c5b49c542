import { constants } from "fs";
import { access, stat } from "fs/promises";
import type { LocalFileFeedSource } from "../../core/feeds/feedSpec";
import { FeedTransportError } from "../../core/feeds/FeedTransportError";
import { borrowedResource, type StagedResource } from "../../shared/staging/stagedResource";

const errorCode = (err: unknown): string | undefined => {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
};

/**
 * `file:` sources are read in place; no staging copy is made and release is a no-op.
 */
export class LocalFileFeedClient {
  async fetch(source: LocalFileFeedSource): Promise<StagedResource> {
    const requestUrl = `file://${source.path}`;
    try {
      const info = await stat(source.path);
      if (!info.isFile()) {
        throw new FeedTransportError({ kind: "io", message: `Not a regular file: ${source.path}`, requestUrl });
      }
      await access(source.path, constants.R_OK);
    } catch (err) {
      if (err instanceof FeedTransportError) throw err;
      const code = errorCode(err);
      throw new FeedTransportError({
        kind: code === "ENOENT" ? "not_found" : "io",
        message: `Cannot read local feed ${source.path}: ${code ?? (err instanceof Error ? err.message : String(err))}`,
        requestUrl,
        cause: err
      });
    }
    return borrowedResource(source.path);
  }
}
