import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

export type StagedResource = {
  path: string;
  release: () => Promise<void>;
};

/**
 * Allocates an empty staging path inside a private temp directory.
 * `release()` removes the directory and is safe to call more than once.
 */
export const createStagingFile = async (prefix = "feed-"): Promise<StagedResource> => {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  return {
    path: join(dir, "payload"),
    release: () => rm(dir, { recursive: true, force: true })
  };
};

/** A resource that already lives on disk and must not be removed. */
export const borrowedResource = (path: string): StagedResource => ({
  path,
  release: async () => undefined
});

export const withStagedResource = async <T>(
  resource: StagedResource,
  use: (resource: StagedResource) => Promise<T>
): Promise<T> => {
  try {
    return await use(resource);
  } finally {
    await resource.release();
  }
};
