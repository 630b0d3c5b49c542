import { randomUUID } from "crypto";
import { copyFile, mkdir, rename, rm, stat } from "fs/promises";
import { join } from "path";
import type { GraphCache } from "../../ports/GraphCache";

const isMissing = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";

/**
 * On-disk graph cache:
 *   {baseDir}/graphs/{graph}/{feed}.zip
 *   {baseDir}/graphs/{graph}/{feed}_feed_info.txt
 */
export class FileSystemGraphCache implements GraphCache {
  constructor(private readonly baseDir: string) {}

  graphDir(graphName: string): string {
    return join(this.baseDir, "graphs", graphName);
  }

  feedPath(graphName: string, feedName: string): string {
    return join(this.graphDir(graphName), `${feedName}.zip`);
  }

  feedInfoPath(graphName: string, feedName: string): string {
    return join(this.graphDir(graphName), `${feedName}_feed_info.txt`);
  }

  async ensureGraphDir(graphName: string): Promise<boolean> {
    const created = await mkdir(this.graphDir(graphName), { recursive: true });
    return created !== undefined;
  }

  async modifiedAt(path: string): Promise<Date | undefined> {
    try {
      return (await stat(path)).mtime;
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw err;
    }
  }

  // Copy beside the target, then rename over it, so readers never see a half-written payload.
  async install(sourcePath: string, targetPath: string): Promise<void> {
    const partialPath = `${targetPath}.partial-${randomUUID()}`;
    try {
      await copyFile(sourcePath, partialPath);
      await rename(partialPath, targetPath);
    } catch (err) {
      await rm(partialPath, { force: true });
      throw err;
    }
  }

  async removeGraph(graphName: string): Promise<void> {
    await rm(this.graphDir(graphName), { recursive: true, force: true });
  }
}
