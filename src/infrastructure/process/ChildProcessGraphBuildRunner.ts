import { spawn } from "child_process";
import { type FileHandle, mkdir, open } from "fs/promises";
import { dirname } from "path";
import { GraphBuildStartError } from "../../core/graphs/GraphBuildStartError";
import type { GraphBuildExit, GraphBuildRequest, GraphBuildRunner } from "../../ports/GraphBuildRunner";

const openBuildLog = async (logFile: string): Promise<FileHandle> => {
  try {
    await mkdir(dirname(logFile), { recursive: true });
    return await open(logFile, "w");
  } catch (err) {
    throw new GraphBuildStartError({ stage: "log", logFile, cause: err });
  }
};

/**
 * Runs `{command} --build {graphDir}` with stdout and stderr both appended to
 * the request's log file. Resolves with the exit status; rejects with a
 * `GraphBuildStartError` only when the process never ran.
 */
export class ChildProcessGraphBuildRunner implements GraphBuildRunner {
  constructor(private readonly command: string) {}

  async build(request: GraphBuildRequest): Promise<GraphBuildExit> {
    const log = await openBuildLog(request.logFile);

    try {
      return await new Promise<GraphBuildExit>((resolve, reject) => {
        const child = spawn(this.command, ["--build", request.graphDir], {
          stdio: ["ignore", log.fd, log.fd]
        });
        child.once("error", (err) =>
          reject(new GraphBuildStartError({ stage: "spawn", logFile: request.logFile, cause: err }))
        );
        child.once("close", (exitCode, signal) => resolve({ exitCode, signal }));
      });
    } finally {
      await log.close();
    }
  }
}
