import { join } from "path";
import { GraphBuildStartError } from "../../core/graphs/GraphBuildStartError";
import type { GraphBuildExit, GraphBuildRunner } from "../../ports/GraphBuildRunner";
import type { GraphCache } from "../../ports/GraphCache";
import { buildFailure, cacheFailure, logFailure, type SyncFailure } from "../sync-feeds/sync.error-handler";

export type RebuildOptions = {
  keepFailedGraphs: boolean;
  logDir: string;
};

export type GraphBuildResult = {
  graph: string;
  status: "built" | "failed";
  exitCode: number | null;
  signal: string | null;
  logFile: string;
  removed: boolean;
};

export type RebuildReport = {
  builds: GraphBuildResult[];
  failures: SyncFailure[];
  hadError: boolean;
};

export const buildLogFileName = (graphName: string): string => `otp-build-${graphName}.log`;

const describeExit = (exit: GraphBuildExit): string =>
  exit.signal != null ? `Build terminated by signal ${exit.signal}` : `Build exited with code ${String(exit.exitCode)}`;

const startFailure = (err: unknown, graph: string): SyncFailure => {
  if (err instanceof GraphBuildStartError && err.stage === "log") return cacheFailure(err, { graph });
  if (err instanceof GraphBuildStartError) return buildFailure(err.message, graph);
  return buildFailure(`Build command could not be started: ${err instanceof Error ? err.message : String(err)}`, graph);
};

/**
 * Rebuilds each graph once, sequentially and in the given order. When the
 * command ran and failed, the graph directory is deleted unless
 * `keepFailedGraphs` is set, so a half-built graph is never left behind looking
 * healthy. A command that never ran leaves the directory as it was.
 */
export const rebuildGraphs = async (
  deps: { runner: GraphBuildRunner; cache: GraphCache },
  input: { graphs: readonly string[]; options: RebuildOptions }
): Promise<RebuildReport> => {
  const { runner, cache } = deps;
  const { graphs, options } = input;
  const builds: GraphBuildResult[] = [];
  const failures: SyncFailure[] = [];

  const report = (failure: SyncFailure) => {
    failures.push(failure);
    logFailure(failure);
  };

  for (const graph of graphs) {
    const graphDir = cache.graphDir(graph);
    const logFile = join(options.logDir, buildLogFileName(graph));
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "graph.rebuild_started", graph, graphDir, logFile }));

    let exit: GraphBuildExit;
    try {
      exit = await runner.build({ graphName: graph, graphDir, logFile });
    } catch (err) {
      report(startFailure(err, graph));
      builds.push({ graph, status: "failed", exitCode: null, signal: null, logFile, removed: false });
      continue;
    }

    if (exit.exitCode === 0) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ event: "graph.rebuild_succeeded", graph }));
      builds.push({ graph, status: "built", exitCode: 0, signal: null, logFile, removed: false });
      continue;
    }

    report(buildFailure(describeExit(exit), graph));

    let removed = false;
    if (!options.keepFailedGraphs) {
      try {
        await cache.removeGraph(graph);
        removed = true;
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ event: "graph.removed", graph, graphDir }));
      } catch (err) {
        report(cacheFailure(err, { graph }));
      }
    }

    builds.push({ graph, status: "failed", exitCode: exit.exitCode, signal: exit.signal, logFile, removed });
  }

  return { builds, failures, hadError: failures.length > 0 };
};
