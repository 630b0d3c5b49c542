export type GraphBuildRequest = {
  graphName: string;
  graphDir: string;
  logFile: string;
};

export type GraphBuildExit = {
  exitCode: number | null;
  signal: string | null;
};

export interface GraphBuildRunner {
  /** Rejects only when the command never ran; see `GraphBuildStartError`. */
  build(request: GraphBuildRequest): Promise<GraphBuildExit>;
}
