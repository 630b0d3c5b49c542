export type GraphBuildStartStage = "log" | "spawn";

/**
 * The build command never ran: either its log file could not be prepared or
 * the process could not be spawned. Nothing in the graph directory was touched.
 */
export class GraphBuildStartError extends Error {
  readonly stage: GraphBuildStartStage;
  readonly logFile: string;

  constructor(args: { stage: GraphBuildStartStage; logFile: string; cause: unknown }) {
    const reason = args.cause instanceof Error ? args.cause.message : String(args.cause);
    super(
      args.stage === "log"
        ? `Build log ${args.logFile} could not be created: ${reason}`
        : `Build command could not be started: ${reason}`,
      { cause: args.cause }
    );
    this.name = "GraphBuildStartError";
    this.stage = args.stage;
    this.logFile = args.logFile;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
