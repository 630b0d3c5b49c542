export interface GraphCache {
  graphDir(graphName: string): string;
  feedPath(graphName: string, feedName: string): string;
  feedInfoPath(graphName: string, feedName: string): string;
  /** Returns true when the directory had to be created. */
  ensureGraphDir(graphName: string): Promise<boolean>;
  modifiedAt(path: string): Promise<Date | undefined>;
  install(sourcePath: string, targetPath: string): Promise<void>;
  removeGraph(graphName: string): Promise<void>;
}
