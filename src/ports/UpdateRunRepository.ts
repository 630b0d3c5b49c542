import type { UpdateRunReport } from "../application/update-graphs/updateGraphs.usecase";

export type UpdateRunDoc = UpdateRunReport & {
  _id: string; // UUIDv4
};

export interface UpdateRunRepository {
  record(doc: UpdateRunDoc): Promise<void>;
  close(): Promise<void>;
}
