import { type Collection, MongoClient } from "mongodb";
import type { UpdateRunDoc, UpdateRunRepository } from "../../ports/UpdateRunRepository";
import { mongoIndexes } from "./mongo.indexes";

/**
 * Stores one document per update run. The connection is opened lazily on the
 * first write, so a run that never records never connects.
 */
export class MongoUpdateRunRepository implements UpdateRunRepository {
  private client?: MongoClient;
  private collection?: Collection<UpdateRunDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "otp_updater",
    private readonly collectionName = "update_runs"
  ) {}

  private async getCollection(): Promise<Collection<UpdateRunDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const col = this.client.db(this.dbName).collection<UpdateRunDoc>(this.collectionName);
    for (const idx of mongoIndexes.updateRunCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async record(doc: UpdateRunDoc): Promise<void> {
    const col = await this.getCollection();
    await col.insertOne(doc);
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
