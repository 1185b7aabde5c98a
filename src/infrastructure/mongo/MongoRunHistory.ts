import { MongoClient, type Collection } from "mongodb";
import type { RunHistory, RunRecord } from "../../ports/RunHistory";
import { mongoIndexes } from "./mongo.indexes";

/**
 * One document per completed run, looked up by input file.
 */
export class MongoRunHistory implements RunHistory {
  private client?: MongoClient;
  private collection?: Collection<RunRecord>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "linetest",
    private readonly collectionName = "runs"
  ) {}

  private async getCollection(): Promise<Collection<RunRecord>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const col = this.client.db(this.dbName).collection<RunRecord>(this.collectionName);
    for (const idx of mongoIndexes.runCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async lastRun(inputFile: string): Promise<RunRecord | undefined> {
    const col = await this.getCollection();
    const found = await col.findOne({ inputFile }, { sort: { finishedAt: -1 } });
    return found ?? undefined;
  }

  async record(run: RunRecord): Promise<void> {
    const col = await this.getCollection();
    await col.insertOne(run);
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
