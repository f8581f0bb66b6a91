import type { Collection, Db } from "mongodb";
import type { PostHistoryEntry, PostHistoryRepository } from "../../ports/PostHistoryRepository";
import { mongoIndexes } from "./mongo.indexes";

export class MongoPostHistoryRepository implements PostHistoryRepository {
  private collection?: Collection<PostHistoryEntry>;

  constructor(
    private readonly getDb: () => Promise<Db>,
    private readonly collectionName = "listing_history"
  ) {}

  private async getCollection(): Promise<Collection<PostHistoryEntry>> {
    if (this.collection) return this.collection;

    const col = (await this.getDb()).collection<PostHistoryEntry>(this.collectionName);
    for (const idx of mongoIndexes.postHistory) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async record(entry: PostHistoryEntry): Promise<void> {
    const col = await this.getCollection();
    await col.insertOne(entry);
  }
}
