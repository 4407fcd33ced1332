import { MongoClient, type Collection } from "mongodb";
import type { DedupHistoryEntry, DedupHistoryRepository } from "../../ports/DedupHistoryRepository";
import { mongoIndexes } from "./mongo.indexes";

export type DedupHistoryDoc = {
  _id: string; // item id
  externalId?: string;
  normalizedTitle: string;
  recordedAt: Date;
};

/** Keeps the first entry seen for each item id inside one batch. */
export const dedupeEntriesByItemId = (entries: DedupHistoryEntry[]): DedupHistoryEntry[] => {
  const byItemId = new Map<string, DedupHistoryEntry>();
  for (const entry of entries) {
    if (!byItemId.has(entry.itemId)) byItemId.set(entry.itemId, entry);
  }
  return Array.from(byItemId.values());
};

/**
 * Dedup history in MongoDB. Entries are insert-only: an item id that is
 * already stored keeps its original record.
 */
export class MongoDedupHistoryRepository implements DedupHistoryRepository {
  private client?: MongoClient;
  private collection?: Collection<DedupHistoryDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "extraction_pipeline",
    private readonly collectionName = "dedup_history",
    private readonly now: () => Date = () => new Date()
  ) {}

  private async getCollection(): Promise<Collection<DedupHistoryDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const col = this.client.db(this.dbName).collection<DedupHistoryDoc>(this.collectionName);
    for (const idx of mongoIndexes.dedupHistory) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async loadAll(): Promise<DedupHistoryEntry[]> {
    const col = await this.getCollection();
    const docs = await col.find({}, { projection: { _id: 1, externalId: 1, normalizedTitle: 1 } }).toArray();
    return docs.map((doc) => ({
      itemId: doc._id,
      externalId: doc.externalId ?? undefined,
      normalizedTitle: doc.normalizedTitle
    }));
  }

  async append(entries: DedupHistoryEntry[]): Promise<{ appended: number }> {
    if (entries.length === 0) {
      return { appended: 0 };
    }

    const col = await this.getCollection();
    const recordedAt = this.now();
    const ops = dedupeEntriesByItemId(entries).map((entry) => ({
      updateOne: {
        filter: { _id: entry.itemId },
        update: {
          $setOnInsert: {
            ...(entry.externalId ? { externalId: entry.externalId } : {}),
            normalizedTitle: entry.normalizedTitle,
            recordedAt
          }
        },
        upsert: true
      }
    }));

    const res = await col.bulkWrite(ops, { ordered: false });
    return { appended: res.upsertedCount ?? 0 };
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
