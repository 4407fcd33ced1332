import type { DedupHistoryEntry } from "../../src/ports/DedupHistoryRepository";
import {
  dedupeEntriesByItemId,
  MongoDedupHistoryRepository
} from "../../src/infrastructure/mongo/MongoDedupHistoryRepository";

const recordedAt = new Date("2026-02-20T00:00:00.000Z");

const newRepo = () =>
  new MongoDedupHistoryRepository("mongodb://localhost:27017/pipeline", "extraction_pipeline", "dedup_history", () => recordedAt);

describe("MongoDedupHistoryRepository", () => {
  it("dedupe helper keeps the first occurrence per item id", () => {
    const entries: DedupHistoryEntry[] = [
      { itemId: "a", normalizedTitle: "first" },
      { itemId: "b", normalizedTitle: "only b" },
      { itemId: "a", normalizedTitle: "later" }
    ];

    expect(dedupeEntriesByItemId(entries)).toEqual([
      { itemId: "a", normalizedTitle: "first" },
      { itemId: "b", normalizedTitle: "only b" }
    ]);
  });

  it("returns early for empty batches", async () => {
    const repo = newRepo();
    const getCollection = jest.fn();
    (repo as unknown as { getCollection: typeof getCollection }).getCollection = getCollection;

    await expect(repo.append([])).resolves.toEqual({ appended: 0 });
    expect(getCollection).not.toHaveBeenCalled();
  });

  it("returns cached collection without reconnecting", async () => {
    const repo = newRepo();
    const cached = { bulkWrite: jest.fn() };
    (repo as unknown as { collection?: typeof cached }).collection = cached;

    const col = await (repo as unknown as { getCollection: () => Promise<typeof cached> }).getCollection();
    expect(col).toBe(cached);
  });

  it("maps stored documents back to history entries", async () => {
    const repo = newRepo();
    const toArray = jest.fn().mockResolvedValue([
      { _id: "a", externalId: "10.1/a", normalizedTitle: "first" },
      { _id: "b", externalId: null, normalizedTitle: "second" }
    ]);
    const find = jest.fn().mockReturnValue({ toArray });
    (repo as unknown as { getCollection: () => Promise<{ find: typeof find }> }).getCollection = async () => ({ find });

    await expect(repo.loadAll()).resolves.toEqual([
      { itemId: "a", externalId: "10.1/a", normalizedTitle: "first" },
      { itemId: "b", externalId: undefined, normalizedTitle: "second" }
    ]);
    expect(find).toHaveBeenCalledWith({}, { projection: { _id: 1, externalId: 1, normalizedTitle: 1 } });
  });

  it("inserts new entries with $setOnInsert and never overwrites existing ones", async () => {
    const repo = newRepo();
    const bulkWrite = jest.fn().mockResolvedValue({ upsertedCount: 2 });
    (repo as unknown as { getCollection: () => Promise<{ bulkWrite: typeof bulkWrite }> }).getCollection =
      async () => ({ bulkWrite });

    const result = await repo.append([
      { itemId: "a", externalId: "10.1/a", normalizedTitle: "first" },
      { itemId: "b", normalizedTitle: "second" },
      { itemId: "a", normalizedTitle: "duplicate in batch" }
    ]);

    expect(result).toEqual({ appended: 2 });
    expect(bulkWrite).toHaveBeenCalledTimes(1);
    expect(bulkWrite).toHaveBeenCalledWith(
      [
        {
          updateOne: {
            filter: { _id: "a" },
            update: { $setOnInsert: { externalId: "10.1/a", normalizedTitle: "first", recordedAt } },
            upsert: true
          }
        },
        {
          updateOne: {
            filter: { _id: "b" },
            update: { $setOnInsert: { normalizedTitle: "second", recordedAt } },
            upsert: true
          }
        }
      ],
      { ordered: false }
    );
  });

  it("falls back to zero when bulkWrite reports no upsert count", async () => {
    const repo = newRepo();
    const bulkWrite = jest.fn().mockResolvedValue({});
    (repo as unknown as { getCollection: () => Promise<{ bulkWrite: typeof bulkWrite }> }).getCollection =
      async () => ({ bulkWrite });

    await expect(repo.append([{ itemId: "a", normalizedTitle: "first" }])).resolves.toEqual({ appended: 0 });
  });
});
