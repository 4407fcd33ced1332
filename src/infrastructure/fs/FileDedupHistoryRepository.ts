import type { DedupHistoryEntry, DedupHistoryRepository } from "../../ports/DedupHistoryRepository";
import { readJsonIfExists, writeJsonAtomic } from "../../shared/fs/atomicWrite";
import { createLimiter } from "../../shared/concurrency/limiter";
import { isRecord, optionalString } from "../../shared/validation/guards";

type HistoryFile = {
  version: 1;
  entries: DedupHistoryEntry[];
};

const parseEntry = (value: unknown): DedupHistoryEntry | undefined => {
  if (!isRecord(value)) return undefined;
  const itemId = optionalString(value.itemId);
  const normalizedTitle = optionalString(value.normalizedTitle);
  if (itemId === undefined || normalizedTitle === undefined) return undefined;
  return { itemId, externalId: optionalString(value.externalId), normalizedTitle };
};

/** Dedup history as a single JSON document, rewritten atomically on append. */
export class FileDedupHistoryRepository implements DedupHistoryRepository {
  private readonly writeLock = createLimiter(1);

  constructor(private readonly filePath: string) {}

  async loadAll(): Promise<DedupHistoryEntry[]> {
    const raw = await readJsonIfExists(this.filePath);
    if (raw === undefined) return [];
    if (!isRecord(raw) || !Array.isArray(raw.entries)) {
      throw new Error(`Dedup history at ${this.filePath} is malformed`);
    }

    const entries: DedupHistoryEntry[] = [];
    for (const value of raw.entries) {
      const entry = parseEntry(value);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  append(entries: DedupHistoryEntry[]): Promise<{ appended: number }> {
    if (entries.length === 0) return Promise.resolve({ appended: 0 });

    return this.writeLock(async () => {
      const existing = await this.loadAll();
      const knownIds = new Set(existing.map((entry) => entry.itemId));
      const added = entries.filter((entry) => {
        if (knownIds.has(entry.itemId)) return false;
        knownIds.add(entry.itemId);
        return true;
      });
      if (added.length === 0) return { appended: 0 };

      const payload: HistoryFile = { version: 1, entries: [...existing, ...added] };
      await writeJsonAtomic(this.filePath, payload);
      return { appended: added.length };
    });
  }
}
