export type DedupHistoryEntry = {
  itemId: string;
  externalId?: string;
  normalizedTitle: string;
};

export interface DedupHistoryRepository {
  loadAll(): Promise<DedupHistoryEntry[]>;
  append(entries: DedupHistoryEntry[]): Promise<{ appended: number }>;
}
