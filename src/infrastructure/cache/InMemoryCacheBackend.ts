import type { CacheBackend, StoredCacheEntry } from "../../ports/CacheBackend";

export class InMemoryCacheBackend<V> implements CacheBackend<V> {
  private readonly entries = new Map<string, StoredCacheEntry<V>>();

  async read(key: string): Promise<StoredCacheEntry<V> | undefined> {
    return this.entries.get(key);
  }

  async write(entry: StoredCacheEntry<V>): Promise<void> {
    this.entries.set(entry.key, entry);
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async size(): Promise<number> {
    return this.entries.size;
  }
}
