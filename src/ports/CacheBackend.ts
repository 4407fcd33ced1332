export type CacheTierName = "query" | "artifact" | "result";

export type StoredCacheEntry<V> = {
  key: string;
  tier: CacheTierName;
  value: V;
  expiresAt: number; // epoch ms
};

/** Raw key/value storage for one cache tier. Expiry is enforced by the cache layer. */
export interface CacheBackend<V> {
  read(key: string): Promise<StoredCacheEntry<V> | undefined>;
  write(entry: StoredCacheEntry<V>): Promise<void>;
  remove(key: string): Promise<void>;
  clear(): Promise<void>;
  size(): Promise<number>;
}

/** Reads a persisted cache value back into its typed shape; undefined when it does not fit. */
export type CacheDecoder<V> = (value: unknown) => V | undefined;
