import { promises as fs } from "fs";
import path from "path";
import type { CacheBackend, CacheDecoder, CacheTierName, StoredCacheEntry } from "../../ports/CacheBackend";
import { ensureDir, isNotFound, readJsonIfExists, writeJsonAtomic } from "../../shared/fs/atomicWrite";
import { isRecord, optionalFiniteNumber } from "../../shared/validation/guards";

const KEY_PATTERN = /^[a-f0-9]{64}$/;

/**
 * One JSON file per key under `<rootDir>/<tier>/`. Files that fail to parse or
 * decode are removed and read as a miss.
 */
export class FileCacheBackend<V> implements CacheBackend<V> {
  private readonly dir: string;

  constructor(
    rootDir: string,
    private readonly tier: CacheTierName,
    private readonly decode: CacheDecoder<V>
  ) {
    this.dir = path.join(rootDir, tier);
  }

  async read(key: string): Promise<StoredCacheEntry<V> | undefined> {
    const filePath = this.pathFor(key);
    let raw: unknown;
    try {
      raw = await readJsonIfExists(filePath);
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
      await this.remove(key);
      return undefined;
    }
    if (raw === undefined) return undefined;

    const entry = this.decodeEntry(key, raw);
    if (!entry) await this.remove(key);
    return entry;
  }

  async write(entry: StoredCacheEntry<V>): Promise<void> {
    await writeJsonAtomic(this.pathFor(entry.key), {
      key: entry.key,
      tier: entry.tier,
      expiresAt: entry.expiresAt,
      value: entry.value
    });
  }

  async remove(key: string): Promise<void> {
    await fs.rm(this.pathFor(key), { force: true });
  }

  async clear(): Promise<void> {
    await fs.rm(this.dir, { recursive: true, force: true });
    await ensureDir(this.dir);
  }

  async size(): Promise<number> {
    try {
      const names = await fs.readdir(this.dir);
      return names.filter((name) => name.endsWith(".json")).length;
    } catch (err) {
      if (isNotFound(err)) return 0;
      throw err;
    }
  }

  private pathFor(key: string): string {
    if (!KEY_PATTERN.test(key)) {
      throw new Error(`Invalid cache key: ${key}`);
    }
    return path.join(this.dir, `${key}.json`);
  }

  private decodeEntry(key: string, raw: unknown): StoredCacheEntry<V> | undefined {
    if (!isRecord(raw) || raw.key !== key || raw.tier !== this.tier) return undefined;
    const expiresAt = optionalFiniteNumber(raw.expiresAt);
    const value = this.decode(raw.value);
    if (expiresAt === undefined || value === undefined) return undefined;
    return { key, tier: this.tier, value, expiresAt };
  }
}
