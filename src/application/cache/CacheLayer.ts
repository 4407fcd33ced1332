import type { WorkItem } from "../../core/items/workItem";
import type { CacheBackend, CacheTierName } from "../../ports/CacheBackend";
import { InMemoryCacheBackend } from "../../infrastructure/cache/InMemoryCacheBackend";
import { FileCacheBackend } from "../../infrastructure/cache/FileCacheBackend";
import { fileExists } from "../../shared/fs/atomicWrite";
import { silentLogger, type Logger } from "../../shared/logging/logger";
import { systemClock, type Clock } from "../../shared/time/clock";
import {
  decodeArtifactRecord,
  decodeResultRecord,
  decodeWorkItems,
  type ArtifactRecord,
  type ResultRecord
} from "./cacheRecords";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export type CacheConfig = {
  enabled: boolean;
  ttlMs: Record<CacheTierName, number>;
};

export const defaultCacheConfig: CacheConfig = {
  enabled: true,
  ttlMs: { query: HOUR_MS, artifact: 7 * DAY_MS, result: 30 * DAY_MS }
};

export type TierStats = {
  hits: number;
  misses: number;
  sets: number;
  evictions: number;
};

export type CacheStats = Record<CacheTierName, TierStats>;

type TierOptions<V> = {
  enabled: boolean;
  clock: Clock;
  logger: Logger;
  /** Extra validity check on read; a false result evicts the entry. */
  isStillValid?: (value: V) => Promise<boolean>;
};

/**
 * One cache tier: TTL enforcement, eviction on read, and single-flight
 * `getOrCompute`. When disabled every call passes straight through.
 */
export class CacheTier<V> {
  private readonly inFlight = new Map<string, Promise<V>>();
  private readonly counters: TierStats = { hits: 0, misses: 0, sets: 0, evictions: 0 };

  constructor(
    readonly name: CacheTierName,
    private readonly backend: CacheBackend<V>,
    readonly ttlMs: number,
    private readonly opts: TierOptions<V>
  ) {}

  async get(key: string): Promise<V | undefined> {
    if (!this.opts.enabled) return undefined;

    const entry = await this.backend.read(key);
    if (!entry) {
      this.counters.misses += 1;
      return undefined;
    }

    const expired = entry.expiresAt <= this.opts.clock.now();
    const invalid = !expired && this.opts.isStillValid ? !(await this.opts.isStillValid(entry.value)) : false;
    if (expired || invalid) {
      await this.backend.remove(key);
      this.counters.evictions += 1;
      this.counters.misses += 1;
      this.opts.logger.debug("cache.evicted", { tier: this.name, key, reason: expired ? "expired" : "invalid" });
      return undefined;
    }

    this.counters.hits += 1;
    this.opts.logger.debug("cache.hit", { tier: this.name, key });
    return entry.value;
  }

  async set(key: string, value: V, ttlMs: number = this.ttlMs): Promise<void> {
    if (!this.opts.enabled) return;
    await this.backend.write({ key, tier: this.name, value, expiresAt: this.opts.clock.now() + ttlMs });
    this.counters.sets += 1;
  }

  async delete(key: string): Promise<void> {
    if (!this.opts.enabled) return;
    await this.backend.remove(key);
  }

  async clear(): Promise<void> {
    await this.backend.clear();
  }

  /**
   * Concurrent callers on the same missing key share one compute. A failed
   * compute is not stored and rejects every waiter.
   */
  async getOrCompute(key: string, compute: () => Promise<V>): Promise<V> {
    if (!this.opts.enabled) return compute();

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const task = (async () => {
      const cached = await this.get(key);
      if (cached !== undefined) return cached;
      const value = await compute();
      await this.set(key, value);
      return value;
    })();

    this.inFlight.set(key, task);
    try {
      return await task;
    } finally {
      this.inFlight.delete(key);
    }
  }

  stats(): TierStats {
    return { ...this.counters };
  }
}

const downloadStillPresent = async (record: ArtifactRecord): Promise<boolean> =>
  record.kind === "download" ? fileExists(record.path) : true;

export type CacheBackends = {
  query: CacheBackend<WorkItem[]>;
  artifact: CacheBackend<ArtifactRecord>;
  result: CacheBackend<ResultRecord>;
};

export class CacheLayer {
  readonly query: CacheTier<WorkItem[]>;
  readonly artifact: CacheTier<ArtifactRecord>;
  readonly result: CacheTier<ResultRecord>;

  constructor(
    backends: CacheBackends,
    config: Partial<CacheConfig> = {},
    deps: { clock?: Clock; logger?: Logger } = {}
  ) {
    const enabled = config.enabled ?? defaultCacheConfig.enabled;
    const ttlMs = { ...defaultCacheConfig.ttlMs, ...config.ttlMs };
    const base = { enabled, clock: deps.clock ?? systemClock, logger: deps.logger ?? silentLogger };

    this.query = new CacheTier("query", backends.query, ttlMs.query, base);
    this.artifact = new CacheTier("artifact", backends.artifact, ttlMs.artifact, {
      ...base,
      isStillValid: downloadStillPresent
    });
    this.result = new CacheTier("result", backends.result, ttlMs.result, base);
  }

  static inMemory(config: Partial<CacheConfig> = {}, deps: { clock?: Clock; logger?: Logger } = {}): CacheLayer {
    return new CacheLayer(
      {
        query: new InMemoryCacheBackend(),
        artifact: new InMemoryCacheBackend(),
        result: new InMemoryCacheBackend()
      },
      config,
      deps
    );
  }

  static onDisk(
    rootDir: string,
    config: Partial<CacheConfig> = {},
    deps: { clock?: Clock; logger?: Logger } = {}
  ): CacheLayer {
    return new CacheLayer(
      {
        query: new FileCacheBackend(rootDir, "query", decodeWorkItems),
        artifact: new FileCacheBackend(rootDir, "artifact", decodeArtifactRecord),
        result: new FileCacheBackend(rootDir, "result", decodeResultRecord)
      },
      config,
      deps
    );
  }

  stats(): CacheStats {
    return { query: this.query.stats(), artifact: this.artifact.stats(), result: this.result.stats() };
  }

  async clearAll(): Promise<void> {
    await Promise.all([this.query.clear(), this.artifact.clear(), this.result.clear()]);
  }
}
