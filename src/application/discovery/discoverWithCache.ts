import type { WorkItem } from "../../core/items/workItem";
import type { DiscoveryClient } from "../../ports/DiscoveryClient";
import { deriveCacheKey } from "../../shared/hash/cacheKey";
import type { CacheLayer } from "../cache/CacheLayer";

/** Discovery results are cached in the query tier, keyed by the normalized query. */
export const discoverWithCache = (
  deps: { client: DiscoveryClient; cache: CacheLayer },
  query: string
): Promise<WorkItem[]> => {
  const normalized = query.trim().replace(/\s+/g, " ").toLowerCase();
  const key = deriveCacheKey("query", { query: normalized });
  return deps.cache.query.getOrCompute(key, () => deps.client.discover(query));
};
