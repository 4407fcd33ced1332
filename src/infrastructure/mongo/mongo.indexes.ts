import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

/**
 * Index plan for the dedup history collection. Applied lazily on first use;
 * `createIndex` is idempotent.
 * - `_id` is the item id
 * - externalId lookups skip entries without one
 */
export const mongoIndexes: {
  dedupHistory: { keys: IndexSpecification; options: CreateIndexesOptions }[];
} = {
  dedupHistory: [
    { keys: { externalId: 1 }, options: { sparse: true } },
    { keys: { normalizedTitle: 1 }, options: {} }
  ]
};
