import { normalizeTitle, similarityRatio } from "../../core/dedup/titleSimilarity";
import type { WorkItem } from "../../core/items/workItem";
import type { DedupHistoryEntry, DedupHistoryRepository } from "../../ports/DedupHistoryRepository";
import { silentLogger, type Logger } from "../../shared/logging/logger";

export type DedupConfig = {
  enabled: boolean;
  useExternalIdMatching: boolean;
  useTitleMatching: boolean;
  titleSimilarityThreshold: number; // strictly greater than this is a duplicate
};

export const defaultDedupConfig: DedupConfig = {
  enabled: true,
  useExternalIdMatching: true,
  useTitleMatching: true,
  titleSimilarityThreshold: 0.9
};

export type DedupStats = {
  checked: number;
  duplicatesByExternalId: number;
  duplicatesByTitle: number;
  indexedExternalIds: number;
  indexedTitles: number;
};

export type DedupClassification = {
  fresh: WorkItem[];
  duplicates: WorkItem[];
};

type MatchReason = "external_id" | "title";

const normalizeExternalId = (externalId: string | undefined): string | undefined => {
  const normalized = externalId?.trim().toLowerCase();
  return normalized ? normalized : undefined;
};

/**
 * Cross-run duplicate detection: exact external id first, then normalized
 * title similarity. The index only grows; `update` persists new entries
 * through the history repository.
 */
export class DeduplicationIndex {
  private readonly externalIds = new Set<string>();
  private readonly titles = new Map<string, string>(); // normalized title -> item id
  private checked = 0;
  private duplicatesByExternalId = 0;
  private duplicatesByTitle = 0;

  private constructor(
    private readonly repository: DedupHistoryRepository,
    private readonly config: DedupConfig,
    private readonly logger: Logger
  ) {}

  static async load(
    repository: DedupHistoryRepository,
    config: Partial<DedupConfig> = {},
    logger: Logger = silentLogger
  ): Promise<DeduplicationIndex> {
    const index = new DeduplicationIndex(repository, { ...defaultDedupConfig, ...config }, logger);
    const history = await repository.loadAll();
    for (const entry of history) index.remember(entry);
    logger.info("dedup.index_loaded", {
      externalIds: index.externalIds.size,
      titles: index.titles.size
    });
    return index;
  }

  classify(items: WorkItem[]): DedupClassification {
    if (!this.config.enabled) return { fresh: [...items], duplicates: [] };

    const fresh: WorkItem[] = [];
    const duplicates: WorkItem[] = [];
    const batchExternalIds = new Set<string>();
    const batchTitles: string[] = [];

    for (const item of items) {
      this.checked += 1;
      const externalId = normalizeExternalId(item.externalId);
      const title = normalizeTitle(item.title);
      const reason = this.matchReason(externalId, title, batchExternalIds, batchTitles);

      if (reason) {
        duplicates.push(item);
        if (reason === "external_id") this.duplicatesByExternalId += 1;
        else this.duplicatesByTitle += 1;
        this.logger.debug("dedup.duplicate", { itemId: item.id, reason });
        continue;
      }

      fresh.push(item);
      if (externalId) batchExternalIds.add(externalId);
      if (title) batchTitles.push(title);
    }

    this.logger.info("dedup.classified", { total: items.length, fresh: fresh.length, duplicates: duplicates.length });
    return { fresh, duplicates };
  }

  /** Adds processed items to the index and persists the entries that are new to it. */
  async update(items: WorkItem[]): Promise<number> {
    if (!this.config.enabled || items.length === 0) return 0;

    const entries: DedupHistoryEntry[] = [];
    for (const item of items) {
      const entry: DedupHistoryEntry = {
        itemId: item.id,
        externalId: normalizeExternalId(item.externalId),
        normalizedTitle: normalizeTitle(item.title)
      };
      const known =
        (entry.externalId === undefined || this.externalIds.has(entry.externalId)) &&
        (entry.normalizedTitle === "" || this.titles.has(entry.normalizedTitle));
      if (known) continue;

      this.remember(entry);
      entries.push(entry);
    }

    if (entries.length === 0) return 0;
    const { appended } = await this.repository.append(entries);
    this.logger.info("dedup.index_updated", { appended });
    return appended;
  }

  stats(): DedupStats {
    return {
      checked: this.checked,
      duplicatesByExternalId: this.duplicatesByExternalId,
      duplicatesByTitle: this.duplicatesByTitle,
      indexedExternalIds: this.externalIds.size,
      indexedTitles: this.titles.size
    };
  }

  private remember(entry: DedupHistoryEntry): void {
    const externalId = normalizeExternalId(entry.externalId);
    if (externalId) this.externalIds.add(externalId);
    if (entry.normalizedTitle !== "" && !this.titles.has(entry.normalizedTitle)) {
      this.titles.set(entry.normalizedTitle, entry.itemId);
    }
  }

  private matchReason(
    externalId: string | undefined,
    title: string,
    batchExternalIds: Set<string>,
    batchTitles: string[]
  ): MatchReason | undefined {
    if (this.config.useExternalIdMatching && externalId) {
      if (this.externalIds.has(externalId) || batchExternalIds.has(externalId)) return "external_id";
    }

    if (this.config.useTitleMatching && title !== "") {
      if (this.titles.has(title) || batchTitles.includes(title)) return "title";
      const threshold = this.config.titleSimilarityThreshold;
      for (const known of this.titles.keys()) {
        if (similarityRatio(title, known) > threshold) return "title";
      }
      for (const known of batchTitles) {
        if (similarityRatio(title, known) > threshold) return "title";
      }
    }

    return undefined;
  }
}
