import type { WorkItem } from "../items/workItem";

export type RankingWeights = {
  popularity: number;
  recency: number;
  relevance: number;
};

export type RankingConfig = {
  minPopularity: number;
  minYear?: number;
  maxYear?: number;
  weights: RankingWeights;
  recencyWindowYears: number;
};

export const defaultRankingConfig: RankingConfig = {
  minPopularity: 0,
  weights: { popularity: 0.3, recency: 0.2, relevance: 0.5 },
  recencyWindowYears: 10
};

export type ItemScore = {
  itemId: string;
  popularity: number;
  recency: number;
  relevance: number;
  total: number;
};

const NEUTRAL_RECENCY = 0.5;

/** log10 scale: 1 -> 0, 10 -> 0.33, 100 -> 0.67, 1000+ -> 1. */
export const popularityScore = (popularity: number | undefined): number => {
  if (popularity == null || popularity <= 0) return 0;
  return Math.min(1, Math.log10(popularity) / 3);
};

export const recencyScore = (year: number | undefined, currentYear: number, windowYears: number): number => {
  if (year == null) return NEUTRAL_RECENCY;
  const age = currentYear - year;
  if (age < 0) return NEUTRAL_RECENCY;
  return Math.max(0, 1 - age / windowYears);
};

const tokens = (text: string): Set<string> => new Set(text.toLowerCase().split(/\s+/).filter((word) => word !== ""));

/** Jaccard overlap between query words and title + abstract words. */
export const relevanceScore = (query: string, item: Pick<WorkItem, "title" | "abstract">): number => {
  const queryWords = tokens(query);
  const itemWords = tokens(`${item.title} ${item.abstract ?? ""}`);
  if (queryWords.size === 0 || itemWords.size === 0) return 0;

  let intersection = 0;
  for (const word of queryWords) {
    if (itemWords.has(word)) intersection += 1;
  }
  const union = queryWords.size + itemWords.size - intersection;
  return union > 0 ? intersection / union : 0;
};

export class QualityRanker {
  private readonly config: RankingConfig;

  constructor(
    config: Partial<RankingConfig> = {},
    private readonly now: () => number = Date.now
  ) {
    this.config = {
      ...defaultRankingConfig,
      ...config,
      weights: { ...defaultRankingConfig.weights, ...config.weights }
    };
  }

  /** Drops items under the popularity floor or with a known year outside [minYear, maxYear]. */
  filter(items: WorkItem[]): WorkItem[] {
    const { minPopularity, minYear, maxYear } = this.config;
    return items.filter((item) => {
      if ((item.popularity ?? 0) < minPopularity) return false;
      if (item.publishedYear == null) return true;
      if (minYear != null && item.publishedYear < minYear) return false;
      if (maxYear != null && item.publishedYear > maxYear) return false;
      return true;
    });
  }

  score(item: WorkItem, query: string): ItemScore {
    const currentYear = new Date(this.now()).getUTCFullYear();
    const { weights } = this.config;
    const popularity = popularityScore(item.popularity);
    const recency = recencyScore(item.publishedYear, currentYear, this.config.recencyWindowYears);
    const relevance = relevanceScore(query, item);

    return {
      itemId: item.id,
      popularity,
      recency,
      relevance,
      total: weights.popularity * popularity + weights.recency * recency + weights.relevance * relevance
    };
  }

  /** Highest total first; `Array.prototype.sort` is stable, so ties keep input order. */
  rank(items: WorkItem[], query: string): WorkItem[] {
    return items
      .map((item) => ({ item, total: this.score(item, query).total }))
      .sort((a, b) => b.total - a.total)
      .map(({ item }) => item);
  }

  filterAndRank(items: WorkItem[], query: string): WorkItem[] {
    return this.rank(this.filter(items), query);
  }
}
