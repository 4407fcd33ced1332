import { defaultCircuitBreakerConfig, type CircuitBreakerConfig } from "../../core/resilience/circuitBreaker";
import { defaultRankingConfig, type RankingConfig, type RankingWeights } from "../../core/ranking/qualityRanker";
import { defaultRetryPolicy, type RetryPolicy } from "../../shared/retry/retry";
import { defaultCacheConfig, type CacheConfig } from "../cache/CacheLayer";
import { defaultDedupConfig, type DedupConfig } from "../dedup/DeduplicationIndex";

export type RetryConfig = RetryPolicy & {
  maxRateLimitWaitMs: number; // longer rate-limit hints are not waited out
};

export type PipelineConfig = {
  maxConcurrentDownloads: number;
  maxConcurrentConversions: number;
  maxConcurrentSummaries: number;
  queueSize: number;
  checkpointInterval: number;
  minQualityScore: number;
  minTextLength: number;
  conversionTimeoutMs: number;
  retry: RetryConfig;
  circuitBreaker: CircuitBreakerConfig;
  fallbackProvider: { enabled: boolean };
  costLimits: { maxTotalCostUsd?: number };
  cache: CacheConfig;
  dedup: DedupConfig;
  ranking: RankingConfig;
};

export type PipelineConfigInput = Partial<
  Omit<PipelineConfig, "retry" | "circuitBreaker" | "fallbackProvider" | "costLimits" | "cache" | "dedup" | "ranking">
> & {
  retry?: Partial<RetryConfig>;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  fallbackProvider?: Partial<PipelineConfig["fallbackProvider"]>;
  costLimits?: PipelineConfig["costLimits"];
  cache?: Partial<Omit<CacheConfig, "ttlMs">> & { ttlMs?: Partial<CacheConfig["ttlMs"]> };
  dedup?: Partial<DedupConfig>;
  ranking?: Partial<Omit<RankingConfig, "weights">> & { weights?: Partial<RankingWeights> };
};

export const defaultPipelineConfig: PipelineConfig = {
  maxConcurrentDownloads: 5,
  maxConcurrentConversions: 3,
  maxConcurrentSummaries: 2,
  queueSize: 100,
  checkpointInterval: 10,
  minQualityScore: 0.5,
  minTextLength: 50,
  conversionTimeoutMs: 120000,
  retry: { ...defaultRetryPolicy, maxRateLimitWaitMs: 60000 },
  circuitBreaker: defaultCircuitBreakerConfig,
  fallbackProvider: { enabled: false },
  costLimits: {},
  cache: defaultCacheConfig,
  dedup: defaultDedupConfig,
  ranking: defaultRankingConfig
};

export const pipelineCaps = {
  maxConcurrentDownloads: { min: 1, max: 50 },
  maxConcurrentConversions: { min: 1, max: 50 },
  maxConcurrentSummaries: { min: 1, max: 50 },
  queueSize: { min: 1, max: 10000 },
  checkpointInterval: { min: 1, max: 10000 },
  minTextLength: { min: 0, max: 100000 },
  conversionTimeoutMs: { min: 1000, max: 3600000 },
  retryMaxAttempts: { min: 1, max: 10 },
  retryBaseDelayMs: { min: 0, max: 600000 },
  retryMaxDelayMs: { min: 0, max: 3600000 },
  maxRateLimitWaitMs: { min: 0, max: 3600000 },
  failureThreshold: { min: 1, max: 100 },
  successThreshold: { min: 1, max: 100 },
  cooldownMs: { min: 0, max: 86400000 },
  halfOpenProbeLimit: { min: 1, max: 10 }
} as const;

export const assertIntegerInRange = (name: string, value: number, range: { min: number; max: number }) => {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`);
  }
};

export const assertNumberInRange = (name: string, value: number, range: { min: number; max: number }) => {
  if (!Number.isFinite(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`);
  }
};

const unit = { min: 0, max: 1 };

export const validatePipelineConfig = (config: PipelineConfig): PipelineConfig => {
  const caps = pipelineCaps;
  assertIntegerInRange("maxConcurrentDownloads", config.maxConcurrentDownloads, caps.maxConcurrentDownloads);
  assertIntegerInRange("maxConcurrentConversions", config.maxConcurrentConversions, caps.maxConcurrentConversions);
  assertIntegerInRange("maxConcurrentSummaries", config.maxConcurrentSummaries, caps.maxConcurrentSummaries);
  assertIntegerInRange("queueSize", config.queueSize, caps.queueSize);
  assertIntegerInRange("checkpointInterval", config.checkpointInterval, caps.checkpointInterval);
  assertNumberInRange("minQualityScore", config.minQualityScore, unit);
  assertIntegerInRange("minTextLength", config.minTextLength, caps.minTextLength);
  assertIntegerInRange("conversionTimeoutMs", config.conversionTimeoutMs, caps.conversionTimeoutMs);

  assertIntegerInRange("retry.maxAttempts", config.retry.maxAttempts, caps.retryMaxAttempts);
  assertIntegerInRange("retry.baseDelayMs", config.retry.baseDelayMs, caps.retryBaseDelayMs);
  assertIntegerInRange("retry.maxDelayMs", config.retry.maxDelayMs, caps.retryMaxDelayMs);
  assertNumberInRange("retry.jitterFactor", config.retry.jitterFactor, unit);
  assertIntegerInRange("retry.maxRateLimitWaitMs", config.retry.maxRateLimitWaitMs, caps.maxRateLimitWaitMs);
  if (config.retry.baseDelayMs > config.retry.maxDelayMs) {
    throw new Error("retry.baseDelayMs must not exceed retry.maxDelayMs");
  }

  assertIntegerInRange("circuitBreaker.failureThreshold", config.circuitBreaker.failureThreshold, caps.failureThreshold);
  assertIntegerInRange("circuitBreaker.successThreshold", config.circuitBreaker.successThreshold, caps.successThreshold);
  assertIntegerInRange("circuitBreaker.cooldownMs", config.circuitBreaker.cooldownMs, caps.cooldownMs);
  assertIntegerInRange(
    "circuitBreaker.halfOpenProbeLimit",
    config.circuitBreaker.halfOpenProbeLimit,
    caps.halfOpenProbeLimit
  );

  const costLimit = config.costLimits.maxTotalCostUsd;
  if (costLimit != null) {
    assertNumberInRange("costLimits.maxTotalCostUsd", costLimit, { min: 0, max: Number.MAX_SAFE_INTEGER });
  }
  assertNumberInRange("dedup.titleSimilarityThreshold", config.dedup.titleSimilarityThreshold, unit);

  const { weights } = config.ranking;
  assertNumberInRange("ranking.weights.popularity", weights.popularity, unit);
  assertNumberInRange("ranking.weights.recency", weights.recency, unit);
  assertNumberInRange("ranking.weights.relevance", weights.relevance, unit);
  if (config.ranking.recencyWindowYears <= 0) {
    throw new Error("ranking.recencyWindowYears must be positive");
  }
  return config;
};

/** Shallow merge that ignores `undefined` members of the patch. */
export const mergeDefined = <T extends object>(base: T, patch: Partial<T> | undefined): T => ({
  ...base,
  ...Object.fromEntries(Object.entries(patch ?? {}).filter(([, value]) => value !== undefined))
});

export const resolvePipelineConfig = (input: PipelineConfigInput = {}): PipelineConfig => {
  const { retry, circuitBreaker, fallbackProvider, costLimits, cache, dedup, ranking, ...scalars } = input;
  const defaults = defaultPipelineConfig;
  const cacheInput: NonNullable<PipelineConfigInput["cache"]> = cache ?? {};
  const rankingInput: NonNullable<PipelineConfigInput["ranking"]> = ranking ?? {};
  const { ttlMs, ...cacheSwitches } = cacheInput;
  const { weights, ...rankingRest } = rankingInput;

  return validatePipelineConfig({
    ...mergeDefined(defaults, scalars),
    retry: mergeDefined(defaults.retry, retry),
    circuitBreaker: mergeDefined(defaults.circuitBreaker, circuitBreaker),
    fallbackProvider: mergeDefined(defaults.fallbackProvider, fallbackProvider),
    costLimits: mergeDefined(defaults.costLimits, costLimits),
    cache: { ...mergeDefined(defaults.cache, cacheSwitches), ttlMs: mergeDefined(defaults.cache.ttlMs, ttlMs) },
    dedup: mergeDefined(defaults.dedup, dedup),
    ranking: { ...mergeDefined(defaults.ranking, rankingRest), weights: mergeDefined(defaults.ranking.weights, weights) }
  });
};
