import path from "path";
import { CacheLayer } from "../application/cache/CacheLayer";
import { DeduplicationIndex } from "../application/dedup/DeduplicationIndex";
import { ExtractionFallbackChain } from "../application/extraction/ExtractionFallbackChain";
import { resolvePipelineConfig, type PipelineConfig, type PipelineConfigInput } from "../application/pipeline/pipeline.config";
import { PipelineOrchestrator } from "../application/pipeline/PipelineOrchestrator";
import { ResilientCallExecutor } from "../application/resilience/ResilientCallExecutor";
import { ResilientProviderClient } from "../application/summarization/ResilientProviderClient";
import { defaultQualityScorerConfig, HeuristicQualityScorer } from "../core/extraction/qualityScorer";
import { QualityRanker } from "../core/ranking/qualityRanker";
import { HtmlTextBackend } from "../infrastructure/backends/HtmlTextBackend";
import { PdfTextBackend } from "../infrastructure/backends/PdfTextBackend";
import { PlainTextBackend } from "../infrastructure/backends/PlainTextBackend";
import { FileCheckpointStore } from "../infrastructure/fs/FileCheckpointStore";
import { FileDedupHistoryRepository } from "../infrastructure/fs/FileDedupHistoryRepository";
import { HttpDownloader } from "../infrastructure/http/HttpDownloader";
import { HttpSummarizationProvider } from "../infrastructure/http/HttpSummarizationProvider";
import { MongoDedupHistoryRepository } from "../infrastructure/mongo/MongoDedupHistoryRepository";
import type { ConversionBackend } from "../ports/ConversionBackend";
import type { Downloader } from "../ports/Downloader";
import type { SummarizationProvider } from "../ports/SummarizationProvider";
import { loadEnv, type Env } from "../shared/config/env";
import { loadAdapterTimeoutsFromEnv, loadPipelineConfigFromEnv } from "../shared/config/runtime.config";
import { createLogger } from "../shared/logging/logger";
import { systemClock, type Clock } from "../shared/time/clock";

export type BuildPipelineOptions = {
  env?: NodeJS.ProcessEnv;
  /** Replaces the configuration read from PIPELINE_*, RETRY_* and CIRCUIT_* variables. */
  config?: PipelineConfigInput;
  primaryProvider?: SummarizationProvider;
  fallbackProvider?: SummarizationProvider;
  backends?: ConversionBackend[];
  downloader?: Downloader;
  clock?: Clock;
};

export type PipelineHandle = {
  orchestrator: PipelineOrchestrator;
  providerClient: ResilientProviderClient;
  cache: CacheLayer;
  config: PipelineConfig;
  close: () => Promise<void>;
};

const resolveFallbackProvider = (
  env: Env,
  config: PipelineConfig,
  timeoutMs: number,
  override: SummarizationProvider | undefined
): SummarizationProvider | undefined => {
  if (!config.fallbackProvider.enabled) return undefined;
  if (override) return override;
  if (!env.FALLBACK_SUMMARIZER_URL) {
    throw new Error("FALLBACK_SUMMARIZER_URL is required when the fallback provider is enabled");
  }
  return new HttpSummarizationProvider({
    name: "fallback",
    baseUrl: env.FALLBACK_SUMMARIZER_URL,
    apiKey: env.FALLBACK_SUMMARIZER_API_KEY,
    timeoutMs
  });
};

export const buildPipeline = async (opts: BuildPipelineOptions = {}): Promise<PipelineHandle> => {
  const env = loadEnv(opts.env);
  const runtime = loadAdapterTimeoutsFromEnv(opts.env);
  const config = opts.config ? resolvePipelineConfig(opts.config) : loadPipelineConfigFromEnv(opts.env);
  const clock = opts.clock ?? systemClock;
  const logger = createLogger("pipeline", env.LOG_LEVEL);

  const primary =
    opts.primaryProvider ??
    new HttpSummarizationProvider({
      name: "primary",
      baseUrl: env.SUMMARIZER_URL,
      apiKey: env.SUMMARIZER_API_KEY,
      timeoutMs: runtime.summarizerTimeoutMs
    });
  const fallback = resolveFallbackProvider(env, config, runtime.summarizerTimeoutMs, opts.fallbackProvider);

  const executor = new ResilientCallExecutor(config.retry, clock);
  const providerClient = new ResilientProviderClient({
    primary,
    fallback,
    executor,
    config: {
      maxRateLimitWaitMs: config.retry.maxRateLimitWaitMs,
      circuitBreaker: config.circuitBreaker,
      maxTotalCostUsd: config.costLimits.maxTotalCostUsd
    },
    clock,
    logger: logger.child("provider")
  });

  const extractionChain = new ExtractionFallbackChain({
    backends: opts.backends ?? [new PdfTextBackend(), new HtmlTextBackend(), new PlainTextBackend()],
    executor,
    scorer: new HeuristicQualityScorer({ ...defaultQualityScorerConfig, minTextLength: config.minTextLength }),
    config: {
      minQualityScore: config.minQualityScore,
      minTextLength: config.minTextLength,
      conversionTimeoutMs: config.conversionTimeoutMs
    },
    clock,
    logger: logger.child("extraction")
  });

  const cache = CacheLayer.onDisk(path.join(env.DATA_DIR, "cache"), config.cache, {
    clock,
    logger: logger.child("cache")
  });

  const mongoRepo = env.MONGO_URI ? new MongoDedupHistoryRepository(env.MONGO_URI) : undefined;
  const close = async () => {
    await mongoRepo?.close();
  };

  let dedupIndex: DeduplicationIndex;
  try {
    dedupIndex = await DeduplicationIndex.load(
      mongoRepo ?? new FileDedupHistoryRepository(path.join(env.DATA_DIR, "dedup-history.json")),
      config.dedup,
      logger.child("dedup")
    );
  } catch (err) {
    await close();
    throw err;
  }

  const orchestrator = new PipelineOrchestrator({
    config,
    downloader: opts.downloader ?? new HttpDownloader(path.join(env.DATA_DIR, "downloads"), runtime.downloadTimeoutMs),
    executor,
    extractionChain,
    providerClient,
    cache,
    dedupIndex,
    ranker: new QualityRanker(config.ranking, () => clock.now()),
    checkpointStore: new FileCheckpointStore(path.join(env.DATA_DIR, "checkpoints")),
    clock,
    logger
  });

  return { orchestrator, providerClient, cache, config, close };
};
