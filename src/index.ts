export { buildPipeline, type BuildPipelineOptions, type PipelineHandle } from "./composition/root";
export { PipelineOrchestrator, type OrchestratorDeps } from "./application/pipeline/PipelineOrchestrator";
export {
  defaultPipelineConfig,
  resolvePipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput
} from "./application/pipeline/pipeline.config";
export type {
  PipelineItemResult,
  PipelineRun,
  PipelineState,
  RunRequest,
  RunSummary
} from "./application/pipeline/pipeline.types";
export { ResilientCallExecutor } from "./application/resilience/ResilientCallExecutor";
export { ResilientProviderClient, type SummarizationOutcome } from "./application/summarization/ResilientProviderClient";
export { ExtractionFallbackChain } from "./application/extraction/ExtractionFallbackChain";
export { CacheLayer } from "./application/cache/CacheLayer";
export { DeduplicationIndex } from "./application/dedup/DeduplicationIndex";
export { discoverWithCache } from "./application/discovery/discoverWithCache";
export { CircuitBreaker, type CircuitState } from "./core/resilience/circuitBreaker";
export { HeuristicQualityScorer, type QualityScorer } from "./core/extraction/qualityScorer";
export { QualityRanker } from "./core/ranking/qualityRanker";
export { createWorkItem, type WorkItem, type WorkItemInput } from "./core/items/workItem";
export { FileCheckpointStore } from "./infrastructure/fs/FileCheckpointStore";
export type { CheckpointStore } from "./ports/CheckpointStore";
export type { ConversionBackend, ConversionOutput } from "./ports/ConversionBackend";
export type { DiscoveryClient } from "./ports/DiscoveryClient";
export type { Downloader } from "./ports/Downloader";
export type { SummarizationProvider, SummaryTarget } from "./ports/SummarizationProvider";
export * from "./shared/errors/pipeline.errors";
export { Logger, createLogger } from "./shared/logging/logger";
export type { Clock } from "./shared/time/clock";
