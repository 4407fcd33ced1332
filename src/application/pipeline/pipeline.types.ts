import type { WorkItem } from "../../core/items/workItem";
import type { SummaryTarget, TokenUsage } from "../../ports/SummarizationProvider";
import type { PipelineErrorCode } from "../../shared/errors/pipeline.errors";
import type { CacheStats } from "../cache/CacheLayer";
import type { BackendUsage } from "../extraction/ExtractionFallbackChain";
import type { ProviderUsage } from "../summarization/ResilientProviderClient";

export type PipelineState = "INIT" | "RUNNING" | "DRAINING" | "DONE" | "PARTIAL";

export type ItemStatus = "completed" | "degraded" | "failed";

export type ContentSource = "document" | "abstract" | "cache";

export type ItemFailure = {
  code: PipelineErrorCode | "unexpected";
  message: string;
};

export type PipelineItemResult = {
  itemId: string;
  title: string;
  status: ItemStatus;
  backend: string | null;
  provider: string | null;
  qualityScore: number;
  contentSource: ContentSource | null;
  summary: Record<string, unknown> | null;
  tokens: TokenUsage;
  costUsd: number;
  fromCache: boolean;
  error: ItemFailure | null;
  durationMs: number;
};

export type RunRequest = {
  runId?: string;
  query: string;
  items: WorkItem[];
  target: SummaryTarget;
  signal?: AbortSignal;
};

export type RunSummary = {
  runId: string;
  state: PipelineState;
  total: number;
  deduplicated: number;
  filteredOut: number;
  resumed: number;
  pending: number;
  completed: number;
  failed: number;
  degraded: number;
  cached: number;
  durationMs: number;
  providers: Record<string, ProviderUsage>;
  backends: Record<string, BackendUsage>;
  cache: CacheStats;
};

/** One-shot stream of item results; `summary()` is final once iteration ends. */
export interface PipelineRun extends AsyncIterable<PipelineItemResult> {
  readonly runId: string;
  readonly state: PipelineState;
  summary(): RunSummary;
}
