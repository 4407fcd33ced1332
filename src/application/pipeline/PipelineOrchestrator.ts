import { randomUUID } from "crypto";
import type { WorkItem } from "../../core/items/workItem";
import type { QualityRanker } from "../../core/ranking/qualityRanker";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import type { Downloader } from "../../ports/Downloader";
import type { SummaryTarget } from "../../ports/SummarizationProvider";
import { BoundedQueue } from "../../shared/concurrency/boundedQueue";
import { createResourceGovernor, type ResourceGovernor } from "../../shared/concurrency/limiter";
import { DownloadError, PipelineError, PipelineFatalError, toErrorMessage } from "../../shared/errors/pipeline.errors";
import { deriveCacheKey } from "../../shared/hash/cacheKey";
import { silentLogger, type Logger } from "../../shared/logging/logger";
import type { ErrorClassification } from "../../shared/retry/retry";
import { systemClock, type Clock } from "../../shared/time/clock";
import type { CacheLayer } from "../cache/CacheLayer";
import type { ResultRecord } from "../cache/cacheRecords";
import type { DeduplicationIndex } from "../dedup/DeduplicationIndex";
import type { ExtractionFallbackChain } from "../extraction/ExtractionFallbackChain";
import type { ResilientCallExecutor } from "../resilience/ResilientCallExecutor";
import type { ResilientProviderClient } from "../summarization/ResilientProviderClient";
import { classifyItemFailure, createRunSummaryTracker, wrapFatalFailure } from "./pipeline.error-handler";
import type { PipelineConfig } from "./pipeline.config";
import type {
  PipelineItemResult,
  PipelineRun,
  PipelineState,
  RunRequest,
  RunSummary
} from "./pipeline.types";

export type OrchestratorDeps = {
  config: PipelineConfig;
  downloader: Downloader;
  executor: ResilientCallExecutor;
  extractionChain: ExtractionFallbackChain;
  providerClient: ResilientProviderClient;
  cache: CacheLayer;
  dedupIndex: DeduplicationIndex;
  ranker: QualityRanker;
  checkpointStore: CheckpointStore;
  clock?: Clock;
  logger?: Logger;
  generateRunId?: () => string;
};

type ItemContent = {
  text: string;
  source: "document" | "abstract";
  backend: string;
  qualityScore: number;
};

type WorkerMessage =
  | { kind: "result"; item: WorkItem; result: PipelineItemResult }
  | { kind: "worker_done" }
  | { kind: "fatal"; error: PipelineFatalError };

const STOP = Symbol("stop");

export const classifyDownloadError = (err: unknown): ErrorClassification =>
  err instanceof DownloadError && err.retryable ? { kind: "retryable" } : { kind: "non_retryable" };

const NO_TOKENS = { inputTokens: 0, outputTokens: 0 };

/**
 * Runs work items through cache, download, conversion and summarization with a
 * fixed worker pool fed by a bounded queue. Create one per pipeline; each
 * `run()` returns an independent one-shot stream of results.
 */
export class PipelineOrchestrator {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly generateRunId: () => string;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
    this.generateRunId = deps.generateRunId ?? (() => `run-${randomUUID()}`);
  }

  run(request: RunRequest): PipelineRun {
    return new ActiveRun(this.deps, request, request.runId ?? this.generateRunId(), this.clock, this.logger);
  }
}

class ActiveRun implements PipelineRun {
  private currentState: PipelineState = "INIT";
  private iterated = false;
  private readonly startedAt: number;
  private finishedAt: number | undefined;
  private readonly tracker = createRunSummaryTracker();
  private readonly governors: Record<"download" | "convert" | "summarize", ResourceGovernor>;
  private readonly logger: Logger;

  private total = 0;
  private deduplicated = 0;
  private filteredOut = 0;
  private resumedItems: WorkItem[] = [];
  private pendingCount = 0;

  private readonly succeeded: WorkItem[] = [];
  private uncheckpointed: string[] = [];
  private consumerGone = false;
  private fatal: PipelineFatalError | undefined;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly request: RunRequest,
    readonly runId: string,
    private readonly clock: Clock,
    logger: Logger
  ) {
    this.startedAt = clock.now();
    this.logger = logger.child("pipeline", { runId });
    const { config } = deps;
    this.governors = {
      download: createResourceGovernor("download", config.maxConcurrentDownloads),
      convert: createResourceGovernor("convert", config.maxConcurrentConversions),
      summarize: createResourceGovernor("summarize", config.maxConcurrentSummaries)
    };
  }

  get state(): PipelineState {
    return this.currentState;
  }

  [Symbol.asyncIterator](): AsyncIterator<PipelineItemResult> {
    if (this.iterated) {
      throw new Error(`Pipeline run ${this.runId} can only be iterated once`);
    }
    this.iterated = true;
    return this.execute();
  }

  summary(): RunSummary {
    const counters = this.tracker.counters();
    return {
      runId: this.runId,
      state: this.currentState,
      total: this.total,
      deduplicated: this.deduplicated,
      filteredOut: this.filteredOut,
      resumed: this.resumedItems.length,
      pending: this.pendingCount,
      ...counters,
      durationMs: (this.finishedAt ?? this.clock.now()) - this.startedAt,
      providers: this.deps.providerClient.usage(),
      backends: this.deps.extractionChain.usage(),
      cache: this.deps.cache.stats()
    };
  }

  private async *execute(): AsyncGenerator<PipelineItemResult> {
    const pending = await this.prepare();
    if (pending.length === 0) {
      await this.complete();
      return;
    }

    this.currentState = "RUNNING";
    const workerCount = Math.min(this.deps.config.maxConcurrentDownloads, pending.length);
    const queue = new BoundedQueue<WorkItem | typeof STOP>(this.deps.config.queueSize);
    const results = new BoundedQueue<WorkerMessage>(this.deps.config.queueSize);

    const tasks = [
      this.produce(pending, queue, workerCount),
      ...Array.from({ length: workerCount }, (_, index) => this.work(index, queue, results))
    ];

    let workersDone = 0;
    const receive = async (): Promise<PipelineItemResult | undefined> => {
      const message = await results.take();
      if (message.kind === "worker_done") {
        workersDone += 1;
        return undefined;
      }
      if (message.kind === "fatal") {
        this.fatal ??= message.error;
        return undefined;
      }
      await this.accept(message.item, message.result);
      return this.fatal ? undefined : message.result;
    };

    try {
      while (workersDone < workerCount) {
        const result = await receive();
        if (result) yield result;
      }
    } finally {
      if (workersDone < workerCount) {
        this.consumerGone = true;
        this.logger.info("pipeline.consumer_stopped", { pending: workerCount - workersDone });
        while (workersDone < workerCount) await receive();
      }
      await Promise.all(tasks);
      await this.complete();
    }
  }

  /** INIT: checkpoint, dedup, filter and rank, resume filter. */
  private async prepare(): Promise<WorkItem[]> {
    const { dedupIndex, ranker, checkpointStore } = this.deps;
    const { items, query } = this.request;

    let done: Set<string>;
    try {
      done = await checkpointStore.loadCompleted(this.runId);
    } catch (err) {
      this.currentState = "PARTIAL";
      this.finishedAt = this.clock.now();
      const fatal = wrapFatalFailure(err, { runId: this.runId, stage: "init" });
      this.logger.error("pipeline.fatal", { stage: "init", error: fatal.message });
      throw fatal;
    }

    const { fresh, duplicates } = dedupIndex.classify(items);
    const ranked = ranker.filterAndRank(fresh, query);
    const pending = ranked.filter((item) => !done.has(item.id));

    this.total = items.length;
    this.deduplicated = duplicates.length;
    this.filteredOut = fresh.length - ranked.length;
    this.resumedItems = ranked.filter((item) => done.has(item.id));
    this.pendingCount = pending.length;

    this.logger.info("pipeline.started", {
      total: this.total,
      deduplicated: this.deduplicated,
      filteredOut: this.filteredOut,
      resumed: this.resumedItems.length,
      pending: pending.length
    });
    return pending;
  }

  private stopRequested(): boolean {
    return this.consumerGone || this.fatal !== undefined || this.request.signal?.aborted === true;
  }

  private async produce(pending: WorkItem[], queue: BoundedQueue<WorkItem | typeof STOP>, workers: number) {
    for (const item of pending) {
      if (this.stopRequested()) break;
      await queue.put(item);
    }
    this.currentState = "DRAINING";
    for (let i = 0; i < workers; i += 1) {
      await queue.put(STOP);
    }
  }

  private async work(
    workerIndex: number,
    queue: BoundedQueue<WorkItem | typeof STOP>,
    results: BoundedQueue<WorkerMessage>
  ): Promise<void> {
    try {
      for (let next = await queue.take(); next !== STOP; next = await queue.take()) {
        // queued items are skipped once a stop is requested; the in-flight one always finishes
        if (this.stopRequested()) continue;
        const result = await this.processItem(next);
        await results.put({ kind: "result", item: next, result });
      }
    } catch (err) {
      const error = wrapFatalFailure(err, { runId: this.runId, stage: "worker" });
      this.logger.error("pipeline.worker_crashed", { worker: workerIndex, error: error.message });
      await results.put({ kind: "fatal", error });
    } finally {
      await results.put({ kind: "worker_done" });
    }
  }

  /** Consumer side bookkeeping: counters, then a checkpoint every `checkpointInterval` successes. */
  private async accept(item: WorkItem, result: PipelineItemResult): Promise<void> {
    this.tracker.record(result);
    if (result.status === "failed") return;

    this.succeeded.push(item);
    this.uncheckpointed.push(item.id);
    if (!this.fatal && this.tracker.checkpointDue(this.deps.config.checkpointInterval)) {
      await this.flushCheckpoint();
    }
  }

  private async flushCheckpoint(): Promise<void> {
    if (this.uncheckpointed.length === 0) return;
    const ids = this.uncheckpointed;
    try {
      await this.deps.checkpointStore.recordCompletedMany(this.runId, ids);
      this.uncheckpointed = [];
      this.tracker.markCheckpointed();
      this.logger.debug("checkpoint.saved", { count: ids.length });
    } catch (err) {
      this.fatal ??= wrapFatalFailure(err, { runId: this.runId, stage: "checkpoint" });
      this.logger.error("pipeline.fatal", { stage: "checkpoint", error: toErrorMessage(err) });
    }
  }

  /** Final transition: PARTIAL keeps the checkpoint, DONE clears it and records dedup history. */
  private async complete(): Promise<void> {
    if (!this.fatal) await this.flushCheckpoint();

    const interrupted = this.consumerGone || this.request.signal?.aborted === true;
    if (this.fatal || interrupted) {
      this.currentState = "PARTIAL";
      this.finishedAt = this.clock.now();
      this.logger.warn("pipeline.partial", {
        reason: this.fatal ? "fatal" : this.consumerGone ? "consumer_stopped" : "cancelled",
        ...this.tracker.counters()
      });
      if (this.fatal) throw this.fatal;
      return;
    }

    try {
      await this.deps.dedupIndex.update([...this.resumedItems, ...this.succeeded]);
    } catch (err) {
      throw this.fail(err, "dedup_update");
    }
    try {
      await this.deps.checkpointStore.clear(this.runId);
    } catch (err) {
      throw this.fail(err, "checkpoint");
    }

    this.currentState = "DONE";
    this.finishedAt = this.clock.now();
    this.logger.info("pipeline.completed", { ...this.summary() });
  }

  private fail(err: unknown, stage: "dedup_update" | "checkpoint"): PipelineFatalError {
    this.currentState = "PARTIAL";
    this.finishedAt = this.clock.now();
    this.fatal = wrapFatalFailure(err, { runId: this.runId, stage });
    this.logger.error("pipeline.fatal", { stage, error: this.fatal.message });
    return this.fatal;
  }

  private async processItem(item: WorkItem): Promise<PipelineItemResult> {
    const startedAt = this.clock.now();
    const { cache, config } = this.deps;
    const { target } = this.request;

    try {
      const resultKey = this.resultKey(item, target);
      const cached = await cache.result.get(resultKey);
      if (cached) {
        this.logger.debug("cache.hit", { itemId: item.id, tier: "result" });
        return this.fromRecord(item, cached, startedAt);
      }

      const content = await this.obtainContent(item);
      const outcome = await this.governors.summarize.run(() =>
        this.deps.providerClient.extract(content.text, target, { itemId: item.id })
      );

      const degraded =
        content.source === "abstract" || content.qualityScore < config.minQualityScore || outcome.usedFallback;
      const record: ResultRecord = {
        status: degraded ? "degraded" : "completed",
        provider: outcome.provider,
        backend: content.backend,
        contentSource: content.source,
        qualityScore: content.qualityScore,
        result: outcome.result,
        usage: outcome.usage,
        costUsd: outcome.costUsd,
        usedFallback: outcome.usedFallback
      };
      await cache.result.set(resultKey, record);

      this.logger.debug("pipeline.item_completed", { itemId: item.id, status: record.status });
      return {
        itemId: item.id,
        title: item.title,
        status: record.status,
        backend: record.backend,
        provider: record.provider,
        qualityScore: record.qualityScore,
        contentSource: record.contentSource,
        summary: record.result,
        tokens: { ...record.usage },
        costUsd: record.costUsd,
        fromCache: false,
        error: null,
        durationMs: this.clock.now() - startedAt
      };
    } catch (err) {
      const failure = classifyItemFailure(err);
      this.logger.warn("pipeline.item_failed", { itemId: item.id, code: failure.code, error: failure.message });
      return {
        itemId: item.id,
        title: item.title,
        status: "failed",
        backend: null,
        provider: null,
        qualityScore: 0,
        contentSource: null,
        summary: null,
        tokens: { ...NO_TOKENS },
        costUsd: 0,
        fromCache: false,
        error: failure,
        durationMs: this.clock.now() - startedAt
      };
    }
  }

  private fromRecord(item: WorkItem, record: ResultRecord, startedAt: number): PipelineItemResult {
    return {
      itemId: item.id,
      title: item.title,
      status: record.status,
      backend: record.backend,
      provider: record.provider,
      qualityScore: record.qualityScore,
      contentSource: "cache",
      summary: record.result,
      tokens: { ...NO_TOKENS },
      costUsd: 0,
      fromCache: true,
      error: null,
      durationMs: this.clock.now() - startedAt
    };
  }

  /** Document text when any backend produced some; otherwise title + abstract. */
  private async obtainContent(item: WorkItem): Promise<ItemContent> {
    const { cache, extractionChain } = this.deps;
    const conversionKey = deriveCacheKey("conversion", {
      itemId: item.id,
      sourceLocation: item.sourceLocation,
      chain: extractionChain.fingerprint()
    });

    const cached = await cache.artifact.get(conversionKey);
    if (cached?.kind === "conversion") {
      return { text: cached.text, source: "document", backend: cached.backend, qualityScore: cached.qualityScore };
    }

    let failure: string;
    try {
      const localPath = await this.download(item);
      const attempt = await this.governors.convert.run(() => extractionChain.convert(item, { sourcePath: localPath }));
      if (attempt.success && attempt.text) {
        await cache.artifact.set(conversionKey, {
          kind: "conversion",
          backend: attempt.backend,
          backendKind: attempt.backendKind,
          text: attempt.text,
          qualityScore: attempt.qualityScore,
          pageCount: attempt.pageCount
        });
        return { text: attempt.text, source: "document", backend: attempt.backend, qualityScore: attempt.qualityScore };
      }
      failure = attempt.error ?? "no text extracted";
    } catch (err) {
      failure = toErrorMessage(err);
      this.logger.warn("pipeline.download_failed", { itemId: item.id, error: failure });
    }

    if (!item.abstract) {
      throw new PipelineError("no_content", `No content for item ${item.id}: ${failure}`);
    }
    this.logger.info("pipeline.abstract_fallback", { itemId: item.id, reason: failure });
    return { text: `${item.title}\n\n${item.abstract}`, source: "abstract", backend: "none", qualityScore: 0 };
  }

  private async download(item: WorkItem): Promise<string> {
    const downloadKey = deriveCacheKey("download", { sourceLocation: item.sourceLocation });
    const record = await this.deps.cache.artifact.getOrCompute(downloadKey, async () => ({
      kind: "download",
      path: await this.governors.download.run(() =>
        this.deps.executor.execute(() => this.deps.downloader.download(item), classifyDownloadError, {
          onAttempt: (report) => {
            if (report.outcome !== "retry") return;
            this.logger.warn("download.retry", {
              itemId: item.id,
              attempt: report.attempt,
              delayMs: report.delayMs,
              error: toErrorMessage(report.error)
            });
          }
        })
      )
    }));
    if (record.kind !== "download") {
      throw new PipelineError("no_content", `Unexpected artifact for ${item.sourceLocation}`);
    }
    return record.path;
  }

  private resultKey(item: WorkItem, target: SummaryTarget): string {
    return deriveCacheKey("result", {
      itemId: item.id,
      sourceLocation: item.sourceLocation,
      target: { name: target.name, instructions: target.instructions, fields: target.fields },
      chain: this.deps.extractionChain.fingerprint(),
      providers: this.deps.providerClient.providerNames()
    });
  }
}
