import type { WorkItem } from "../../core/items/workItem";
import { failedAttempt, type ExtractionAttempt } from "../../core/extraction/extraction.types";
import type { QualityScorer } from "../../core/extraction/qualityScorer";
import type { ConversionBackend, ConversionOutput } from "../../ports/ConversionBackend";
import {
  ConversionTimeoutError,
  RateLimitedError,
  TransientProviderError,
  toErrorMessage
} from "../../shared/errors/pipeline.errors";
import { silentLogger, type Logger } from "../../shared/logging/logger";
import type { ErrorClassification } from "../../shared/retry/retry";
import { systemClock, type Clock } from "../../shared/time/clock";
import type { ResilientCallExecutor } from "../resilience/ResilientCallExecutor";

export type ExtractionChainConfig = {
  minQualityScore: number;
  minTextLength: number;
  conversionTimeoutMs: number;
};

export const defaultExtractionChainConfig: ExtractionChainConfig = {
  minQualityScore: 0.5,
  minTextLength: 50,
  conversionTimeoutMs: 120000
};

export type BackendUsage = {
  attempts: number;
  successes: number;
  failures: number;
  selected: number;
  totalDurationMs: number;
};

export const classifyConversionError = (err: unknown): ErrorClassification => {
  if (err instanceof ConversionTimeoutError || err instanceof TransientProviderError) return { kind: "retryable" };
  if (err instanceof RateLimitedError) return { kind: "rate_limited", waitMs: err.waitMs };
  return { kind: "non_retryable" };
};

const emptyUsage = (): BackendUsage => ({ attempts: 0, successes: 0, failures: 0, selected: 0, totalDurationMs: 0 });

/**
 * Tries conversion backends in priority order and stops at the first output whose
 * quality score reaches `minQualityScore`. When none does, the best-scoring output
 * with text wins; when no backend produced text, a failed attempt is returned and
 * the caller decides how to degrade.
 */
export class ExtractionFallbackChain {
  private readonly backends: ConversionBackend[];
  private readonly unavailable: string[];
  private readonly usageByBackend = new Map<string, BackendUsage>();
  private readonly config: ExtractionChainConfig;
  private readonly executor: ResilientCallExecutor;
  private readonly scorer: QualityScorer;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: {
    backends: ConversionBackend[];
    executor: ResilientCallExecutor;
    scorer: QualityScorer;
    config?: Partial<ExtractionChainConfig>;
    clock?: Clock;
    logger?: Logger;
  }) {
    this.config = { ...defaultExtractionChainConfig, ...deps.config };
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
    this.executor = deps.executor;
    this.scorer = deps.scorer;

    this.backends = [];
    this.unavailable = [];
    for (const backend of deps.backends) {
      if (backend.isAvailable()) {
        this.backends.push(backend);
        this.usageByBackend.set(backend.name, emptyUsage());
      } else {
        this.unavailable.push(backend.name);
        this.logger.warn("extraction.backend_unavailable", { backend: backend.name });
      }
    }
  }

  availableBackends(): string[] {
    return this.backends.map((backend) => backend.name);
  }

  unavailableBackends(): string[] {
    return [...this.unavailable];
  }

  usage(): Record<string, BackendUsage> {
    return Object.fromEntries(Array.from(this.usageByBackend, ([name, usage]) => [name, { ...usage }]));
  }

  /** Parameters that change conversion output; part of the artifact cache key. */
  fingerprint(): { backends: string[]; minQualityScore: number; minTextLength: number } {
    return {
      backends: this.availableBackends(),
      minQualityScore: this.config.minQualityScore,
      minTextLength: this.config.minTextLength
    };
  }

  async convert(item: WorkItem, opts: { sourcePath?: string; signal?: AbortSignal } = {}): Promise<ExtractionAttempt> {
    const sourcePath = opts.sourcePath ?? item.sourceLocation;
    const chainStartedAt = this.clock.now();
    let best: ExtractionAttempt | undefined;

    if (this.backends.length === 0) {
      return failedAttempt("No conversion backends available");
    }

    for (const backend of this.backends) {
      const attempt = await this.attempt(backend, sourcePath, item, opts.signal);
      if (!attempt.success) continue;

      if (attempt.qualityScore >= this.config.minQualityScore) {
        this.markSelected(attempt, item, "quality_threshold_met");
        return attempt;
      }

      if (!best || attempt.qualityScore > best.qualityScore) {
        best = attempt;
      }
    }

    if (best) {
      this.markSelected(best, item, "best_available");
      return best;
    }

    this.logger.warn("extraction.all_backends_failed", { itemId: item.id, backends: this.availableBackends() });
    return failedAttempt("All conversion backends failed", this.clock.now() - chainStartedAt);
  }

  private async attempt(
    backend: ConversionBackend,
    sourcePath: string,
    item: WorkItem,
    signal?: AbortSignal
  ): Promise<ExtractionAttempt> {
    const usage = this.usageByBackend.get(backend.name) ?? emptyUsage();
    this.usageByBackend.set(backend.name, usage);
    const startedAt = this.clock.now();

    try {
      const output = await this.executor.execute(
        () => this.convertWithTimeout(backend, sourcePath, signal),
        classifyConversionError,
        {
          signal,
          onAttempt: (report) => {
            usage.attempts += 1;
            if (report.outcome === "retry") {
              this.logger.warn("extraction.retry", {
                itemId: item.id,
                backend: backend.name,
                attempt: report.attempt,
                delayMs: report.delayMs,
                error: toErrorMessage(report.error)
              });
            }
          }
        }
      );

      const durationMs = this.clock.now() - startedAt;
      usage.totalDurationMs += durationMs;
      const text = output.text.trim();
      if (text === "") {
        usage.failures += 1;
        return this.buildAttempt(backend, { success: false, text: null, qualityScore: 0, durationMs, error: "empty output" });
      }

      usage.successes += 1;
      const qualityScore = this.scoreOutput({ ...output, text });
      this.logger.debug("extraction.attempt_scored", { itemId: item.id, backend: backend.name, qualityScore });
      return this.buildAttempt(backend, {
        success: true,
        text,
        qualityScore,
        durationMs,
        error: null,
        pageCount: output.pageCount
      });
    } catch (err) {
      const durationMs = this.clock.now() - startedAt;
      usage.totalDurationMs += durationMs;
      usage.failures += 1;
      this.logger.warn("extraction.attempt_failed", {
        itemId: item.id,
        backend: backend.name,
        error: toErrorMessage(err)
      });
      return this.buildAttempt(backend, {
        success: false,
        text: null,
        qualityScore: 0,
        durationMs,
        error: toErrorMessage(err)
      });
    }
  }

  private scoreOutput(output: ConversionOutput): number {
    if (output.text.length < this.config.minTextLength) return 0;
    const raw = this.scorer.score(output);
    return Number.isFinite(raw) ? Math.min(1, Math.max(0, raw)) : 0;
  }

  private async convertWithTimeout(
    backend: ConversionBackend,
    sourcePath: string,
    signal?: AbortSignal
  ): Promise<ConversionOutput> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        // reject first; the race settles on the earliest rejection
        reject(new ConversionTimeoutError(backend.name, this.config.conversionTimeoutMs));
        controller.abort();
      }, this.config.conversionTimeoutMs);
    });

    try {
      return await Promise.race([backend.convert(sourcePath, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private buildAttempt(
    backend: ConversionBackend,
    fields: Omit<ExtractionAttempt, "backend" | "backendKind">
  ): ExtractionAttempt {
    return Object.freeze({ backend: backend.name, backendKind: backend.kind, ...fields });
  }

  private markSelected(attempt: ExtractionAttempt, item: WorkItem, reason: string): void {
    const usage = this.usageByBackend.get(attempt.backend);
    if (usage) usage.selected += 1;
    this.logger.info("extraction.backend_selected", {
      itemId: item.id,
      backend: attempt.backend,
      qualityScore: Number(attempt.qualityScore.toFixed(3)),
      reason
    });
  }
}
