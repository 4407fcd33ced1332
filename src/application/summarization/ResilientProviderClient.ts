import {
  CircuitBreaker,
  defaultCircuitBreakerConfig,
  type CircuitBreakerConfig,
  type ProviderHealth
} from "../../core/resilience/circuitBreaker";
import type {
  SummarizationProvider,
  SummarizationResponse,
  SummaryTarget,
  TokenUsage
} from "../../ports/SummarizationProvider";
import {
  AllProvidersFailedError,
  CostLimitExceededError,
  PermanentProviderError,
  QuotaExhaustedError,
  RateLimitedError,
  TransientProviderError,
  toErrorMessage
} from "../../shared/errors/pipeline.errors";
import { silentLogger, type Logger } from "../../shared/logging/logger";
import type { ErrorClassification } from "../../shared/retry/retry";
import { AbortedError, systemClock, type Clock } from "../../shared/time/clock";
import { ResilientCallExecutor } from "../resilience/ResilientCallExecutor";

export type ProviderUsage = {
  requests: number;
  successes: number;
  failures: number;
  retries: number;
  fallbacks: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
};

export type SummarizationOutcome = {
  provider: string;
  result: Record<string, unknown>;
  usage: TokenUsage;
  costUsd: number;
  usedFallback: boolean;
  attempts: number;
};

export type ProviderClientConfig = {
  maxRateLimitWaitMs: number;
  circuitBreaker: CircuitBreakerConfig;
  maxTotalCostUsd?: number;
};

export const defaultProviderClientConfig: ProviderClientConfig = {
  maxRateLimitWaitMs: 60000,
  circuitBreaker: defaultCircuitBreakerConfig
};

export type ProviderHealthReport = ProviderHealth & {
  quotaExhausted: boolean;
  usage: ProviderUsage;
};

type ProviderSlot = {
  provider: SummarizationProvider;
  breaker: CircuitBreaker;
  usage: ProviderUsage;
  quotaExhausted: boolean;
};

const emptyUsage = (): ProviderUsage => ({
  requests: 0,
  successes: 0,
  failures: 0,
  retries: 0,
  fallbacks: 0,
  inputTokens: 0,
  outputTokens: 0,
  costUsd: 0
});

export const calculateCost = (provider: SummarizationProvider, usage: TokenUsage): number => {
  if (!provider.pricing) return 0;
  return (
    (usage.inputTokens / 1000) * provider.pricing.inputPer1k +
    (usage.outputTokens / 1000) * provider.pricing.outputPer1k
  );
};

/**
 * Error classification for provider calls. A rate-limit hint longer than
 * `maxRateLimitWaitMs` is treated as terminal so the caller can fall back
 * instead of parking a worker.
 */
export const classifyProviderError = (maxRateLimitWaitMs: number) => (err: unknown): ErrorClassification => {
  if (err instanceof RateLimitedError) {
    if (err.waitMs != null && err.waitMs > maxRateLimitWaitMs) return { kind: "non_retryable" };
    return { kind: "rate_limited", waitMs: err.waitMs };
  }
  if (err instanceof TransientProviderError) return { kind: "retryable" };
  if (err instanceof QuotaExhaustedError || err instanceof PermanentProviderError) return { kind: "non_retryable" };
  if (err instanceof AbortedError) return { kind: "non_retryable" };
  // untyped errors from a provider are most often network failures
  return { kind: "retryable" };
};

/**
 * Summarization with retry, a circuit breaker per provider and an optional
 * fallback provider. Owns all provider health state; create one per pipeline.
 */
export class ResilientProviderClient {
  private readonly slots: ProviderSlot[];
  private readonly config: ProviderClientConfig;
  private readonly executor: ResilientCallExecutor;
  private readonly classify: (err: unknown) => ErrorClassification;
  private readonly logger: Logger;
  private totalCostUsd = 0;

  constructor(deps: {
    primary: SummarizationProvider;
    fallback?: SummarizationProvider;
    executor?: ResilientCallExecutor;
    config?: Partial<ProviderClientConfig>;
    clock?: Clock;
    logger?: Logger;
  }) {
    this.config = { ...defaultProviderClientConfig, ...deps.config };
    const clock = deps.clock ?? systemClock;
    this.executor = deps.executor ?? new ResilientCallExecutor(undefined, clock);
    this.classify = classifyProviderError(this.config.maxRateLimitWaitMs);
    this.logger = deps.logger ?? silentLogger;

    const providers = deps.fallback ? [deps.primary, deps.fallback] : [deps.primary];
    if (new Set(providers.map((provider) => provider.name)).size !== providers.length) {
      throw new Error("primary and fallback providers must have distinct names");
    }

    this.slots = providers.map((provider) => ({
      provider,
      usage: emptyUsage(),
      quotaExhausted: false,
      breaker: new CircuitBreaker(provider.name, this.config.circuitBreaker, () => clock.now(), ({ from, to }) => {
        const event = to === "OPEN" ? "circuit.opened" : to === "CLOSED" ? "circuit.closed" : "circuit.half_open";
        const log = to === "OPEN" ? this.logger.warn.bind(this.logger) : this.logger.info.bind(this.logger);
        log(event, { provider: provider.name, from, to });
      })
    }));
  }

  providerNames(): string[] {
    return this.slots.map((slot) => slot.provider.name);
  }

  totalCost(): number {
    return this.totalCostUsd;
  }

  async extract(
    content: string,
    target: SummaryTarget,
    opts: { signal?: AbortSignal; itemId?: string } = {}
  ): Promise<SummarizationOutcome> {
    const limit = this.config.maxTotalCostUsd;
    if (limit != null && this.totalCostUsd >= limit) {
      throw new CostLimitExceededError(this.totalCostUsd, limit);
    }

    const providerErrors: Record<string, string> = {};

    for (const [index, slot] of this.slots.entries()) {
      const name = slot.provider.name;
      const usedFallback = index > 0;

      if (slot.quotaExhausted) {
        providerErrors[name] = "quota exhausted";
        continue;
      }
      const permit = slot.breaker.tryAcquire();
      if (!permit) {
        providerErrors[name] = "circuit open";
        this.logger.debug("provider.circuit_skip", { provider: name, itemId: opts.itemId });
        continue;
      }

      if (usedFallback) {
        slot.usage.fallbacks += 1;
        this.logger.warn("provider.fallback", {
          provider: name,
          itemId: opts.itemId,
          primaryError: providerErrors[this.slots[0].provider.name]
        });
      }

      try {
        const { response, attempts } = await this.callWithRetry(slot, content, target, opts);
        slot.breaker.recordSuccess(permit);
        return this.recordSuccess(slot, response, attempts, usedFallback);
      } catch (err) {
        if (err instanceof AbortedError || opts.signal?.aborted) {
          slot.breaker.release(permit);
          throw err;
        }

        providerErrors[name] = toErrorMessage(err);
        if (err instanceof QuotaExhaustedError) {
          slot.quotaExhausted = true;
          slot.breaker.release(permit);
          this.logger.warn("provider.quota_exhausted", { provider: name, error: toErrorMessage(err) });
          continue;
        }

        slot.breaker.recordFailure(permit);
        slot.usage.failures += 1;
        this.logger.warn("provider.failed", { provider: name, itemId: opts.itemId, error: toErrorMessage(err) });
      }
    }

    throw new AllProvidersFailedError(providerErrors);
  }

  getHealth(): Record<string, ProviderHealthReport> {
    return Object.fromEntries(
      this.slots.map((slot) => [
        slot.provider.name,
        { ...slot.breaker.snapshot(), quotaExhausted: slot.quotaExhausted, usage: { ...slot.usage } }
      ])
    );
  }

  usage(): Record<string, ProviderUsage> {
    return Object.fromEntries(this.slots.map((slot) => [slot.provider.name, { ...slot.usage }]));
  }

  resetCircuits(): void {
    for (const slot of this.slots) slot.breaker.reset();
  }

  private async callWithRetry(
    slot: ProviderSlot,
    content: string,
    target: SummaryTarget,
    opts: { signal?: AbortSignal; itemId?: string }
  ): Promise<{ response: SummarizationResponse; attempts: number }> {
    let attempts = 0;
    const response = await this.executor.execute(
      () => {
        slot.usage.requests += 1;
        return slot.provider.summarize(content, target, opts.signal);
      },
      this.classify,
      {
        signal: opts.signal,
        onAttempt: (report) => {
          attempts = report.attempt;
          if (report.outcome !== "retry") return;
          slot.usage.retries += 1;
          this.logger.warn("provider.retry", {
            provider: slot.provider.name,
            itemId: opts.itemId,
            attempt: report.attempt,
            delayMs: report.delayMs,
            error: toErrorMessage(report.error)
          });
        }
      }
    );
    return { response, attempts };
  }

  private recordSuccess(
    slot: ProviderSlot,
    response: SummarizationResponse,
    attempts: number,
    usedFallback: boolean
  ): SummarizationOutcome {
    const costUsd = calculateCost(slot.provider, response.usage);
    slot.usage.successes += 1;
    slot.usage.inputTokens += response.usage.inputTokens;
    slot.usage.outputTokens += response.usage.outputTokens;
    slot.usage.costUsd += costUsd;
    this.totalCostUsd += costUsd;

    return {
      provider: slot.provider.name,
      result: response.result,
      usage: { ...response.usage },
      costUsd,
      usedFallback,
      attempts
    };
  }
}
