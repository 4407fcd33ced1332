export type ProviderErrorCode =
  | "transient"
  | "rate_limited"
  | "quota_exhausted"
  | "permanent"
  | "all_providers_failed"
  | "cost_limit_exceeded";

export type PipelineErrorCode =
  | ProviderErrorCode
  | "download_failed"
  | "conversion_timeout"
  | "no_content"
  | "checkpoint_storage_failed"
  | "pipeline_fatal";

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "PipelineError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Network timeout, 5xx, connection reset. Retried by the call executor. */
export class TransientProviderError extends PipelineError {
  readonly status?: number;

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super("transient", message, opts.cause);
    this.name = "TransientProviderError";
    this.status = opts.status;
  }
}

export class RateLimitedError extends PipelineError {
  readonly waitMs?: number;

  constructor(message: string, waitMs?: number) {
    super("rate_limited", message);
    this.name = "RateLimitedError";
    this.waitMs = waitMs;
  }
}

/** Hard daily/monthly limit. Never retried on the same provider. */
export class QuotaExhaustedError extends PipelineError {
  constructor(message: string) {
    super("quota_exhausted", message);
    this.name = "QuotaExhaustedError";
  }
}

/** Bad input, malformed response, authentication failure, unsupported format. */
export class PermanentProviderError extends PipelineError {
  readonly status?: number;

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super("permanent", message, opts.cause);
    this.name = "PermanentProviderError";
    this.status = opts.status;
  }
}

export class AllProvidersFailedError extends PipelineError {
  readonly providerErrors: Record<string, string>;

  constructor(providerErrors: Record<string, string>) {
    const detail = Object.entries(providerErrors)
      .map(([provider, message]) => `${provider}: ${message}`)
      .join("; ");
    super("all_providers_failed", `All summarization providers failed (${detail})`);
    this.name = "AllProvidersFailedError";
    this.providerErrors = { ...providerErrors };
  }
}

export class CostLimitExceededError extends PipelineError {
  constructor(spentUsd: number, limitUsd: number) {
    super(
      "cost_limit_exceeded",
      `Total spending limit reached: $${spentUsd.toFixed(2)} >= $${limitUsd.toFixed(2)}`
    );
    this.name = "CostLimitExceededError";
  }
}

/** A source document could not be fetched. `retryable` covers timeouts, 429 and 5xx. */
export class DownloadError extends PipelineError {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, opts: { retryable: boolean; status?: number; cause?: unknown }) {
    super("download_failed", message, opts.cause);
    this.name = "DownloadError";
    this.retryable = opts.retryable;
    this.status = opts.status;
  }
}

export class ConversionTimeoutError extends PipelineError {
  constructor(backend: string, timeoutMs: number) {
    super("conversion_timeout", `Backend ${backend} timed out after ${timeoutMs}ms`);
    this.name = "ConversionTimeoutError";
  }
}

export class CheckpointStorageError extends PipelineError {
  readonly runId: string;

  constructor(runId: string, message: string, cause?: unknown) {
    super("checkpoint_storage_failed", message, cause);
    this.name = "CheckpointStorageError";
    this.runId = runId;
  }
}

export type FatalStage = "init" | "checkpoint" | "dedup_update" | "worker";

export class PipelineFatalError extends PipelineError {
  readonly context: { runId: string; stage: FatalStage };

  constructor(args: { message: string; runId: string; stage: FatalStage; cause?: unknown }) {
    super("pipeline_fatal", args.message, args.cause);
    this.name = "PipelineFatalError";
    this.context = { runId: args.runId, stage: args.stage };
  }
}
