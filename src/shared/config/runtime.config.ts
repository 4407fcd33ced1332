import {
  pipelineCaps,
  resolvePipelineConfig,
  type PipelineConfig
} from "../../application/pipeline/pipeline.config";

export const runtimeCaps = {
  summarizerTimeoutMs: { min: 1000, max: 300000 },
  downloadTimeoutMs: { min: 1000, max: 600000 }
} as const;

export type AdapterTimeouts = {
  summarizerTimeoutMs: number;
  downloadTimeoutMs: number;
};

export type RuntimeConfig = AdapterTimeouts & {
  pipelineConfig: PipelineConfig;
};

type Range = { readonly min: number; readonly max: number };

const readRaw = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;
  return raw;
};

const parseOptionalIntInRange = (env: NodeJS.ProcessEnv, name: string, range: Range): number | undefined => {
  const raw = readRaw(env, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalNumberInRange = (env: NodeJS.ProcessEnv, name: string, range: Range): number | undefined => {
  const raw = readRaw(env, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = readRaw(env, name);
  if (raw === undefined) return undefined;

  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  throw new Error(`${name}=${raw} must be one of true, false, 1, 0`);
};

const unit = { min: 0, max: 1 };

export const loadPipelineConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): PipelineConfig => {
  const caps = pipelineCaps;
  return resolvePipelineConfig({
    maxConcurrentDownloads: parseOptionalIntInRange(env, "PIPELINE_MAX_CONCURRENT_DOWNLOADS", caps.maxConcurrentDownloads),
    maxConcurrentConversions: parseOptionalIntInRange(
      env,
      "PIPELINE_MAX_CONCURRENT_CONVERSIONS",
      caps.maxConcurrentConversions
    ),
    maxConcurrentSummaries: parseOptionalIntInRange(env, "PIPELINE_MAX_CONCURRENT_SUMMARIES", caps.maxConcurrentSummaries),
    queueSize: parseOptionalIntInRange(env, "PIPELINE_QUEUE_SIZE", caps.queueSize),
    checkpointInterval: parseOptionalIntInRange(env, "PIPELINE_CHECKPOINT_INTERVAL", caps.checkpointInterval),
    minQualityScore: parseOptionalNumberInRange(env, "PIPELINE_MIN_QUALITY_SCORE", unit),
    conversionTimeoutMs: parseOptionalIntInRange(env, "PIPELINE_CONVERSION_TIMEOUT_MS", caps.conversionTimeoutMs),
    retry: {
      maxAttempts: parseOptionalIntInRange(env, "RETRY_MAX_ATTEMPTS", caps.retryMaxAttempts),
      baseDelayMs: parseOptionalIntInRange(env, "RETRY_BASE_DELAY_MS", caps.retryBaseDelayMs),
      maxDelayMs: parseOptionalIntInRange(env, "RETRY_MAX_DELAY_MS", caps.retryMaxDelayMs),
      jitterFactor: parseOptionalNumberInRange(env, "RETRY_JITTER_FACTOR", unit),
      maxRateLimitWaitMs: parseOptionalIntInRange(env, "RETRY_MAX_RATE_LIMIT_WAIT_MS", caps.maxRateLimitWaitMs)
    },
    circuitBreaker: {
      failureThreshold: parseOptionalIntInRange(env, "CIRCUIT_FAILURE_THRESHOLD", caps.failureThreshold),
      successThreshold: parseOptionalIntInRange(env, "CIRCUIT_SUCCESS_THRESHOLD", caps.successThreshold),
      cooldownMs: parseOptionalIntInRange(env, "CIRCUIT_COOLDOWN_MS", caps.cooldownMs),
      halfOpenProbeLimit: parseOptionalIntInRange(env, "CIRCUIT_HALF_OPEN_PROBE_LIMIT", caps.halfOpenProbeLimit)
    },
    fallbackProvider: { enabled: parseOptionalBoolean(env, "PIPELINE_FALLBACK_ENABLED") },
    costLimits: {
      maxTotalCostUsd: parseOptionalNumberInRange(env, "PIPELINE_MAX_TOTAL_COST_USD", {
        min: 0,
        max: Number.MAX_SAFE_INTEGER
      })
    },
    cache: { enabled: parseOptionalBoolean(env, "PIPELINE_CACHE_ENABLED") }
  });
};

export const loadAdapterTimeoutsFromEnv = (env: NodeJS.ProcessEnv = process.env): AdapterTimeouts => ({
  summarizerTimeoutMs: parseOptionalIntInRange(env, "SUMMARIZER_TIMEOUT_MS", runtimeCaps.summarizerTimeoutMs) ?? 60000,
  downloadTimeoutMs: parseOptionalIntInRange(env, "DOWNLOAD_TIMEOUT_MS", runtimeCaps.downloadTimeoutMs) ?? 30000
});

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => ({
  pipelineConfig: loadPipelineConfigFromEnv(env),
  ...loadAdapterTimeoutsFromEnv(env)
});
