import { systemClock, type Clock } from "../time/clock";

export type ErrorClassification =
  | { kind: "non_retryable" }
  | { kind: "retryable" }
  | { kind: "rate_limited"; waitMs?: number };

export type RetryPolicy = {
  maxAttempts: number; // total tries, including the first
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number; // 0.1 means ±10%
};

export type AttemptOutcome = "success" | "retry" | "give_up";

export type AttemptReport = {
  attempt: number; // 1-based
  maxAttempts: number;
  outcome: AttemptOutcome;
  classification?: ErrorClassification["kind"];
  delayMs?: number;
  error?: unknown;
};

export type RetryOptions = {
  policy: RetryPolicy;
  classifyError: (err: unknown) => ErrorClassification;
  onAttempt?: (report: AttemptReport) => void;
  clock?: Clock;
  randomFn?: () => number;
  signal?: AbortSignal;
};

export const defaultRetryPolicy: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitterFactor: 0.1
};

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

/**
 * Delay before the retry that follows the zero-based `attempt`:
 * min(max, base * 2^attempt) scaled by a factor in [1 - jitter, 1 + jitter], never above max.
 */
export const computeBackoffDelay = (
  attempt: number,
  policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs" | "jitterFactor">,
  randomFn: () => number = Math.random
): number => {
  const backoff = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt));
  const jitter = clamp01(policy.jitterFactor);
  const factor = 1 + jitter * (2 * clamp01(randomFn()) - 1);
  return Math.min(policy.maxDelayMs, Math.max(0, Math.round(backoff * factor)));
};

const resolveDelay = (
  classification: ErrorClassification,
  attempt: number,
  policy: RetryPolicy,
  randomFn: () => number
): number => {
  if (classification.kind === "rate_limited") {
    const hint = classification.waitMs;
    if (typeof hint === "number" && Number.isFinite(hint) && hint >= 0) {
      return Math.min(policy.maxDelayMs, hint);
    }
  }
  return computeBackoffDelay(attempt, policy, randomFn);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { policy, classifyError, onAttempt, clock = systemClock, randomFn = Math.random, signal } = opts;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  // attempt=0 is the first try
  for (let attempt = 0; ; attempt += 1) {
    try {
      const result = await fn();
      onAttempt?.({ attempt: attempt + 1, maxAttempts, outcome: "success" });
      return result;
    } catch (err) {
      const classification = classifyError(err);
      if (classification.kind === "non_retryable" || attempt + 1 >= maxAttempts) {
        onAttempt?.({
          attempt: attempt + 1,
          maxAttempts,
          outcome: "give_up",
          classification: classification.kind,
          error: err
        });
        throw err;
      }

      const delayMs = resolveDelay(classification, attempt, policy, randomFn);
      onAttempt?.({
        attempt: attempt + 1,
        maxAttempts,
        outcome: "retry",
        classification: classification.kind,
        delayMs,
        error: err
      });
      await clock.sleep(delayMs, signal);
    }
  }
};
