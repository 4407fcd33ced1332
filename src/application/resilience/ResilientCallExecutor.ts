import {
  defaultRetryPolicy,
  retry,
  type AttemptReport,
  type ErrorClassification,
  type RetryPolicy
} from "../../shared/retry/retry";
import { systemClock, type Clock } from "../../shared/time/clock";

export type ExecuteOptions = {
  onAttempt?: (report: AttemptReport) => void;
  signal?: AbortSignal;
};

/**
 * Shared retry policy for calls to external collaborators (downloads,
 * conversion backends, summarization providers). Holds no per-call state, so
 * one instance is shared across workers.
 */
export class ResilientCallExecutor {
  constructor(
    readonly policy: RetryPolicy = defaultRetryPolicy,
    private readonly clock: Clock = systemClock,
    private readonly randomFn: () => number = Math.random
  ) {}

  execute<T>(
    operation: () => Promise<T>,
    classifyError: (err: unknown) => ErrorClassification,
    opts: ExecuteOptions = {}
  ): Promise<T> {
    return retry(operation, {
      policy: this.policy,
      classifyError,
      onAttempt: opts.onAttempt,
      signal: opts.signal,
      clock: this.clock,
      randomFn: this.randomFn
    });
  }
}
