export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export type CircuitBreakerConfig = {
  failureThreshold: number;
  successThreshold: number;
  cooldownMs: number;
  halfOpenProbeLimit: number;
};

export const defaultCircuitBreakerConfig: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  cooldownMs: 300000,
  halfOpenProbeLimit: 1
};

export type ProviderHealth = {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  totalFailures: number;
  totalSuccesses: number;
  lastFailureAt: number | null;
  lastSuccessAt: number | null;
  halfOpenInFlight: number;
  cooldownRemainingMs: number;
};

export type CircuitTransition = { from: CircuitState; to: CircuitState };

/** A reserved call slot, tied to the state period that admitted it. */
export type CircuitPermit = { readonly generation: number; readonly probe: boolean };

/**
 * Per-provider failure isolation.
 *
 * CLOSED -> OPEN after `failureThreshold` consecutive failures.
 * OPEN -> HALF_OPEN once `cooldownMs` has elapsed since the last failure.
 * HALF_OPEN admits up to `halfOpenProbeLimit` concurrent probes;
 * `successThreshold` consecutive successes close it, any failure reopens it.
 *
 * All mutation is synchronous, so interleaved async callers cannot observe a
 * half-applied transition. Outcomes of calls admitted before the latest
 * transition only update the totals.
 */
export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private consecutiveFailures = 0;
  private consecutiveSuccesses = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private lastFailureAt: number | null = null;
  private lastSuccessAt: number | null = null;
  private halfOpenInFlight = 0;
  private generation = 0;

  constructor(
    readonly name: string,
    private readonly config: CircuitBreakerConfig,
    private readonly now: () => number,
    private readonly onTransition?: (transition: CircuitTransition) => void
  ) {}

  currentState(): CircuitState {
    this.refresh();
    return this.state;
  }

  /**
   * Reserves a call slot. Returns undefined when OPEN, or when HALF_OPEN already
   * has `halfOpenProbeLimit` probes in flight. Every permit must be settled by
   * exactly one `recordSuccess`, `recordFailure` or `release`.
   */
  tryAcquire(): CircuitPermit | undefined {
    this.refresh();
    if (this.state === "OPEN") return undefined;
    if (this.state === "HALF_OPEN") {
      if (this.halfOpenInFlight >= this.config.halfOpenProbeLimit) return undefined;
      this.halfOpenInFlight += 1;
      return { generation: this.generation, probe: true };
    }
    return { generation: this.generation, probe: false };
  }

  /** Returns a reserved slot without counting an outcome. */
  release(permit: CircuitPermit): void {
    if (permit.probe && this.isCurrent(permit) && this.halfOpenInFlight > 0) this.halfOpenInFlight -= 1;
  }

  recordSuccess(permit: CircuitPermit): void {
    this.release(permit);
    this.totalSuccesses += 1;
    this.lastSuccessAt = this.now();
    if (!this.isCurrent(permit)) return;

    this.consecutiveSuccesses += 1;
    this.consecutiveFailures = 0;
    if (this.state === "HALF_OPEN" && this.consecutiveSuccesses >= this.config.successThreshold) {
      this.transition("CLOSED");
    }
  }

  recordFailure(permit: CircuitPermit): void {
    this.release(permit);
    this.totalFailures += 1;
    if (!this.isCurrent(permit)) return;

    this.consecutiveFailures += 1;
    this.consecutiveSuccesses = 0;
    this.lastFailureAt = this.now();
    if (this.state === "HALF_OPEN") {
      this.transition("OPEN");
      return;
    }
    if (this.state === "CLOSED" && this.consecutiveFailures >= this.config.failureThreshold) {
      this.transition("OPEN");
    }
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.consecutiveSuccesses = 0;
    this.lastFailureAt = null;
    this.halfOpenInFlight = 0;
    this.generation += 1;
    if (this.state !== "CLOSED") this.transition("CLOSED");
  }

  snapshot(): ProviderHealth {
    this.refresh();
    return {
      name: this.name,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      consecutiveSuccesses: this.consecutiveSuccesses,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
      lastFailureAt: this.lastFailureAt,
      lastSuccessAt: this.lastSuccessAt,
      halfOpenInFlight: this.halfOpenInFlight,
      cooldownRemainingMs: this.cooldownRemaining()
    };
  }

  private cooldownRemaining(): number {
    if (this.state !== "OPEN" || this.lastFailureAt == null) return 0;
    return Math.max(0, this.config.cooldownMs - (this.now() - this.lastFailureAt));
  }

  private refresh(): void {
    if (this.state === "OPEN" && this.cooldownRemaining() === 0) {
      this.consecutiveSuccesses = 0;
      this.halfOpenInFlight = 0;
      this.transition("HALF_OPEN");
    }
  }

  private isCurrent(permit: CircuitPermit): boolean {
    return permit.generation === this.generation;
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.generation += 1;
    this.onTransition?.({ from, to });
  }
}
