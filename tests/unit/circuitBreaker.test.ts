import {
  CircuitBreaker,
  defaultCircuitBreakerConfig,
  type CircuitPermit,
  type CircuitTransition
} from "../../src/core/resilience/circuitBreaker";

const setup = () => {
  let now = 1000;
  const transitions: CircuitTransition[] = [];
  const breaker = new CircuitBreaker("primary", defaultCircuitBreakerConfig, () => now, (t) => transitions.push(t));
  return {
    breaker,
    transitions,
    advance: (ms: number) => {
      now += ms;
    }
  };
};

const acquire = (breaker: CircuitBreaker): CircuitPermit => {
  const permit = breaker.tryAcquire();
  if (!permit) throw new Error(`circuit ${breaker.name} refused the call`);
  return permit;
};

const failTimes = (breaker: CircuitBreaker, times: number) => {
  for (let i = 0; i < times; i += 1) {
    breaker.recordFailure(acquire(breaker));
  }
};

describe("CircuitBreaker", () => {
  it("opens after five consecutive failures and rejects calls while open", () => {
    const { breaker, transitions } = setup();

    failTimes(breaker, 4);
    expect(breaker.currentState()).toBe("CLOSED");

    failTimes(breaker, 1);
    expect(breaker.currentState()).toBe("OPEN");
    expect(breaker.tryAcquire()).toBeUndefined();
    expect(transitions).toEqual([{ from: "CLOSED", to: "OPEN" }]);
  });

  it("resets the consecutive failure count on success", () => {
    const { breaker } = setup();

    failTimes(breaker, 4);
    breaker.recordSuccess(acquire(breaker));
    failTimes(breaker, 4);

    expect(breaker.currentState()).toBe("CLOSED");
    expect(breaker.snapshot().consecutiveFailures).toBe(4);
  });

  it("reports the remaining cooldown while open", () => {
    const { breaker, advance } = setup();
    failTimes(breaker, 5);

    advance(100000);

    expect(breaker.snapshot()).toMatchObject({ state: "OPEN", cooldownRemainingMs: 200000, totalFailures: 5 });
  });

  it("half-opens after the cooldown, admits one probe and closes after two successes", () => {
    const { breaker, transitions, advance } = setup();
    failTimes(breaker, 5);

    advance(299999);
    expect(breaker.currentState()).toBe("OPEN");
    advance(1);
    expect(breaker.currentState()).toBe("HALF_OPEN");

    const probe = acquire(breaker);
    expect(probe.probe).toBe(true);
    expect(breaker.tryAcquire()).toBeUndefined();
    breaker.recordSuccess(probe);
    expect(breaker.currentState()).toBe("HALF_OPEN");

    breaker.recordSuccess(acquire(breaker));
    expect(breaker.currentState()).toBe("CLOSED");

    expect(transitions.map((t) => t.to)).toEqual(["OPEN", "HALF_OPEN", "CLOSED"]);
  });

  it("reopens on any half-open failure and restarts the cooldown", () => {
    const { breaker, advance } = setup();
    failTimes(breaker, 5);
    advance(300000);

    breaker.recordFailure(acquire(breaker));

    expect(breaker.snapshot()).toMatchObject({ state: "OPEN", cooldownRemainingMs: 300000, halfOpenInFlight: 0 });
  });

  it("frees the probe slot on release without counting an outcome", () => {
    const { breaker, advance } = setup();
    failTimes(breaker, 5);
    advance(300000);

    breaker.release(acquire(breaker));

    expect(breaker.tryAcquire()).toEqual({ generation: expect.any(Number), probe: true });
    expect(breaker.snapshot()).toMatchObject({ state: "HALF_OPEN", totalFailures: 5, totalSuccesses: 0 });
  });

  it("reset closes the circuit", () => {
    const { breaker } = setup();
    failTimes(breaker, 5);

    breaker.reset();

    expect(breaker.currentState()).toBe("CLOSED");
    expect(breaker.tryAcquire()).toEqual({ generation: expect.any(Number), probe: false });
  });

  it("does not let a call admitted while closed settle a half-open probe", () => {
    const { breaker, transitions, advance } = setup();
    const slowCall = acquire(breaker);
    failTimes(breaker, 5);
    advance(300000);

    const probe = acquire(breaker);
    breaker.recordSuccess(slowCall);
    breaker.recordSuccess(slowCall);

    expect(breaker.snapshot()).toMatchObject({
      state: "HALF_OPEN",
      halfOpenInFlight: 1,
      consecutiveSuccesses: 0,
      totalSuccesses: 2
    });
    expect(breaker.tryAcquire()).toBeUndefined();

    breaker.recordFailure(probe);
    expect(transitions.map((t) => t.to)).toEqual(["OPEN", "HALF_OPEN", "OPEN"]);
  });

  it("ignores a late failure from before the circuit opened", () => {
    const { breaker, advance } = setup();
    const slowCall = acquire(breaker);
    failTimes(breaker, 5);
    advance(100000);

    breaker.recordFailure(slowCall);

    expect(breaker.snapshot()).toMatchObject({ state: "OPEN", cooldownRemainingMs: 200000, totalFailures: 6 });
  });
});
