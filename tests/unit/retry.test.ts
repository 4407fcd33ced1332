import { ResilientCallExecutor } from "../../src/application/resilience/ResilientCallExecutor";
import { computeBackoffDelay, retry, type AttemptReport, type ErrorClassification } from "../../src/shared/retry/retry";
import { AbortedError } from "../../src/shared/time/clock";
import { FakeClock } from "../helpers/fakeClock";

const policy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60000, jitterFactor: 0.1 };

const failingTimes = (failures: number, error: () => Error) => {
  let calls = 0;
  const fn = async () => {
    calls += 1;
    if (calls <= failures) throw error();
    return "ok";
  };
  return { fn, calls: () => calls };
};

describe("computeBackoffDelay", () => {
  it("doubles from the base delay when jitter is centred", () => {
    const centred = () => 0.5;
    expect([0, 1, 2, 3].map((attempt) => computeBackoffDelay(attempt, policy, centred))).toEqual([
      1000, 2000, 4000, 8000
    ]);
  });

  it("applies jitter within ±jitterFactor", () => {
    expect(computeBackoffDelay(0, policy, () => 0)).toBe(900);
    expect(computeBackoffDelay(0, policy, () => 1)).toBe(1100);
  });

  it("never exceeds maxDelayMs, even with upward jitter", () => {
    expect(computeBackoffDelay(10, policy, () => 1)).toBe(60000);
    for (let attempt = 0; attempt < 20; attempt += 1) {
      expect(computeBackoffDelay(attempt, policy, Math.random)).toBeLessThanOrEqual(60000);
    }
  });
});

describe("retry", () => {
  const retryable = (): ErrorClassification => ({ kind: "retryable" });

  it("retries retryable failures with exponential backoff then succeeds", async () => {
    const clock = new FakeClock();
    const { fn, calls } = failingTimes(2, () => new Error("boom"));
    const reports: AttemptReport[] = [];

    const result = await retry(fn, {
      policy,
      classifyError: retryable,
      clock,
      randomFn: () => 0.5,
      onAttempt: (report) => reports.push(report)
    });

    expect(result).toBe("ok");
    expect(calls()).toBe(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(reports.map((report) => report.outcome)).toEqual(["retry", "retry", "success"]);
  });

  it("gives up after maxAttempts and rethrows the last error", async () => {
    const clock = new FakeClock();
    const { fn, calls } = failingTimes(5, () => new Error("still down"));

    await expect(retry(fn, { policy, classifyError: retryable, clock })).rejects.toThrow("still down");
    expect(calls()).toBe(3);
    expect(clock.sleeps).toHaveLength(2);
  });

  it("does not retry non-retryable errors", async () => {
    const clock = new FakeClock();
    const { fn, calls } = failingTimes(1, () => new Error("bad request"));
    const reports: AttemptReport[] = [];

    await expect(
      retry(fn, {
        policy,
        classifyError: () => ({ kind: "non_retryable" }),
        clock,
        onAttempt: (report) => reports.push(report)
      })
    ).rejects.toThrow("bad request");

    expect(calls()).toBe(1);
    expect(clock.sleeps).toEqual([]);
    expect(reports).toEqual([
      { attempt: 1, maxAttempts: 3, outcome: "give_up", classification: "non_retryable", error: expect.any(Error) }
    ]);
  });

  it("waits the rate-limit hint, capped at maxDelayMs", async () => {
    const clock = new FakeClock();
    const { fn } = failingTimes(2, () => new Error("429"));
    const hints = [5000, 120000];

    await retry(fn, {
      policy,
      classifyError: () => ({ kind: "rate_limited", waitMs: hints.shift() }),
      clock
    });

    expect(clock.sleeps).toEqual([5000, 60000]);
  });

  it("stops when the signal aborts during backoff", async () => {
    const clock = new FakeClock();
    const controller = new AbortController();
    controller.abort();
    const { fn, calls } = failingTimes(3, () => new Error("flaky"));

    await expect(
      retry(fn, { policy, classifyError: retryable, clock, signal: controller.signal })
    ).rejects.toBeInstanceOf(AbortedError);
    expect(calls()).toBe(1);
  });
});

describe("ResilientCallExecutor", () => {
  it("runs operations with its shared policy and clock", async () => {
    const clock = new FakeClock();
    const executor = new ResilientCallExecutor({ ...policy, jitterFactor: 0 }, clock);
    const { fn, calls } = failingTimes(1, () => new Error("once"));

    await expect(executor.execute(fn, () => ({ kind: "retryable" }))).resolves.toBe("ok");
    expect(calls()).toBe(2);
    expect(clock.sleeps).toEqual([1000]);
  });
});
