import { createLimiter, createResourceGovernor } from "../../src/shared/concurrency/limiter";
import { BoundedQueue } from "../../src/shared/concurrency/boundedQueue";
import { delay } from "../helpers/fakeClock";

describe("createLimiter", () => {
  it("limits concurrency", async () => {
    const limit = createLimiter(2);
    let active = 0;
    let maxActive = 0;

    const work = async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await delay(20);
      active -= 1;
    };

    await Promise.all(Array.from({ length: 10 }, () => limit(work)));
    expect(maxActive).toBeLessThanOrEqual(2);
  });

  it("propagates task failures and keeps admitting queued tasks", async () => {
    const limit = createLimiter(1);
    const failing = limit(async () => {
      throw new Error("task failed");
    });
    const next = limit(async () => "next");

    await expect(failing).rejects.toThrow("task failed");
    await expect(next).resolves.toBe("next");
    expect(limit.active()).toBe(0);
    expect(limit.pending()).toBe(0);
  });

  it("rejects a non-positive concurrency", () => {
    expect(() => createLimiter(0)).toThrow("concurrency must be an integer >= 1");
  });
});

describe("createResourceGovernor", () => {
  it("tracks peak usage against its limit", async () => {
    const governor = createResourceGovernor("convert", 3);

    await Promise.all(Array.from({ length: 10 }, () => governor.run(() => delay(5))));

    expect(governor.stats()).toEqual({
      name: "convert",
      limit: 3,
      active: 0,
      waiting: 0,
      peakActive: 3,
      acquired: 10
    });
  });
});

describe("BoundedQueue", () => {
  it("suspends put while full and resumes it on take", async () => {
    const queue = new BoundedQueue<number>(1);
    await queue.put(1);

    let secondStored = false;
    const second = queue.put(2).then(() => {
      secondStored = true;
    });
    await delay(0);
    expect(secondStored).toBe(false);
    expect(queue.size()).toBe(1);

    await expect(queue.take()).resolves.toBe(1);
    await second;
    expect(secondStored).toBe(true);
    await expect(queue.take()).resolves.toBe(2);
  });

  it("hands values to waiting takers in FIFO order", async () => {
    const queue = new BoundedQueue<string>(2);
    const first = queue.take();
    const second = queue.take();

    await queue.put("a");
    await queue.put("b");

    await expect(first).resolves.toBe("a");
    await expect(second).resolves.toBe("b");
    expect(queue.size()).toBe(0);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new BoundedQueue(0)).toThrow("capacity must be an integer >= 1");
  });
});
