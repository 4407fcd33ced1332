export type Limiter = {
  <T>(task: () => Promise<T>): Promise<T>;
  active: () => number;
  pending: () => number;
};

/**
 * Counting limiter: at most `concurrency` tasks run at once, the rest wait FIFO.
 * Usage:
 *   const limit = createLimiter(3);
 *   await limit(() => convert(item));
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const fn = queue.shift();
    if (!fn) return;
    active += 1;
    fn();
  };

  const limit = async <T>(task: () => Promise<T>): Promise<T> => {
    return new Promise<T>((resolve, reject) => {
      queue.push(async () => {
        try {
          const result = await task();
          resolve(result);
        } catch (err) {
          reject(err);
        } finally {
          active -= 1;
          next();
        }
      });
      next();
    });
  };

  return Object.assign(limit, {
    active: () => active,
    pending: () => queue.length
  });
};

export type ResourceName = "download" | "convert" | "summarize";

export type GovernorStats = {
  name: ResourceName;
  limit: number;
  active: number;
  waiting: number;
  peakActive: number;
  acquired: number;
};

export type ResourceGovernor = {
  readonly name: ResourceName;
  readonly limit: number;
  run<T>(task: () => Promise<T>): Promise<T>;
  stats(): GovernorStats;
};

/** A named limiter guarding one pipeline resource, with peak-usage accounting. */
export const createResourceGovernor = (name: ResourceName, limit: number): ResourceGovernor => {
  const limiter = createLimiter(limit);
  let peakActive = 0;
  let acquired = 0;

  return {
    name,
    limit,
    run: <T>(task: () => Promise<T>) =>
      limiter(async () => {
        acquired += 1;
        peakActive = Math.max(peakActive, limiter.active());
        return task();
      }),
    stats: () => ({
      name,
      limit,
      active: limiter.active(),
      waiting: limiter.pending(),
      peakActive,
      acquired
    })
  };
};
