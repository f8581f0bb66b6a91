/**
 * Runs at most `concurrency` tasks at once, in arrival order.
 */
export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

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

  return async <T>(task: () => Promise<T>): Promise<T> => {
    return new Promise<T>((resolve, reject) => {
      queue.push(async () => {
        try {
          resolve(await task());
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
};

export type KeyedLock = {
  run<T>(key: string, task: () => Promise<T>): Promise<T>;
};

/**
 * Serializes tasks per key (e.g. per marketplace profile) while letting different keys
 * proceed independently. Idle keys are dropped so the map does not grow unbounded.
 */
export const createKeyedLock = (): KeyedLock => {
  const lanes = new Map<string, { limit: Limiter; pending: number }>();

  return {
    run: async <T>(key: string, task: () => Promise<T>): Promise<T> => {
      let lane = lanes.get(key);
      if (!lane) {
        lane = { limit: createLimiter(1), pending: 0 };
        lanes.set(key, lane);
      }

      const current = lane;
      current.pending += 1;
      try {
        return await current.limit(task);
      } finally {
        current.pending -= 1;
        if (current.pending === 0) lanes.delete(key);
      }
    }
  };
};
