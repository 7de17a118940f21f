export type Limiter = (<T>(task: () => Promise<T>) => Promise<T>) & {
  activeCount: () => number;
  pendingCount: () => number;
};

/**
 * Runs at most `concurrency` tasks at once; the rest wait in FIFO order.
 * The poller sizes each claim batch from `concurrency - activeCount() - pendingCount()`.
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

  const run = async <T>(task: () => Promise<T>): Promise<T> => {
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

  return Object.assign(run, {
    activeCount: () => active,
    pendingCount: () => queue.length
  });
};
