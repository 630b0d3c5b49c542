export type Limit = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Queue-based concurrency limiter.
 *   const limit = createLimiter(4);
 *   await Promise.all(jobs.map((job) => limit(() => run(job))));
 */
export const createLimiter = (concurrency: number): Limit => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const waiting: Array<() => void> = [];

  const pump = () => {
    while (active < concurrency && waiting.length > 0) {
      const start = waiting.shift();
      if (!start) return;
      active += 1;
      start();
    }
  };

  return <T>(task: () => Promise<T>) =>
    new Promise<T>((resolve, reject) => {
      waiting.push(() => {
        void task()
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            pump();
          });
      });
      pump();
    });
};

/**
 * Runs `worker` over `items` with bounded concurrency and returns the settled
 * results in input order. Resolves only after every item has settled.
 */
export const settleWithConcurrency = async <I, O>(
  items: readonly I[],
  concurrency: number,
  worker: (item: I, index: number) => Promise<O>
): Promise<PromiseSettledResult<O>[]> => {
  const limit = createLimiter(concurrency);
  return Promise.allSettled(items.map((item, index) => limit(() => worker(item, index))));
};
