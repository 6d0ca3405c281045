/**
 * Fixed-size worker pool over a shared pull queue.
 * Each worker loops `take -> work` until `take` yields undefined.
 * The number of concurrent `work` calls never exceeds `size`.
 *
 * Usage:
 *   await runWorkerPool({ size: 10, take: () => queue.next(), work: (item) => handle(item) });
 */
export type WorkerPoolOptions<T> = {
  size: number;
  take: () => Promise<T | undefined>;
  work: (item: T) => Promise<void>;
  onError?: (err: unknown) => void;
};

export const runWorkerPool = async <T>(opts: WorkerPoolOptions<T>): Promise<void> => {
  const { size, take, work, onError } = opts;
  if (!Number.isInteger(size) || size < 1) {
    throw new Error("worker pool size must be an integer >= 1");
  }

  const failure: { failed: boolean; error?: unknown } = { failed: false };

  const worker = async () => {
    while (!failure.failed) {
      const item = await take();
      if (item === undefined) return;
      await work(item);
    }
  };

  const guarded = async () => {
    try {
      await worker();
    } catch (err) {
      if (!failure.failed) {
        failure.failed = true;
        failure.error = err;
        onError?.(err);
      }
    }
  };

  await Promise.all(Array.from({ length: size }, guarded));

  if (failure.failed) throw failure.error;
};
