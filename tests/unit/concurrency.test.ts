import { createStopSignal } from "../../src/shared/concurrency/stopSignal";
import { runWorkerPool } from "../../src/shared/concurrency/workerPool";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("createStopSignal", () => {
  it("keeps the first reason and its timestamp", () => {
    let now = 100;
    const stop = createStopSignal<"a" | "b">(() => now);

    expect(stop.isStopped()).toBe(false);
    expect(stop.stop("a")).toBe(true);
    now = 200;
    expect(stop.stop("b")).toBe(false);

    expect(stop.reason()).toBe("a");
    expect(stop.stoppedAt()).toBe(100);
    expect(stop.isStopped()).toBe(true);
  });
});

describe("runWorkerPool", () => {
  it("processes every item with at most `size` concurrent workers", async () => {
    const items = Array.from({ length: 12 }, (_, i) => i);
    const done: number[] = [];
    let active = 0;
    let peak = 0;

    await runWorkerPool({
      size: 3,
      take: async () => items.shift(),
      work: async (item) => {
        active += 1;
        peak = Math.max(peak, active);
        await sleep(2);
        done.push(item);
        active -= 1;
      }
    });

    expect(done.slice().sort((a, b) => a - b)).toEqual(Array.from({ length: 12 }, (_, i) => i));
    expect(peak).toBe(3);
  });

  it("stops taking new items after a failure and rethrows it", async () => {
    const items = [1, 2, 3, 4, 5, 6];
    const onError = jest.fn();
    const worked: number[] = [];

    await expect(
      runWorkerPool({
        size: 1,
        take: async () => items.shift(),
        work: async (item) => {
          worked.push(item);
          if (item === 2) throw new Error("boom");
        },
        onError
      })
    ).rejects.toThrow("boom");

    expect(worked).toEqual([1, 2]);
    expect(items).toEqual([3, 4, 5, 6]);
    expect(onError).toHaveBeenCalledTimes(1);
  });

  it.each([0, -2, 1.5])("rejects pool size %p", async (size) => {
    await expect(runWorkerPool({ size, take: async () => undefined, work: async () => undefined })).rejects.toThrow(
      "worker pool size must be an integer >= 1"
    );
  });
});
