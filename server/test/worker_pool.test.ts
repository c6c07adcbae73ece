import { describe, expect, test } from "vitest";
import { WorkerPool } from "../src/fs/worker_pool.js";

const tick = () => new Promise((r) => setTimeout(r, 0));

function deferred<T>() {
  let resolve: (v: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("WorkerPool", () => {
  test("runs at most `concurrency` tasks, in FIFO order", async () => {
    const pool = new WorkerPool(2);
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
    const started: number[] = [];
    const results = gates.map((g, i) =>
      pool.run(async () => {
        started.push(i);
        await g.promise;
        return i * 10;
      }),
    );

    expect(started).toEqual([0, 1]);
    expect(pool.running).toBe(2);
    expect(pool.pending).toBe(1);

    gates[0]?.resolve();
    await expect(results[0]).resolves.toBe(0);
    await tick();
    expect(started).toEqual([0, 1, 2]);

    gates[1]?.resolve();
    gates[2]?.resolve();
    await expect(Promise.all(results)).resolves.toEqual([0, 10, 20]);
    await tick();
    expect(pool.running).toBe(0);
  });

  test("a failing task rejects its caller and frees the slot", async () => {
    const pool = new WorkerPool(1);
    const failed = pool.run(async () => {
      throw new Error("disk on fire");
    });
    const next = pool.run(async () => "ok");
    await expect(failed).rejects.toThrow("disk on fire");
    await expect(next).resolves.toBe("ok");
  });

  test("rejects nonsensical sizes", () => {
    expect(() => new WorkerPool(0)).toThrow("invalid pool size: 0");
  });
});
