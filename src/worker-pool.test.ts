import { describe, expect, it } from "vitest";

import { WorkerPool } from "./worker-pool";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("WorkerPool", () => {
  it("rejects a capacity that is not a positive integer", () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
    expect(() => new WorkerPool(1.5)).toThrow(RangeError);
  });

  it("never runs more tasks at once than its capacity", async () => {
    const pool = new WorkerPool(2);
    let active = 0;
    let peak = 0;
    const tasks = Array.from({ length: 6 }, (_, i) => async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
      return i;
    });

    const settled = await pool.run(tasks);
    expect(peak).toBe(2);
    expect(settled.map((s) => s.index).sort()).toEqual([0, 1, 2, 3, 4, 5]);
    expect(pool.activeCount).toBe(0);
  });

  it("isolates failures to their own task", async () => {
    const pool = new WorkerPool(3);
    const settled = await pool.run([
      async () => "a",
      async () => {
        throw new Error("boom");
      },
      async () => "c",
    ]);

    const byIndex = new Map(settled.map((s) => [s.index, s]));
    expect(byIndex.get(0)).toEqual({ status: "fulfilled", index: 0, value: "a" });
    expect(byIndex.get(1)?.status).toBe("rejected");
    expect(byIndex.get(2)).toEqual({ status: "fulfilled", index: 2, value: "c" });
  });

  it("reports each task as it settles", async () => {
    const pool = new WorkerPool(1);
    const order: number[] = [];
    await pool.run([async () => 1, async () => 2], (result) => order.push(result.index));
    expect(order).toEqual([0, 1]);
  });

  it("refuses work after shutdown", async () => {
    const pool = new WorkerPool(1);
    pool.shutdown();
    await expect(pool.run([async () => 1])).rejects.toThrow("Worker pool has been shut down");
  });
});
