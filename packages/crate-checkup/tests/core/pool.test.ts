import { describe, expect, it } from "vitest";

import { runPool } from "../../src/core/pool.js";

const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 5));

describe("runPool", () => {
  it("never exceeds the concurrency limit", async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];

    await runPool([1, 2, 3, 4, 5, 6, 7], 3, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      seen.push(item);
      active--;
    });

    expect(peak).toBe(3);
    expect([...seen].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it("passes each item's index", async () => {
    const indices: number[] = [];
    await runPool(["a", "b", "c"], 2, async (_item, index) => {
      indices.push(index);
      await tick();
    });
    expect([...indices].sort()).toEqual([0, 1, 2]);
  });

  it("resolves immediately for no items", async () => {
    await expect(runPool([], 4, () => Promise.resolve())).resolves.toBeUndefined();
  });

  it("rejects when a worker rejects", async () => {
    await expect(
      runPool([1, 2], 2, (item) =>
        item === 2 ? Promise.reject(new Error("boom")) : Promise.resolve(),
      ),
    ).rejects.toThrow("boom");
  });
});
