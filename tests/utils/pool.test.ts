import { describe, it, expect } from "vitest";
import { poolMap } from "../../src/utils/pool.js";
import { ConfigurationError } from "../../src/core/errors.js";
import { sleep } from "../helpers.js";

describe("poolMap", () => {
  it("processes all items and preserves result order", async () => {
    const items = [1, 2, 3, 4, 5];
    const results = await poolMap(items, async (n) => n * 2, 3);
    expect(results).toEqual([2, 4, 6, 8, 10]);
  });

  it("preserves order when later items finish first", async () => {
    const results = await poolMap([30, 1, 10], async (ms) => {
      await sleep(ms);
      return ms;
    }, 3);
    expect(results).toEqual([30, 1, 10]);
  });

  it("respects concurrency limit", async () => {
    let running = 0;
    let maxRunning = 0;

    const items = [1, 2, 3, 4, 5, 6];
    await poolMap(items, async () => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      await sleep(10);
      running--;
    }, 2);

    expect(maxRunning).toBeLessThanOrEqual(2);
  });

  it("handles empty input array", async () => {
    const results = await poolMap([], async (n: number) => n, 3);
    expect(results).toEqual([]);
  });

  it("handles concurrency greater than items length", async () => {
    const items = [1, 2];
    const results = await poolMap(items, async (n) => n + 1, 100);
    expect(results).toEqual([2, 3]);
  });

  it("concurrency of 1 processes sequentially", async () => {
    const order: number[] = [];
    const items = [1, 2, 3];
    await poolMap(items, async (n) => {
      order.push(n);
      await sleep(5);
    }, 1);
    expect(order).toEqual([1, 2, 3]);
  });

  it("passes the item index", async () => {
    const results = await poolMap(["a", "b"], async (s, i) => `${i}:${s}`, 2);
    expect(results).toEqual(["0:a", "1:b"]);
  });

  it("propagates errors from worker functions", async () => {
    const items = [1, 2, 3];
    await expect(
      poolMap(items, async (n) => {
        if (n === 2) throw new Error("fail on 2");
        return n;
      }, 2),
    ).rejects.toThrow("fail on 2");
  });

  it("lets in-flight items finish before rejecting", async () => {
    const finished: number[] = [];
    await expect(
      poolMap([1, 2], async (n) => {
        if (n === 1) throw new Error("fail on 1");
        await sleep(15);
        finished.push(n);
        return n;
      }, 2),
    ).rejects.toThrow("fail on 1");
    expect(finished).toEqual([2]);
  });

  it("rejects a concurrency below 1", async () => {
    await expect(poolMap([1], async (n) => n, 0)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
