import { describe, it, expect } from "vitest";
import { OperationCancelledError } from "../application/errors";
import { mapWithConcurrency } from "./concurrency";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("mapWithConcurrency", () => {
  it("keeps input order whatever order calls finish in", async () => {
    const result = await mapWithConcurrency([30, 10, 20, 0], 2, async (ms, i) => {
      await delay(ms);
      return `${i}:${ms}`;
    });
    expect(result).toEqual(["0:30", "1:10", "2:20", "3:0"]);
  });

  it("never has more than `limit` calls in flight", async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight -= 1;
    });

    expect(peak).toBe(2);
  });

  it("rejects with the first failure", async () => {
    const failure = new Error("item 1");
    await expect(
      mapWithConcurrency([0, 1, 2], 3, async (n) => {
        if (n === 1) throw failure;
        return n;
      })
    ).rejects.toBe(failure);
  });

  it("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(mapWithConcurrency([1], 1, async (n) => n, controller.signal)).rejects.toThrow(
      OperationCancelledError
    );
  });

  it("returns an empty array for no items", async () => {
    await expect(mapWithConcurrency([], 4, async (n: number) => n)).resolves.toEqual([]);
  });
});
