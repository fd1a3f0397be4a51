import { describe, it, expect } from "vitest";
import type { RetryPolicy } from "../ports/retry-policy";
import { defaultStoreRetryPolicy } from "./default-store-retry-policy";
import { StoreTimeoutError } from "./errors";
import { computeBackoffDelay, withRetry } from "./with-retry";

const policy: RetryPolicy = defaultStoreRetryPolicy({ maxAttempts: 3 });

describe("computeBackoffDelay", () => {
  it("doubles from the base delay and stops at the cap", () => {
    const noJitter = () => 0.5;
    expect(computeBackoffDelay(policy, 1, noJitter)).toBe(300);
    expect(computeBackoffDelay(policy, 3, noJitter)).toBe(1200);
    expect(computeBackoffDelay(policy, 10, noJitter)).toBe(5000);
  });

  it("spreads the delay by the jitter ratio either way", () => {
    expect(computeBackoffDelay(policy, 10, () => 0)).toBe(4000);
    expect(computeBackoffDelay(policy, 10, () => 1)).toBe(6000);
  });
});

describe("withRetry", () => {
  it("retries retryable errors until the call succeeds", async () => {
    const sleeps: number[] = [];
    const attempts: number[] = [];
    let calls = 0;

    const result = await withRetry(
      async () => {
        calls += 1;
        if (calls < 3) throw new StoreTimeoutError("get k", 10);
        return "ok";
      },
      { ...policy, onRetry: (ctx) => attempts.push(ctx.attempt) },
      async (ms) => {
        sleeps.push(ms);
      }
    );

    expect(result).toBe("ok");
    expect(calls).toBe(3);
    expect(attempts).toEqual([1, 2]);
    expect(sleeps).toHaveLength(2);
  });

  it("rethrows other errors at once", async () => {
    let calls = 0;
    const boom = new Error("boom");

    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw boom;
        },
        policy,
        async () => {}
      )
    ).rejects.toBe(boom);
    expect(calls).toBe(1);
  });

  it("gives up after maxAttempts with the last error", async () => {
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new StoreTimeoutError(`put ${calls}`, 10);
        },
        policy,
        async () => {}
      )
    ).rejects.toThrow("Data store put 3 timed out after 10ms");
    expect(calls).toBe(3);
  });
});
