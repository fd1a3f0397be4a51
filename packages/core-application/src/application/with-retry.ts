import type { RetryContext, RetryPolicy, Sleeper } from "../ports/retry-policy";

export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exp = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(policy.maxDelayMs, exp);
  // jitter simétrico: ±jitterRatio
  const jitter = capped * policy.jitterRatio * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or the policy's
 * attempt budget is exhausted. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  policy: RetryPolicy,
  sleeper: Sleeper
): Promise<T> {
  const ctx: RetryContext = { attempt: 1, startedAt: Date.now() };

  for (;;) {
    try {
      return await fn(ctx);
    } catch (err) {
      ctx.lastError = err;
      if (ctx.attempt >= policy.maxAttempts || !policy.shouldRetry(err)) {
        throw err;
      }
      const delayMs = computeBackoffDelay(policy, ctx.attempt);
      policy.onRetry?.({ ...ctx, delayMs });
      await sleeper(delayMs);
      ctx.attempt += 1;
    }
  }
}
