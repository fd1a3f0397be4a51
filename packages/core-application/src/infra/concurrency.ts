import { OperationCancelledError } from "../application/errors";

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
}

/**
 * Maps `items` through `fn` with at most `limit` calls in flight. Results keep
 * input order. The first rejection stops new work from starting and is
 * rethrown once in-flight calls settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const pending = items.entries();
  const state: { failure: { error: unknown } | null } = { failure: null };
  const workers = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));

  async function worker(): Promise<void> {
    for (let next = pending.next(); !next.done; next = pending.next()) {
      if (state.failure) return;
      const [index, item] = next.value;
      try {
        throwIfCancelled(signal);
        results[index] = await fn(item, index);
      } catch (error) {
        state.failure ??= { error };
        return;
      }
    }
  }

  await Promise.all(Array.from({ length: workers }, () => worker()));
  if (state.failure) throw state.failure.error;
  return results;
}
