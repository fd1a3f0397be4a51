import type { RetryPolicy } from "../ports/retry-policy";
import { isRetryableStoreError } from "./errors";

export type RetrySettings = Pick<
  RetryPolicy,
  "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "jitterRatio"
>;

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  maxAttempts: 5,
  baseDelayMs: 300,
  maxDelayMs: 5000,
  jitterRatio: 0.2,
};

export function defaultStoreRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    ...DEFAULT_RETRY_SETTINGS,
    shouldRetry: isRetryableStoreError,
    ...overrides,
  };
}
