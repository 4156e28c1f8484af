import { RetryConfig } from "../config";

export interface RetryPolicy {
  maxAttempts: number;
  isRetriableStatus(status: number): boolean;
  /** Delay before attempt `attempt + 1`, given that `attempt` (1-based) just failed. */
  delayFor(attempt: number): number;
}

export function createRetryPolicy(config: RetryConfig): RetryPolicy {
  const retryable = new Set(config.retryableStatuses);
  return {
    maxAttempts: Math.max(1, config.maxAttempts),
    isRetriableStatus: (status) => retryable.has(status),
    delayFor: (attempt) => Math.min(config.baseDelayMs * 2 ** (attempt - 1), config.maxDelayMs),
  };
}
