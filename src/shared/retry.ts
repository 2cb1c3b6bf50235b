// Backoff helpers shared by the analysis client and summarizer

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Delay before the attempt following `attempt` (1-based): base * 2^(attempt-1), capped
 */
export function backoffDelay(attempt: number, policy: BackoffPolicy): number {
  const delay = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(delay, policy.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}
