// Retry loop around one structured provider call.
// Every attempt is reported, schema mismatches and transport errors alike.

import logger from '../shared/logger';
import { AnalysisFailedError, describeError } from '../shared/errors';
import { BackoffPolicy, backoffDelay, sleep } from '../shared/retry';
import { TokenUsage, UsageOutcome } from '../shared/types';
import { EMPTY_USAGE, LlmProvider, StructuredRequest } from './providers/llm-provider';

export interface AttemptReport {
  attempt: number;
  outcome: UsageOutcome;
  usage: TokenUsage;
  error?: string;
}

export interface StructuredCallOptions {
  maxAttempts: number;
  backoff: BackoffPolicy;
  label: string;
  onAttempt?: (report: AttemptReport) => void;
}

export async function callStructuredWithRetries<T>(
  provider: LlmProvider,
  request: StructuredRequest<T>,
  options: StructuredCallOptions
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastReason = 'no attempt made';

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let usage: TokenUsage = EMPTY_USAGE;

    try {
      const result = await provider.completeStructured(request);
      usage = result.usage;
      if (result.ok) {
        options.onAttempt?.({ attempt, outcome: 'success', usage });
        return result.data;
      }
      lastReason = result.error.message;
    } catch (error) {
      lastReason = describeError(error);
    }

    const willRetry = attempt < maxAttempts;
    options.onAttempt?.({ attempt, outcome: willRetry ? 'retried' : 'failure', usage, error: lastReason });

    if (willRetry) {
      const delay = backoffDelay(attempt, options.backoff);
      logger.warn(`[${options.label}] Attempt ${attempt}/${maxAttempts} failed (${lastReason}), retrying in ${delay}ms`);
      await sleep(delay);
    }
  }

  throw new AnalysisFailedError(lastReason, maxAttempts);
}
