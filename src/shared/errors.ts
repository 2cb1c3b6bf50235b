// Error taxonomy
// Per-source and per-article failures are recovered by the engine; InfrastructureError aborts a run

import { isAxiosError } from 'axios';

export class SourceUnavailableError extends Error {
  public readonly sourceId: string;

  constructor(sourceId: string, reason: string) {
    super(`Source ${sourceId} unavailable: ${reason}`);
    this.name = 'SourceUnavailableError';
    this.sourceId = sourceId;
  }
}

export class ExtractionFailedError extends Error {
  public readonly sourceId: string;
  public readonly url: string;

  constructor(sourceId: string, url: string, reason: string) {
    super(`Extraction failed for ${url}: ${reason}`);
    this.name = 'ExtractionFailedError';
    this.sourceId = sourceId;
    this.url = url;
  }
}

export class AnalysisFailedError extends Error {
  public readonly reason: string;
  public readonly attempts: number;

  constructor(reason: string, attempts: number) {
    super(`Analysis failed after ${attempts} attempt(s): ${reason}`);
    this.name = 'AnalysisFailedError';
    this.reason = reason;
    this.attempts = attempts;
  }
}

export class AlreadyRunningError extends Error {
  public readonly runId: string | null;

  constructor(runId: string | null) {
    super('A pipeline run is already in progress');
    this.name = 'AlreadyRunningError';
    this.runId = runId;
  }
}

export class InfrastructureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InfrastructureError';
  }
}

export class UnknownSourceError extends Error {
  public readonly requested: string[];

  constructor(requested: string[]) {
    super(`No registered source matches: ${requested.join(', ') || '(none)'}`);
    this.name = 'UnknownSourceError';
    this.requested = requested;
  }
}

export class ProviderNotConfiguredError extends Error {
  public readonly provider: string;

  constructor(provider: string, reason: string) {
    super(`Provider ${provider} is not usable: ${reason}`);
    this.name = 'ProviderNotConfiguredError';
    this.provider = provider;
  }
}

/**
 * Model output that did not match the expected schema. Returned as a value, never thrown.
 */
export class StructuredOutputError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'StructuredOutputError';
    this.issues = issues;
  }
}

export class InvalidScheduleError extends Error {
  constructor(value: string) {
    super(`Invalid schedule time "${value}", expected HH:MM (UTC)`);
    this.name = 'InvalidScheduleError';
  }
}

/**
 * Render any thrown value as one line: HTTP status, code, API message, message
 */
export function describeError(error: unknown): string {
  if (isAxiosError(error)) {
    const status = error.response?.status;
    const apiMessage = extractApiMessage(error.response?.data);
    return [
      status ? `HTTP ${status}` : null,
      error.code ? `code=${error.code}` : null,
      apiMessage ? `api=${apiMessage}` : null,
      error.message ? `msg=${error.message}` : null,
    ].filter(Boolean).join(' ');
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

function extractApiMessage(data: unknown): string | null {
  if (!data || typeof data !== 'object') return null;
  if ('error' in data) {
    const inner = data.error;
    if (typeof inner === 'string') return inner;
    if (inner && typeof inner === 'object' && 'message' in inner && typeof inner.message === 'string') {
      return inner.message;
    }
  }
  if ('message' in data && typeof data.message === 'string') return data.message;
  return null;
}
