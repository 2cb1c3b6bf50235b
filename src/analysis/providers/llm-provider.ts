// Provider capability: one structured completion, parsed or rejected by a schema

import { z } from 'zod';
import { StructuredOutputError } from '../../shared/errors';
import { TokenUsage } from '../../shared/types';

export interface StructuredRequest<T> {
  system: string;
  user: string;
  model: string;
  schema: z.ZodType<T>;
}

export type StructuredResult<T> =
  | { ok: true; data: T; usage: TokenUsage }
  | { ok: false; error: StructuredOutputError; usage: TokenUsage };

export interface LlmProvider {
  readonly name: string;
  readonly defaultModel: string;
  /**
   * Transport and HTTP failures throw; schema mismatches come back as `ok: false`
   */
  completeStructured<T>(request: StructuredRequest<T>): Promise<StructuredResult<T>>;
}

export const EMPTY_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

/**
 * Pull a JSON value out of model text, tolerating markdown fences and prose around the object
 */
export function extractJson(content: string): unknown {
  const trimmed = content
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();

  if (!trimmed) return undefined;

  try {
    return JSON.parse(trimmed);
  } catch {
    const start = trimmed.indexOf('{');
    const end = trimmed.lastIndexOf('}');
    if (start === -1 || end <= start) return undefined;
    try {
      return JSON.parse(trimmed.slice(start, end + 1));
    } catch {
      return undefined;
    }
  }
}

export function parseStructured<T>(content: string, schema: z.ZodType<T>, usage: TokenUsage): StructuredResult<T> {
  const json = extractJson(content);
  if (json === undefined) {
    return { ok: false, error: new StructuredOutputError('Response was not valid JSON'), usage };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return {
      ok: false,
      error: new StructuredOutputError(`Response did not match schema: ${issues.join('; ')}`, issues),
      usage,
    };
  }

  return { ok: true, data: parsed.data, usage };
}
