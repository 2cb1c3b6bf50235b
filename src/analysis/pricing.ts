// Best-effort USD prices per 1M tokens. Informational only.

import { TokenUsage } from '../shared/types';

interface ModelPrice {
  input: number;
  output: number;
}

const MODEL_PRICES: Record<string, ModelPrice> = {
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  'gpt-4o': { input: 2.5, output: 10 },
  'gpt-4-turbo': { input: 10, output: 30 },
  'gpt-3.5-turbo': { input: 0.5, output: 1.5 },
  'llama3-8b-8192': { input: 0.05, output: 0.08 },
  'llama3-70b-8192': { input: 0.59, output: 0.79 },
  'llama-3.1-8b-instant': { input: 0.05, output: 0.08 },
  'mixtral-8x7b-32768': { input: 0.24, output: 0.24 },
};

// Longest key first so "gpt-4o-mini-2024-07-18" resolves to gpt-4o-mini, not gpt-4o
const PRICE_KEYS = Object.keys(MODEL_PRICES).sort((a, b) => b.length - a.length);

export function priceFor(model: string): ModelPrice | null {
  const key = PRICE_KEYS.find(candidate => model === candidate || model.startsWith(`${candidate}-`));
  return key ? MODEL_PRICES[key] : null;
}

export function estimateCost(model: string, usage: TokenUsage): number {
  const price = priceFor(model);
  if (!price) return 0;
  return (usage.promptTokens * price.input + usage.completionTokens * price.output) / 1_000_000;
}
