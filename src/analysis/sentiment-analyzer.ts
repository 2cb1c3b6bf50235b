// Sentiment Analyzer
// analyze(text, provider, model) -> entity sentiments, with retries and one usage record per attempt

import configManager from '../shared/config';
import logger from '../shared/logger';
import { describeError } from '../shared/errors';
import { EntitySentimentInput, UsageRecord } from '../shared/types';
import { estimateCost } from './pricing';
import { LlmProvider } from './providers/llm-provider';
import { TextAnalysisSchema, toEntitySentiment } from './schemas';
import { AttemptReport, callStructuredWithRetries } from './structured-call';

export interface UsageSink {
  appendUsage(record: UsageRecord): void;
}

export interface AnalysisContext {
  runId?: string;
  articleId?: string;
}

export interface AnalyzerOptions {
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  maxInputChars: number;
}

export const SENTIMENT_SYSTEM_PROMPT = `You are a highly precise financial analyst. Extract only legitimate companies and cryptocurrencies from the provided text and analyze each from two perspectives: financial sentiment and overall sentiment.

Rules:
1. Return the full, official name of each entity (for example "IBM" becomes "International Business Machines").
2. Do not extract locations such as countries or cities.
3. If there are no valid entities, return an empty list.
4. Financial sentiment is strictly about quantitative performance: stock prices, earnings, market data.
5. Overall sentiment is about qualitative, operational news: products, partnerships, decisions, legal issues.

Respond with a single JSON object of this shape and nothing else:
{"entities": [{"entity_name": string, "entity_type": "company" | "crypto", "financial_sentiment": "positive" | "negative" | "neutral", "overall_sentiment": "positive" | "negative" | "neutral", "reasoning": string}]}
Every entity object must contain all fields.`;

export class SentimentAnalyzer {
  private usageSink: UsageSink;
  private options: AnalyzerOptions;

  constructor(usageSink: UsageSink, options: Partial<AnalyzerOptions> = {}) {
    this.usageSink = usageSink;
    this.options = { ...configManager.get().analysis, ...options };
  }

  /**
   * Throws AnalysisFailedError once every attempt has failed
   */
  async analyze(
    text: string,
    provider: LlmProvider,
    model: string,
    context: AnalysisContext = {}
  ): Promise<EntitySentimentInput[]> {
    const input = text.length > this.options.maxInputChars
      ? text.slice(0, this.options.maxInputChars)
      : text;

    logger.debug(`[SentimentAnalyzer] Analyzing ${input.length} chars with ${provider.name} (${model})`);

    const analysis = await callStructuredWithRetries(
      provider,
      { system: SENTIMENT_SYSTEM_PROMPT, user: input, model, schema: TextAnalysisSchema },
      {
        maxAttempts: this.options.maxRetries,
        backoff: { baseDelayMs: this.options.retryBaseDelayMs, maxDelayMs: this.options.retryMaxDelayMs },
        label: 'SentimentAnalyzer',
        onAttempt: report => this.recordUsage(provider.name, model, report, context),
      }
    );

    return analysis.entities.map(toEntitySentiment);
  }

  private recordUsage(provider: string, model: string, report: AttemptReport, context: AnalysisContext): void {
    const record: UsageRecord = {
      provider,
      model,
      ...report.usage,
      costUsd: estimateCost(model, report.usage),
      outcome: report.outcome,
      timestamp: new Date(),
      runId: context.runId,
      articleId: context.articleId,
      error: report.error,
    };

    try {
      this.usageSink.appendUsage(record);
    } catch (error) {
      logger.warn(`[SentimentAnalyzer] Failed to record usage: ${describeError(error)}`);
    }
  }
}
