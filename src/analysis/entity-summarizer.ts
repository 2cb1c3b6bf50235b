// Entity Summarizer
// Condenses every stored reasoning for one entity into a structured profile

import configManager from '../shared/config';
import logger from '../shared/logger';
import { describeError } from '../shared/errors';
import { EntityReasoning, UsageRecord } from '../shared/types';
import { estimateCost } from './pricing';
import { LlmProvider } from './providers/llm-provider';
import { EntitySummary, EntitySummarySchema } from './schemas';
import { AnalyzerOptions, UsageSink } from './sentiment-analyzer';
import { callStructuredWithRetries } from './structured-call';

export interface ReasoningSource {
  getEntityReasonings(entityName: string): EntityReasoning[];
}

const SUMMARY_SYSTEM_PROMPT = `You are an expert financial analyst. You will be given reasoning snippets from several news articles about one company or cryptocurrency. Synthesize them into a structured summary.

Sort the key points into six lists:
- positive_financial: stock growth, good earnings and similar.
- negative_financial: stock decline, poor earnings and similar.
- neutral_financial: factual financial statements without a clear direction.
- positive_overall: successful products, partnerships, good decisions.
- negative_overall: failed projects, legal issues, poor decisions.
- neutral_overall: factual statements about operations or announcements.

Then give a one or two sentence final_summary of the entity's overall position.
Use only the provided snippets. Respond with one JSON object containing all seven fields.`;

export function formatReasonings(reasonings: EntityReasoning[]): string {
  return reasonings
    .map(r => `- (Financial: ${r.financialSentiment}, Overall: ${r.overallSentiment}) ${r.reasoning}`)
    .join('\n');
}

export class EntitySummarizer {
  private reasonings: ReasoningSource;
  private usageSink?: UsageSink;
  private options: Pick<AnalyzerOptions, 'maxRetries' | 'retryBaseDelayMs' | 'retryMaxDelayMs'>;

  constructor(reasonings: ReasoningSource, usageSink?: UsageSink, options: Partial<AnalyzerOptions> = {}) {
    this.reasonings = reasonings;
    this.usageSink = usageSink;
    this.options = { ...configManager.get().analysis, ...options };
  }

  /**
   * null when nothing is stored for the entity
   */
  async summarize(entityName: string, provider: LlmProvider, model: string): Promise<EntitySummary | null> {
    const reasonings = this.reasonings.getEntityReasonings(entityName);
    if (reasonings.length === 0) return null;

    const { maxRetries, retryBaseDelayMs, retryMaxDelayMs } = this.options;
    logger.info(`[EntitySummarizer] Summarizing ${reasonings.length} reasonings for "${entityName}"`);

    return callStructuredWithRetries(
      provider,
      {
        system: SUMMARY_SYSTEM_PROMPT,
        user: `Please summarize the following reasoning points for ${entityName}:\n\n${formatReasonings(reasonings)}`,
        model,
        schema: EntitySummarySchema,
      },
      {
        maxAttempts: maxRetries,
        backoff: { baseDelayMs: retryBaseDelayMs, maxDelayMs: retryMaxDelayMs },
        label: 'EntitySummarizer',
        onAttempt: report => {
          if (!this.usageSink) return;
          const record: UsageRecord = {
            provider: provider.name,
            model,
            ...report.usage,
            costUsd: estimateCost(model, report.usage),
            outcome: report.outcome,
            timestamp: new Date(),
            error: report.error,
          };
          try {
            this.usageSink.appendUsage(record);
          } catch (error) {
            logger.warn(`[EntitySummarizer] Failed to record usage: ${describeError(error)}`);
          }
        },
      }
    );
  }
}
