// Structured-output schemas the model responses are validated against

import { z } from 'zod';
import { EntitySentimentInput } from '../shared/types';

const SentimentValue = z.enum(['positive', 'negative', 'neutral']);

export const EntitySentimentSchema = z.object({
  entity_name: z.string().trim().min(1),
  entity_type: z.enum(['company', 'crypto']),
  financial_sentiment: SentimentValue,
  overall_sentiment: SentimentValue,
  reasoning: z.string(),
});

export const TextAnalysisSchema = z.object({
  entities: z.array(EntitySentimentSchema),
});

export type TextAnalysis = z.infer<typeof TextAnalysisSchema>;

export const EntitySummarySchema = z.object({
  positive_financial: z.array(z.string()),
  negative_financial: z.array(z.string()),
  neutral_financial: z.array(z.string()),
  positive_overall: z.array(z.string()),
  negative_overall: z.array(z.string()),
  neutral_overall: z.array(z.string()),
  final_summary: z.string().trim().min(1),
});

export type EntitySummary = z.infer<typeof EntitySummarySchema>;

export function toEntitySentiment(entity: TextAnalysis['entities'][number]): EntitySentimentInput {
  return {
    entityName: entity.entity_name,
    entityType: entity.entity_type,
    financialSentiment: entity.financial_sentiment,
    overallSentiment: entity.overall_sentiment,
    reasoning: entity.reasoning,
  };
}
