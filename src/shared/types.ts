// Shared domain types for the news sentiment pipeline

export type EntityType = 'company' | 'crypto';

export type Sentiment = 'positive' | 'negative' | 'neutral';

export type SentimentPerspective = 'financial' | 'overall';

export const ENTITY_TYPES: readonly EntityType[] = ['company', 'crypto'];
export const SENTIMENTS: readonly Sentiment[] = ['positive', 'negative', 'neutral'];

/**
 * Content pulled from a single article page by a news source
 */
export interface ExtractedArticle {
  title: string;
  body: string;
  author?: string;
  publishedAt?: Date;
}

/**
 * Article as persisted. Identity is the canonical URL.
 */
export interface Article {
  id: string;
  url: string;
  sourceId: string;
  title: string;
  body: string;
  author?: string;
  publishedAt?: Date;
  scrapedAt: Date;
  analyzedAt?: Date;
  analysisError?: string;
}

export type NewArticle = Omit<Article, 'id' | 'analyzedAt' | 'analysisError'>;

/**
 * One entity-level sentiment judgement, before it is tied to an article
 */
export interface EntitySentimentInput {
  entityName: string;
  entityType: EntityType;
  financialSentiment: Sentiment;
  overallSentiment: Sentiment;
  reasoning: string;
}

export interface EntitySentiment extends EntitySentimentInput {
  id: number;
  articleId: string;
}

export type UsageOutcome = 'success' | 'retried' | 'failure';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Append-only record of one Analysis Client attempt
 */
export interface UsageRecord extends TokenUsage {
  provider: string;
  model: string;
  costUsd: number;
  outcome: UsageOutcome;
  timestamp: Date;
  runId?: string;
  articleId?: string;
  error?: string;
}

export interface ScheduleConfig {
  time: string; // HH:MM, UTC
  enabled: boolean;
}

export type RunStatus = 'IDLE' | 'RUNNING' | 'COMPLETED' | 'STOPPED' | 'FAILED';

export type TerminalRunStatus = Exclude<RunStatus, 'IDLE' | 'RUNNING'>;

export interface RunStats {
  sourcesFailed: number;
  urlsDiscovered: number;
  articlesStored: number;
  extractionFailures: number;
  analysisFailures: number;
  sentimentsStored: number;
}

export interface RunStateSnapshot {
  runId: string | null;
  running: boolean;
  status: RunStatus;
  phase: string;
  progress: number;
  total: number;
  currentTask: string;
  startedAt: Date | null;
  endedAt: Date | null;
  error: string | null;
  stopRequested: boolean;
  provider: string | null;
  model: string | null;
  sources: string[];
  stats: RunStats;
}

/**
 * Persisted summary of a finished run
 */
export interface PipelineRunRecord {
  runId: string;
  status: TerminalRunStatus;
  provider: string;
  model: string;
  sources: string[];
  startedAt: Date;
  endedAt: Date;
  total: number;
  progress: number;
  stats: RunStats;
  error: string | null;
}

export interface ArticleFilters {
  entityName?: string;
  entityType?: EntityType;
  financialSentiment?: Sentiment;
  overallSentiment?: Sentiment;
  limit?: number;
}

export interface ArticleWithSentiments {
  id: string;
  title: string;
  url: string;
  sourceId: string;
  author: string | null;
  publishedAt: string | null;
  sentiments: EntitySentimentInput[];
}

export interface EntityRef {
  entityName: string;
  entityType: EntityType;
}

export interface RankedEntity extends EntityRef {
  sentimentCount: number;
}

export interface TopEntitiesQuery {
  sentimentType: SentimentPerspective;
  sentiment: Sentiment;
  order: 'asc' | 'desc';
  limit: number;
}

export type TrendPoint = [publishedAt: string | null, score: number];

export interface SentimentTrend {
  entityName: string;
  financialSentimentTrend: TrendPoint[];
  overallSentimentTrend: TrendPoint[];
}

export interface EntityArticleRef {
  title: string;
  url: string;
  reasoning: string;
}

export type SentimentBucket =
  | 'positive_financial'
  | 'negative_financial'
  | 'neutral_financial'
  | 'positive_overall'
  | 'negative_overall'
  | 'neutral_overall';

export type EntityArticlesBySentiment = Record<SentimentBucket, EntityArticleRef[]>;

export interface EntityReasoning {
  reasoning: string;
  financialSentiment: Sentiment;
  overallSentiment: Sentiment;
}

export interface DashboardStats {
  totalEntities: number;
  articlesAnalyzed: number;
  totalSentimentPoints: number;
  sentimentDistribution: Record<Sentiment, number>;
}

export interface UsageSummaryRow {
  provider: string;
  totalCalls: number;
  totalTokens: number;
  totalCostUsd: number;
}

export interface Config {
  app: {
    name: string;
    version: string;
    environment: 'development' | 'production' | 'test';
    logLevel: 'debug' | 'info' | 'warn' | 'error';
  };
  database: {
    path: string;
  };
  providers: Record<string, ProviderConfig>;
  analysis: {
    maxRetries: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    maxInputChars: number;
  };
  scraping: {
    userAgent: string;
    timeout: number;
    maxUrlsPerSource: number;
  };
  scheduler: {
    dailyTime: string;
    enabled: boolean;
    provider: string;
    model?: string;
  };
  server: {
    port: number;
    pipelinePassword?: string;
  };
}

export interface ProviderConfig {
  apiKey: string;
  baseUrl: string;
  defaultModel: string;
  timeout: number;
}
