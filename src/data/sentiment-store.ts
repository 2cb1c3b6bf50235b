// Sentiment Store - SQLite persistence for articles, entity sentiments, usage and runs
// The engine sees it through PipelineStore; the dashboard reads it through the query methods

import fs from 'fs';
import path from 'path';
import BetterSqlite3 from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import configManager from '../shared/config';
import logger from '../shared/logger';
import { InfrastructureError, describeError } from '../shared/errors';
import {
  Article,
  ArticleFilters,
  ArticleWithSentiments,
  DashboardStats,
  EntityArticleRef,
  EntityArticlesBySentiment,
  EntityReasoning,
  EntityRef,
  EntitySentiment,
  EntitySentimentInput,
  EntityType,
  NewArticle,
  PipelineRunRecord,
  RankedEntity,
  Sentiment,
  SentimentTrend,
  TerminalRunStatus,
  TopEntitiesQuery,
  UsageOutcome,
  UsageRecord,
  UsageSummaryRow,
} from '../shared/types';

/**
 * What the pipeline engine needs from persistence. Every write is durable on return.
 */
export interface PipelineStore {
  existsUrl(url: string): boolean;
  saveArticle(article: NewArticle): string;
  saveEntitySentiments(articleId: string, sentiments: EntitySentimentInput[]): void;
  markAnalysisFailed(articleId: string, reason: string): void;
  appendUsage(record: UsageRecord): void;
  recordRun(record: PipelineRunRecord): void;
}

export interface KeyValueStore {
  getConfigValue(key: string): string | null;
  setConfigValue(key: string, value: string): void;
}

interface ArticleRow {
  id: string;
  url: string;
  source_id: string;
  title: string;
  body: string;
  author: string | null;
  published_at: string | null;
  scraped_at: string;
  analyzed_at: string | null;
  analysis_error: string | null;
}

interface SentimentRow {
  id: number;
  article_id: string;
  entity_name: string;
  entity_type: EntityType;
  financial_sentiment: Sentiment;
  overall_sentiment: Sentiment;
  reasoning: string;
}

interface ArticleSentimentJoinRow {
  id: string;
  title: string;
  url: string;
  source_id: string;
  author: string | null;
  published_at: string | null;
  sentiment_id: number | null;
  entity_name: string | null;
  entity_type: EntityType | null;
  financial_sentiment: Sentiment | null;
  overall_sentiment: Sentiment | null;
  reasoning: string | null;
}

interface UsageRow {
  timestamp: string;
  provider: string;
  model: string;
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  cost_usd: number;
  outcome: UsageOutcome;
  run_id: string | null;
  article_id: string | null;
  error: string | null;
}

interface RunRow {
  run_id: string;
  status: TerminalRunStatus;
  provider: string;
  model: string;
  sources: string;
  started_at: string;
  ended_at: string;
  total: number;
  progress: number;
  stats: string;
  error: string | null;
}

const RunStatsSchema = z.object({
  sourcesFailed: z.number(),
  urlsDiscovered: z.number(),
  articlesStored: z.number(),
  extractionFailures: z.number(),
  analysisFailures: z.number(),
  sentimentsStored: z.number(),
});

const SourcesSchema = z.array(z.string());

const EMPTY_RUN_STATS = {
  sourcesFailed: 0,
  urlsDiscovered: 0,
  articlesStored: 0,
  extractionFailures: 0,
  analysisFailures: 0,
  sentimentsStored: 0,
};

const SENTIMENT_COLUMNS = {
  financial: 'financial_sentiment',
  overall: 'overall_sentiment',
} as const;

function sentimentScore(sentiment: Sentiment): number {
  if (sentiment === 'positive') return 1;
  if (sentiment === 'negative') return -1;
  return 0;
}

function parseJson<T>(raw: string, schema: z.ZodType<T>, fallback: T): T {
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : fallback;
  } catch (error) {
    logger.warn(`[SentimentStore] Unreadable JSON column: ${describeError(error)}`);
    return fallback;
  }
}

export class SentimentStore implements PipelineStore, KeyValueStore {
  private db: BetterSqlite3.Database | null = null;
  private dbPath: string;

  constructor(dbPath: string = configManager.get().database.path) {
    this.dbPath = dbPath;
  }

  initialize(): void {
    if (this.db) return;

    try {
      if (this.dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(this.dbPath)), { recursive: true });
      }

      const db = new BetterSqlite3(this.dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');

      db.exec(`
        CREATE TABLE IF NOT EXISTS articles (
          id TEXT PRIMARY KEY,
          url TEXT NOT NULL UNIQUE,
          source_id TEXT NOT NULL,
          title TEXT NOT NULL,
          body TEXT NOT NULL,
          author TEXT,
          published_at TEXT,
          scraped_at TEXT NOT NULL,
          analyzed_at TEXT,
          analysis_error TEXT
        )
      `);

      db.exec(`
        CREATE TABLE IF NOT EXISTS entity_sentiments (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          article_id TEXT NOT NULL REFERENCES articles(id),
          entity_name TEXT NOT NULL,
          entity_type TEXT NOT NULL CHECK (entity_type IN ('company', 'crypto')),
          financial_sentiment TEXT NOT NULL CHECK (financial_sentiment IN ('positive', 'negative', 'neutral')),
          overall_sentiment TEXT NOT NULL CHECK (overall_sentiment IN ('positive', 'negative', 'neutral')),
          reasoning TEXT NOT NULL
        )
      `);

      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_entity_sentiments_article
        ON entity_sentiments(article_id)
      `);

      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_entity_sentiments_name
        ON entity_sentiments(entity_name)
      `);

      db.exec(`
        CREATE TABLE IF NOT EXISTS usage_logs (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          timestamp TEXT NOT NULL,
          provider TEXT NOT NULL,
          model TEXT NOT NULL,
          prompt_tokens INTEGER NOT NULL,
          completion_tokens INTEGER NOT NULL,
          total_tokens INTEGER NOT NULL,
          cost_usd REAL NOT NULL,
          outcome TEXT NOT NULL,
          run_id TEXT,
          article_id TEXT,
          error TEXT
        )
      `);

      db.exec(`
        CREATE TABLE IF NOT EXISTS pipeline_runs (
          run_id TEXT PRIMARY KEY,
          status TEXT NOT NULL,
          provider TEXT NOT NULL,
          model TEXT NOT NULL,
          sources TEXT NOT NULL,
          started_at TEXT NOT NULL,
          ended_at TEXT NOT NULL,
          total INTEGER NOT NULL,
          progress INTEGER NOT NULL,
          stats TEXT NOT NULL,
          error TEXT
        )
      `);

      db.exec(`
        CREATE TABLE IF NOT EXISTS app_config (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL
        )
      `);

      this.db = db;
      logger.info(`[SentimentStore] Initialized database at ${this.dbPath}`);
    } catch (error) {
      logger.error(`[SentimentStore] Failed to initialize: ${describeError(error)}`);
      throw new InfrastructureError(`Could not open sentiment database: ${describeError(error)}`, { cause: error });
    }
  }

  close(): void {
    if (!this.db) return;
    this.db.close();
    this.db = null;
  }

  private connection(): BetterSqlite3.Database {
    if (!this.db) this.initialize();
    if (!this.db) throw new InfrastructureError('Sentiment database is not available');
    return this.db;
  }

  // ---- pipeline writes ----

  existsUrl(url: string): boolean {
    const row = this.connection()
      .prepare<[string], { found: number }>('SELECT 1 AS found FROM articles WHERE url = ?')
      .get(url);
    return row !== undefined;
  }

  /**
   * Insert an article and return its id. An already stored URL keeps its original row.
   */
  saveArticle(article: NewArticle): string {
    const db = this.connection();
    const id = uuidv4();
    const result = db.prepare(`
      INSERT OR IGNORE INTO articles (id, url, source_id, title, body, author, published_at, scraped_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      article.url,
      article.sourceId,
      article.title,
      article.body,
      article.author ?? null,
      article.publishedAt ? article.publishedAt.toISOString() : null,
      article.scrapedAt.toISOString()
    );

    if (result.changes > 0) return id;

    const existing = db.prepare<[string], { id: string }>('SELECT id FROM articles WHERE url = ?').get(article.url);
    if (!existing) throw new InfrastructureError(`Article ${article.url} was neither inserted nor found`);
    logger.warn(`[SentimentStore] Article ${article.url} already stored, reusing ${existing.id}`);
    return existing.id;
  }

  saveEntitySentiments(articleId: string, sentiments: EntitySentimentInput[]): void {
    const db = this.connection();
    const insert = db.prepare(`
      INSERT INTO entity_sentiments (article_id, entity_name, entity_type, financial_sentiment, overall_sentiment, reasoning)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    const markAnalyzed = db.prepare(`
      UPDATE articles SET analyzed_at = ?, analysis_error = NULL WHERE id = ?
    `);

    const batch = db.transaction((items: EntitySentimentInput[]) => {
      for (const item of items) {
        insert.run(
          articleId,
          item.entityName,
          item.entityType,
          item.financialSentiment,
          item.overallSentiment,
          item.reasoning
        );
      }
      markAnalyzed.run(new Date().toISOString(), articleId);
    });

    batch(sentiments);
  }

  markAnalysisFailed(articleId: string, reason: string): void {
    this.connection()
      .prepare('UPDATE articles SET analysis_error = ? WHERE id = ?')
      .run(reason, articleId);
  }

  appendUsage(record: UsageRecord): void {
    this.connection().prepare(`
      INSERT INTO usage_logs (
        timestamp, provider, model, prompt_tokens, completion_tokens, total_tokens,
        cost_usd, outcome, run_id, article_id, error
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      record.timestamp.toISOString(),
      record.provider,
      record.model,
      record.promptTokens,
      record.completionTokens,
      record.totalTokens,
      record.costUsd,
      record.outcome,
      record.runId ?? null,
      record.articleId ?? null,
      record.error ?? null
    );
  }

  recordRun(record: PipelineRunRecord): void {
    this.connection().prepare(`
      INSERT OR REPLACE INTO pipeline_runs (
        run_id, status, provider, model, sources, started_at, ended_at, total, progress, stats, error
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      record.runId,
      record.status,
      record.provider,
      record.model,
      JSON.stringify(record.sources),
      record.startedAt.toISOString(),
      record.endedAt.toISOString(),
      record.total,
      record.progress,
      JSON.stringify(record.stats),
      record.error
    );
  }

  getLastRun(): PipelineRunRecord | null {
    const row = this.connection()
      .prepare<[], RunRow>('SELECT * FROM pipeline_runs ORDER BY ended_at DESC, started_at DESC LIMIT 1')
      .get();
    if (!row) return null;

    return {
      runId: row.run_id,
      status: row.status,
      provider: row.provider,
      model: row.model,
      sources: parseJson(row.sources, SourcesSchema, []),
      startedAt: new Date(row.started_at),
      endedAt: new Date(row.ended_at),
      total: row.total,
      progress: row.progress,
      stats: parseJson(row.stats, RunStatsSchema, EMPTY_RUN_STATS),
      error: row.error,
    };
  }

  getConfigValue(key: string): string | null {
    const row = this.connection()
      .prepare<[string], { value: string }>('SELECT value FROM app_config WHERE key = ?')
      .get(key);
    return row ? row.value : null;
  }

  setConfigValue(key: string, value: string): void {
    this.connection().prepare(`
      INSERT INTO app_config (key, value) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value
    `).run(key, value);
  }

  // ---- reads ----

  getArticleByUrl(url: string): Article | null {
    const row = this.connection()
      .prepare<[string], ArticleRow>('SELECT * FROM articles WHERE url = ?')
      .get(url);
    if (!row) return null;

    return {
      id: row.id,
      url: row.url,
      sourceId: row.source_id,
      title: row.title,
      body: row.body,
      author: row.author ?? undefined,
      publishedAt: row.published_at ? new Date(row.published_at) : undefined,
      scrapedAt: new Date(row.scraped_at),
      analyzedAt: row.analyzed_at ? new Date(row.analyzed_at) : undefined,
      analysisError: row.analysis_error ?? undefined,
    };
  }

  getSentimentsForArticle(articleId: string): EntitySentiment[] {
    const rows = this.connection()
      .prepare<[string], SentimentRow>('SELECT * FROM entity_sentiments WHERE article_id = ? ORDER BY id')
      .all(articleId);
    return rows.map(row => ({
      id: row.id,
      articleId: row.article_id,
      entityName: row.entity_name,
      entityType: row.entity_type,
      financialSentiment: row.financial_sentiment,
      overallSentiment: row.overall_sentiment,
      reasoning: row.reasoning,
    }));
  }

  /**
   * Newest articles first, each with all of its sentiments. Filters select articles
   * that have at least one sentiment row matching every given condition.
   */
  getArticles(filters: ArticleFilters = {}): ArticleWithSentiments[] {
    const conditions: string[] = [];
    const params: Record<string, string | number> = {
      limit: filters.limit && filters.limit > 0 ? Math.floor(filters.limit) : 20,
    };

    if (filters.entityName) {
      conditions.push('entity_name LIKE @entityName');
      params.entityName = `%${filters.entityName}%`;
    }
    if (filters.entityType) {
      conditions.push('entity_type = @entityType');
      params.entityType = filters.entityType;
    }
    if (filters.financialSentiment) {
      conditions.push('financial_sentiment = @financialSentiment');
      params.financialSentiment = filters.financialSentiment;
    }
    if (filters.overallSentiment) {
      conditions.push('overall_sentiment = @overallSentiment');
      params.overallSentiment = filters.overallSentiment;
    }

    const where = conditions.length
      ? `WHERE id IN (SELECT article_id FROM entity_sentiments WHERE ${conditions.join(' AND ')})`
      : '';

    const rows = this.connection().prepare<Record<string, string | number>, ArticleSentimentJoinRow>(`
      SELECT a.id, a.title, a.url, a.source_id, a.author, a.published_at,
             s.id AS sentiment_id, s.entity_name, s.entity_type,
             s.financial_sentiment, s.overall_sentiment, s.reasoning
      FROM (
        SELECT * FROM articles ${where}
        ORDER BY published_at DESC, scraped_at DESC
        LIMIT @limit
      ) a
      LEFT JOIN entity_sentiments s ON s.article_id = a.id
      ORDER BY a.published_at DESC, a.scraped_at DESC, s.id ASC
    `).all(params);

    const articles = new Map<string, ArticleWithSentiments>();
    for (const row of rows) {
      let article = articles.get(row.id);
      if (!article) {
        article = {
          id: row.id,
          title: row.title,
          url: row.url,
          sourceId: row.source_id,
          author: row.author,
          publishedAt: row.published_at,
          sentiments: [],
        };
        articles.set(row.id, article);
      }

      if (
        row.sentiment_id !== null &&
        row.entity_name !== null &&
        row.entity_type !== null &&
        row.financial_sentiment !== null &&
        row.overall_sentiment !== null
      ) {
        article.sentiments.push({
          entityName: row.entity_name,
          entityType: row.entity_type,
          financialSentiment: row.financial_sentiment,
          overallSentiment: row.overall_sentiment,
          reasoning: row.reasoning ?? '',
        });
      }
    }

    return Array.from(articles.values());
  }

  getEntities(): EntityRef[] {
    return this.connection()
      .prepare<[], { entity_name: string; entity_type: EntityType }>(`
        SELECT DISTINCT entity_name, entity_type FROM entity_sentiments ORDER BY entity_name, entity_type
      `)
      .all()
      .map(row => ({ entityName: row.entity_name, entityType: row.entity_type }));
  }

  getTopEntities(query: TopEntitiesQuery): RankedEntity[] {
    const column = SENTIMENT_COLUMNS[query.sentimentType];
    const direction = query.order === 'asc' ? 'ASC' : 'DESC';

    return this.connection()
      .prepare<[Sentiment, number], { entity_name: string; entity_type: EntityType; sentiment_count: number }>(`
        SELECT entity_name, entity_type, COUNT(*) AS sentiment_count
        FROM entity_sentiments
        WHERE ${column} = ?
        GROUP BY entity_name, entity_type
        ORDER BY sentiment_count ${direction}, entity_name ASC
        LIMIT ?
      `)
      .all(query.sentiment, query.limit)
      .map(row => ({
        entityName: row.entity_name,
        entityType: row.entity_type,
        sentimentCount: row.sentiment_count,
      }));
  }

  /**
   * +1 / 0 / -1 per mention, oldest publication first. null when the entity is unknown.
   */
  getSentimentOverTime(entityName: string): SentimentTrend | null {
    const rows = this.connection()
      .prepare<[string], { published_at: string | null; financial_sentiment: Sentiment; overall_sentiment: Sentiment }>(`
        SELECT a.published_at, s.financial_sentiment, s.overall_sentiment
        FROM entity_sentiments s
        JOIN articles a ON s.article_id = a.id
        WHERE s.entity_name LIKE ?
        ORDER BY a.published_at ASC, s.id ASC
      `)
      .all(`%${entityName}%`);

    if (rows.length === 0) return null;

    return {
      entityName,
      financialSentimentTrend: rows.map(row => [row.published_at, sentimentScore(row.financial_sentiment)]),
      overallSentimentTrend: rows.map(row => [row.published_at, sentimentScore(row.overall_sentiment)]),
    };
  }

  getEntityArticlesBySentiment(entityName: string, entityType: EntityType): EntityArticlesBySentiment | null {
    const rows = this.connection()
      .prepare<[string, EntityType], { title: string; url: string; reasoning: string; financial_sentiment: Sentiment; overall_sentiment: Sentiment }>(`
        SELECT a.title, a.url, s.reasoning, s.financial_sentiment, s.overall_sentiment
        FROM entity_sentiments s
        JOIN articles a ON s.article_id = a.id
        WHERE s.entity_name LIKE ? AND s.entity_type = ?
        ORDER BY s.id ASC
      `)
      .all(`%${entityName}%`, entityType);

    if (rows.length === 0) return null;

    const buckets: EntityArticlesBySentiment = {
      positive_financial: [],
      negative_financial: [],
      neutral_financial: [],
      positive_overall: [],
      negative_overall: [],
      neutral_overall: [],
    };
    const seen = new Set<string>();

    const add = (bucket: keyof EntityArticlesBySentiment, ref: EntityArticleRef): void => {
      const key = `${bucket}\u0000${ref.url}\u0000${ref.title}\u0000${ref.reasoning}`;
      if (seen.has(key)) return;
      seen.add(key);
      buckets[bucket].push(ref);
    };

    for (const row of rows) {
      const ref: EntityArticleRef = { title: row.title, url: row.url, reasoning: row.reasoning };
      add(`${row.financial_sentiment}_financial`, ref);
      add(`${row.overall_sentiment}_overall`, ref);
    }

    return buckets;
  }

  getEntityReasonings(entityName: string): EntityReasoning[] {
    return this.connection()
      .prepare<[string], { reasoning: string; financial_sentiment: Sentiment; overall_sentiment: Sentiment }>(`
        SELECT reasoning, financial_sentiment, overall_sentiment
        FROM entity_sentiments
        WHERE entity_name LIKE ?
        ORDER BY id ASC
      `)
      .all(`%${entityName}%`)
      .map(row => ({
        reasoning: row.reasoning,
        financialSentiment: row.financial_sentiment,
        overallSentiment: row.overall_sentiment,
      }));
  }

  getDashboardStats(): DashboardStats {
    const db = this.connection();
    const totals = db.prepare<[], { total_entities: number; articles_analyzed: number; total_sentiments: number }>(`
      SELECT COUNT(DISTINCT entity_name) AS total_entities,
             COUNT(DISTINCT article_id) AS articles_analyzed,
             COUNT(*) AS total_sentiments
      FROM entity_sentiments
    `).get();

    const distribution: Record<Sentiment, number> = { positive: 0, negative: 0, neutral: 0 };
    const rows = db.prepare<[], { sentiment: Sentiment; count: number }>(`
      SELECT sentiment, COUNT(*) AS count FROM (
        SELECT financial_sentiment AS sentiment FROM entity_sentiments
        UNION ALL
        SELECT overall_sentiment AS sentiment FROM entity_sentiments
      )
      GROUP BY sentiment
    `).all();
    for (const row of rows) {
      distribution[row.sentiment] = row.count;
    }

    return {
      totalEntities: totals?.total_entities ?? 0,
      articlesAnalyzed: totals?.articles_analyzed ?? 0,
      totalSentimentPoints: totals?.total_sentiments ?? 0,
      sentimentDistribution: distribution,
    };
  }

  getUsageLog(limit: number = 500): UsageRecord[] {
    return this.connection()
      .prepare<[number], UsageRow>('SELECT * FROM usage_logs ORDER BY timestamp DESC, id DESC LIMIT ?')
      .all(limit)
      .map(row => ({
        provider: row.provider,
        model: row.model,
        promptTokens: row.prompt_tokens,
        completionTokens: row.completion_tokens,
        totalTokens: row.total_tokens,
        costUsd: row.cost_usd,
        outcome: row.outcome,
        timestamp: new Date(row.timestamp),
        runId: row.run_id ?? undefined,
        articleId: row.article_id ?? undefined,
        error: row.error ?? undefined,
      }));
  }

  getUsageSummary(): UsageSummaryRow[] {
    return this.connection()
      .prepare<[], { provider: string; total_calls: number; total_tokens: number | null; total_cost: number | null }>(`
        SELECT provider, COUNT(*) AS total_calls, SUM(total_tokens) AS total_tokens, SUM(cost_usd) AS total_cost
        FROM usage_logs
        GROUP BY provider
        ORDER BY provider
      `)
      .all()
      .map(row => ({
        provider: row.provider,
        totalCalls: row.total_calls,
        totalTokens: row.total_tokens ?? 0,
        totalCostUsd: row.total_cost ?? 0,
      }));
  }
}

const sentimentStore = new SentimentStore();
export default sentimentStore;
