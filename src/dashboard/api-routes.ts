// Dashboard API routes
// Pipeline control (start/stop/status/schedule) plus read-only sentiment queries

import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import configManager from '../shared/config';
import logger from '../shared/logger';
import {
  AlreadyRunningError,
  AnalysisFailedError,
  InvalidScheduleError,
  ProviderNotConfiguredError,
  UnknownSourceError,
  describeError,
} from '../shared/errors';
import { RunStateSnapshot } from '../shared/types';
import { SentimentStore } from '../data/sentiment-store';
import { EntitySummarizer } from '../analysis/entity-summarizer';
import { ProviderRegistry } from '../analysis/providers/provider-registry';
import { PipelineEngine } from '../pipeline/pipeline-engine';
import { PipelineScheduler } from '../pipeline/scheduler';

export interface ApiDependencies {
  engine: PipelineEngine;
  scheduler: PipelineScheduler;
  store: SentimentStore;
  providers: ProviderRegistry;
  summarizer: EntitySummarizer;
  pipelinePassword?: string;
  defaultProvider?: string;
}

const SentimentEnum = z.enum(['positive', 'negative', 'neutral']);
const EntityTypeEnum = z.enum(['company', 'crypto']);

const StartBodySchema = z.object({
  provider: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  sources: z.array(z.string().min(1)).optional(),
  apiKey: z.string().min(1).optional(),
});

const ScheduleBodySchema = z.object({
  time: z.string(),
  enabled: z.boolean().optional(),
});

const ArticlesQuerySchema = z.object({
  entity_name: z.string().min(1).optional(),
  entity_type: EntityTypeEnum.optional(),
  financial_sentiment: SentimentEnum.optional(),
  overall_sentiment: SentimentEnum.optional(),
  limit: z.coerce.number().int().min(1).max(500).default(20),
});

const TopEntitiesQuerySchema = z.object({
  sentiment_type: z.enum(['financial', 'overall']).default('overall'),
  sentiment: SentimentEnum.default('positive'),
  order: z.string().toLowerCase().pipe(z.enum(['asc', 'desc'])).default('desc'),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

const EntityNameQuerySchema = z.object({
  entity_name: z.string().min(1),
});

const EntityArticlesQuerySchema = z.object({
  entity_name: z.string().min(1),
  entity_type: EntityTypeEnum,
});

const SummaryQuerySchema = z.object({
  entity_name: z.string().min(1),
  provider: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

const UsageQuerySchema = z.object({
  summarize: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(5000).default(500),
});

function sendError(res: Response, status: number, error: string, details?: unknown): void {
  res.status(status).json({ success: false, error, ...(details === undefined ? {} : { details }) });
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function startErrorStatus(error: unknown): number {
  if (error instanceof AlreadyRunningError) return 409;
  if (error instanceof UnknownSourceError || error instanceof ProviderNotConfiguredError) return 400;
  return 500;
}

export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();
  const { engine, scheduler, store, providers, summarizer } = deps;
  const defaultProvider = deps.defaultProvider || configManager.get().scheduler.provider;

  const requirePassword = (req: Request, res: Response, next: NextFunction): void => {
    if (!deps.pipelinePassword) {
      next();
      return;
    }
    if (req.get('x-pipeline-password') !== deps.pipelinePassword) {
      sendError(res, 401, 'Unauthorized. A valid pipeline password is required.');
      return;
    }
    next();
  };

  // ---- pipeline control ----

  router.get('/sources', (_req, res) => {
    res.json({ success: true, sources: engine.listSources() });
  });

  router.get('/providers', (_req, res) => {
    res.json({ success: true, providers: providers.list() });
  });

  router.post('/pipeline/start', requirePassword, (req, res) => {
    const parsed = StartBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendError(res, 400, 'Invalid request body', formatIssues(parsed.error));
      return;
    }

    try {
      const handle = engine.start({ ...parsed.data, provider: parsed.data.provider || defaultProvider });
      res.status(202).json({
        success: true,
        runId: handle.runId,
        message: 'Pipeline triggered successfully in the background.',
      });
    } catch (error) {
      const status = startErrorStatus(error);
      if (status === 500) {
        logger.error(`[DashboardAPI] Failed to start pipeline: ${describeError(error)}`);
      }
      sendError(res, status, describeError(error));
    }
  });

  router.post('/pipeline/stop', requirePassword, (_req, res) => {
    if (!engine.stop()) {
      sendError(res, 404, 'No pipeline is currently running.');
      return;
    }
    res.status(202).json({ success: true, message: 'Pipeline stop signal sent. It will terminate shortly.' });
  });

  router.get('/pipeline/status', (_req, res) => {
    res.json({ success: true, status: engine.status() });
  });

  router.get('/pipeline/status/stream', (_req, res) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const send = (snapshot: Readonly<RunStateSnapshot>): void => {
      res.write(`data: ${JSON.stringify(snapshot)}\n\n`);
    };

    send(engine.status());
    engine.on('state', send);
    res.on('close', () => {
      engine.off('state', send);
    });
  });

  router.get('/pipeline/last-run', (_req, res) => {
    try {
      const lastRun = store.getLastRun();
      if (!lastRun) {
        sendError(res, 404, 'No previous pipeline run found.');
        return;
      }
      res.json({ success: true, run: lastRun });
    } catch (error) {
      logger.error(`[DashboardAPI] Failed to load last run: ${describeError(error)}`);
      sendError(res, 500, describeError(error));
    }
  });

  router.get('/pipeline/schedule', (_req, res) => {
    res.json({ success: true, schedule: scheduler.getSchedule() });
  });

  router.put('/pipeline/schedule', requirePassword, (req, res) => {
    const parsed = ScheduleBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendError(res, 400, 'Invalid request body', formatIssues(parsed.error));
      return;
    }

    try {
      const schedule = scheduler.configure(parsed.data.time, parsed.data.enabled);
      logger.info(`[DashboardAPI] Pipeline schedule updated to ${schedule.time} UTC`);
      res.json({ success: true, schedule });
    } catch (error) {
      if (error instanceof InvalidScheduleError) {
        sendError(res, 400, error.message);
        return;
      }
      logger.error(`[DashboardAPI] Failed to update schedule: ${describeError(error)}`);
      sendError(res, 500, 'Failed to update schedule.', describeError(error));
    }
  });

  // ---- queries ----

  router.get('/articles', (req, res) => {
    const parsed = ArticlesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendError(res, 400, 'Invalid query parameters', formatIssues(parsed.error));
      return;
    }

    const query = parsed.data;
    const articles = store.getArticles({
      entityName: query.entity_name,
      entityType: query.entity_type,
      financialSentiment: query.financial_sentiment,
      overallSentiment: query.overall_sentiment,
      limit: query.limit,
    });
    res.json({ success: true, count: articles.length, articles });
  });

  router.get('/entities', (_req, res) => {
    res.json({ success: true, entities: store.getEntities() });
  });

  router.get('/entities/top', (req, res) => {
    const parsed = TopEntitiesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendError(res, 400, 'Invalid query parameters', formatIssues(parsed.error));
      return;
    }

    const { sentiment_type: sentimentType, sentiment, order, limit } = parsed.data;
    res.json({ success: true, entities: store.getTopEntities({ sentimentType, sentiment, order, limit }) });
  });

  router.get('/entities/sentiment-over-time', (req, res) => {
    const parsed = EntityNameQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendError(res, 400, "An 'entity_name' query parameter is required.");
      return;
    }

    const trend = store.getSentimentOverTime(parsed.data.entity_name);
    if (!trend) {
      sendError(res, 404, `No sentiment data found for entity: ${parsed.data.entity_name}`);
      return;
    }
    res.json({ success: true, ...trend });
  });

  router.get('/entities/articles-by-sentiment', (req, res) => {
    const parsed = EntityArticlesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendError(res, 400, "Both 'entity_name' and 'entity_type' query parameters are required.");
      return;
    }

    const { entity_name: entityName, entity_type: entityType } = parsed.data;
    const grouped = store.getEntityArticlesBySentiment(entityName, entityType);
    if (!grouped) {
      sendError(res, 404, `No articles found for entity '${entityName}' of type '${entityType}'`);
      return;
    }
    res.json({ success: true, articles: grouped });
  });

  router.get('/entities/summary', async (req, res) => {
    const parsed = SummaryQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendError(res, 400, "An 'entity_name' query parameter is required.");
      return;
    }

    const { entity_name: entityName, provider: providerName, model } = parsed.data;
    try {
      const provider = providers.create(providerName || defaultProvider);
      const summary = await summarizer.summarize(entityName, provider, model || provider.defaultModel);
      if (!summary) {
        sendError(res, 404, `No sentiment data found for entity: ${entityName}`);
        return;
      }
      res.json({ success: true, entityName, summary });
    } catch (error) {
      if (error instanceof ProviderNotConfiguredError) {
        sendError(res, 503, 'Summarization agent is not available.', error.message);
        return;
      }
      if (error instanceof AnalysisFailedError) {
        sendError(res, 500, 'Failed to generate a valid summary after multiple attempts.', error.reason);
        return;
      }
      logger.error(`[DashboardAPI] Summary for ${entityName} failed: ${describeError(error)}`);
      sendError(res, 500, 'Failed to generate summary.', describeError(error));
    }
  });

  router.get('/stats/dashboard', (_req, res) => {
    res.json({ success: true, stats: store.getDashboardStats() });
  });

  router.get('/stats/usage', (req, res) => {
    const parsed = UsageQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendError(res, 400, 'Invalid query parameters', formatIssues(parsed.error));
      return;
    }

    if (parsed.data.summarize?.toLowerCase() === 'true') {
      res.json({ success: true, summary: store.getUsageSummary() });
      return;
    }
    res.json({ success: true, usage: store.getUsageLog(parsed.data.limit) });
  });

  return router;
}
