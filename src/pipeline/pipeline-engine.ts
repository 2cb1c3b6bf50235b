// Pipeline Engine
// Drives discovery -> dedup -> fetch -> store -> analyze for one run at a time.
// start() returns immediately; the run loop executes on the next macrotask and
// checks the stop flag between sources and before every article.

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import logger from '../shared/logger';
import {
  AlreadyRunningError,
  AnalysisFailedError,
  ExtractionFailedError,
  SourceUnavailableError,
  UnknownSourceError,
  describeError,
} from '../shared/errors';
import { EntitySentimentInput, ExtractedArticle, RunStateSnapshot, TerminalRunStatus } from '../shared/types';
import { SourceRegistry } from '../news-ingester/source-registry';
import { LlmProvider } from '../analysis/providers/llm-provider';
import { ProviderRegistry } from '../analysis/providers/provider-registry';
import { SentimentAnalyzer } from '../analysis/sentiment-analyzer';
import { PipelineStore } from '../data/sentiment-store';
import { RunStateTracker, RunStateWriter } from './run-state';

export interface StartOptions {
  provider: string;
  model?: string;
  sources?: string[];
  apiKey?: string;
}

export interface RunHandle {
  runId: string;
  /** Resolves with the terminal snapshot; never rejects */
  done: Promise<Readonly<RunStateSnapshot>>;
}

export interface PipelineEngineDeps {
  registry: SourceRegistry;
  providers: ProviderRegistry;
  analyzer: SentimentAnalyzer;
  store: PipelineStore;
  state?: RunStateTracker;
}

interface PendingArticle {
  sourceId: string;
  url: string;
}

interface RunContext {
  writer: RunStateWriter;
  provider: LlmProvider;
  model: string;
  sources: string[];
}

export class PipelineEngine extends EventEmitter {
  private registry: SourceRegistry;
  private providers: ProviderRegistry;
  private analyzer: SentimentAnalyzer;
  private store: PipelineStore;
  private state: RunStateTracker;

  constructor(deps: PipelineEngineDeps) {
    super();
    this.registry = deps.registry;
    this.providers = deps.providers;
    this.analyzer = deps.analyzer;
    this.store = deps.store;
    this.state = deps.state || new RunStateTracker();
    // Every SSE client holds its own 'state' listener
    this.setMaxListeners(0);
    this.state.on('state', (snapshot: Readonly<RunStateSnapshot>) => this.emit('state', snapshot));
  }

  listSources(): string[] {
    return this.registry.listSources();
  }

  status(): Readonly<RunStateSnapshot> {
    return this.state.snapshot();
  }

  isRunning(): boolean {
    return this.state.isRunning();
  }

  /**
   * The only path from idle to running. Throws AlreadyRunningError before touching any state,
   * then ProviderNotConfiguredError or UnknownSourceError if the request cannot run.
   */
  start(options: StartOptions): RunHandle {
    if (this.state.isRunning()) {
      throw new AlreadyRunningError(this.state.currentRunId());
    }

    const provider = this.providers.create(options.provider, options.apiKey);
    const model = options.model || provider.defaultModel;

    const sources = this.registry.resolve(options.sources);
    if (sources.length === 0) {
      throw new UnknownSourceError(options.sources || []);
    }

    const runId = uuidv4();
    const writer = this.state.begin({ runId, provider: provider.name, model, sources });
    logger.info(`[PipelineEngine] Run ${runId} started: ${provider.name}/${model}, sources=${sources.join(', ')}`);

    const context: RunContext = { writer, provider, model, sources };
    const done = new Promise<Readonly<RunStateSnapshot>>(resolve => {
      setImmediate(() => {
        this.execute(context).then(resolve, (error: unknown) => {
          logger.error(`[PipelineEngine] Run ${runId} crashed outside the run loop: ${describeError(error)}`);
          resolve(this.state.snapshot());
        });
      });
    });

    return { runId, done };
  }

  /**
   * Cooperative: an in-flight fetch or analysis finishes first
   */
  stop(): boolean {
    const sent = this.state.requestStop();
    if (sent) {
      logger.info(`[PipelineEngine] Stop requested for run ${this.state.currentRunId()}`);
    }
    return sent;
  }

  private async execute(context: RunContext): Promise<Readonly<RunStateSnapshot>> {
    const { writer } = context;

    try {
      const status = await this.runLoop(context);
      writer.finish(status);
    } catch (error) {
      const message = describeError(error);
      logger.error(`[PipelineEngine] Run ${writer.runId} failed: ${message}`);
      writer.finish('FAILED', message);
    }

    const final = this.state.snapshot();
    this.persistRun(final);
    logger.info(
      `[PipelineEngine] Run ${writer.runId} ${final.status}: ${final.progress}/${final.total} processed, ` +
      `${final.stats.articlesStored} stored, ${final.stats.sentimentsStored} sentiments`
    );
    this.emit('finished', final);
    return final;
  }

  private async runLoop(context: RunContext): Promise<TerminalRunStatus> {
    const queue = await this.discover(context);
    // A stop that arrived during the last discovery is honoured even when nothing is queued
    if (queue === null || this.state.isStopRequested()) return 'STOPPED';

    const { writer } = context;
    writer.setTotal(queue.length);
    writer.setPhase(`Processing ${queue.length} new articles`);

    for (const item of queue) {
      if (this.state.isStopRequested()) {
        logger.info(`[PipelineEngine] Run ${writer.runId} stopping before ${item.url}`);
        return 'STOPPED';
      }
      await this.processArticle(context, item);
    }

    return 'COMPLETED';
  }

  /**
   * Novel URLs across all selected sources in discovery order, or null when stopped mid-discovery
   */
  private async discover(context: RunContext): Promise<PendingArticle[] | null> {
    const { writer } = context;
    const queue: PendingArticle[] = [];
    const seen = new Set<string>();

    writer.setPhase('Discovering articles');

    for (const sourceId of context.sources) {
      if (this.state.isStopRequested()) return null;
      writer.setCurrentTask(`Discovering ${sourceId}`);

      let urls: string[];
      try {
        urls = await this.registry.discoverUrls(sourceId);
      } catch (error) {
        if (!(error instanceof SourceUnavailableError)) throw error;
        logger.warn(`[PipelineEngine] Skipping source: ${error.message}`);
        writer.increment('sourcesFailed');
        continue;
      }

      writer.increment('urlsDiscovered', urls.length);
      let novel = 0;
      for (const url of urls) {
        if (seen.has(url)) continue;
        seen.add(url);
        if (this.store.existsUrl(url)) continue;
        queue.push({ sourceId, url });
        novel++;
      }
      logger.info(`[PipelineEngine] ${sourceId}: ${urls.length} URLs, ${novel} new`);
    }

    return queue;
  }

  private async processArticle(context: RunContext, item: PendingArticle): Promise<void> {
    const { writer, provider, model } = context;
    writer.setCurrentTask(`Fetching ${item.url}`);

    let extracted: ExtractedArticle;
    try {
      extracted = await this.registry.fetchArticle(item.sourceId, item.url);
    } catch (error) {
      if (!(error instanceof ExtractionFailedError)) throw error;
      logger.warn(`[PipelineEngine] ${error.message}`);
      writer.increment('extractionFailures');
      writer.advance(`Skipped ${item.url}`);
      return;
    }

    const articleId = this.store.saveArticle({
      url: item.url,
      sourceId: item.sourceId,
      title: extracted.title,
      body: extracted.body,
      author: extracted.author,
      publishedAt: extracted.publishedAt,
      scrapedAt: new Date(),
    });
    writer.increment('articlesStored');
    writer.setCurrentTask(`Analyzing "${extracted.title || item.url}"`);

    const text = extracted.title ? `${extracted.title}\n\n${extracted.body}` : extracted.body;
    let sentiments: EntitySentimentInput[];
    try {
      sentiments = await this.analyzer.analyze(text, provider, model, { runId: writer.runId, articleId });
    } catch (error) {
      if (!(error instanceof AnalysisFailedError)) throw error;
      logger.warn(`[PipelineEngine] ${item.url}: ${error.message}`);
      this.store.markAnalysisFailed(articleId, error.reason);
      writer.increment('analysisFailures');
      writer.advance(`Analysis failed for ${item.url}`);
      return;
    }

    this.store.saveEntitySentiments(articleId, sentiments);
    writer.increment('sentimentsStored', sentiments.length);
    writer.advance(`Processed ${item.url} (${sentiments.length} entities)`);
  }

  private persistRun(snapshot: Readonly<RunStateSnapshot>): void {
    if (
      !snapshot.runId ||
      !snapshot.startedAt ||
      !snapshot.endedAt ||
      snapshot.status === 'IDLE' ||
      snapshot.status === 'RUNNING'
    ) {
      return;
    }

    try {
      this.store.recordRun({
        runId: snapshot.runId,
        status: snapshot.status,
        provider: snapshot.provider ?? '',
        model: snapshot.model ?? '',
        sources: [...snapshot.sources],
        startedAt: snapshot.startedAt,
        endedAt: snapshot.endedAt,
        total: snapshot.total,
        progress: snapshot.progress,
        stats: { ...snapshot.stats },
        error: snapshot.error,
      });
    } catch (error) {
      logger.error(`[PipelineEngine] Could not record run ${snapshot.runId}: ${describeError(error)}`);
    }
  }
}
