// Service wiring shared by the server entry point and the one-shot CLI

import configManager from './shared/config';
import { createDefaultRegistry } from './news-ingester';
import { SourceRegistry } from './news-ingester/source-registry';
import { createDefaultProviderRegistry, ProviderRegistry } from './analysis/providers/provider-registry';
import { SentimentAnalyzer } from './analysis/sentiment-analyzer';
import { EntitySummarizer } from './analysis/entity-summarizer';
import sentimentStore, { SentimentStore } from './data/sentiment-store';
import { PipelineEngine } from './pipeline/pipeline-engine';
import { PipelineScheduler } from './pipeline/scheduler';

export interface Services {
  store: SentimentStore;
  registry: SourceRegistry;
  providers: ProviderRegistry;
  analyzer: SentimentAnalyzer;
  summarizer: EntitySummarizer;
  engine: PipelineEngine;
  scheduler: PipelineScheduler;
}

export function createServices(store: SentimentStore = sentimentStore): Services {
  const config = configManager.get();
  store.initialize();

  const registry = createDefaultRegistry(undefined, config.scraping.maxUrlsPerSource);
  const providers = createDefaultProviderRegistry(config);
  const analyzer = new SentimentAnalyzer(store, config.analysis);
  const summarizer = new EntitySummarizer(store, store, config.analysis);
  const engine = new PipelineEngine({ registry, providers, analyzer, store });
  const scheduler = new PipelineScheduler(engine, store);

  return { store, registry, providers, analyzer, summarizer, engine, scheduler };
}
