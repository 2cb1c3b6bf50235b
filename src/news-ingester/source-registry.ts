// Source Registry
// Maps a source id to its {discover URLs, fetch one article} capability.
// The engine only ever talks to sources through this table.

import configManager from '../shared/config';
import logger from '../shared/logger';
import { ExtractedArticle } from '../shared/types';
import { ExtractionFailedError, SourceUnavailableError, describeError } from '../shared/errors';
import { canonicalizeUrl, uniqueInOrder } from './url-utils';

export interface NewsSource {
  readonly id: string;
  discoverUrls(): Promise<string[]>;
  fetchArticle(url: string): Promise<ExtractedArticle>;
}

export class SourceRegistry {
  private sources: Map<string, NewsSource> = new Map();
  private maxUrlsPerSource: number;

  constructor(maxUrlsPerSource: number = configManager.get().scraping.maxUrlsPerSource) {
    this.maxUrlsPerSource = maxUrlsPerSource;
  }

  register(source: NewsSource): this {
    if (this.sources.has(source.id)) {
      logger.warn(`[SourceRegistry] Duplicate source id "${source.id}", overwriting`);
    }
    this.sources.set(source.id, source);
    return this;
  }

  listSources(): string[] {
    return Array.from(this.sources.keys()).sort();
  }

  has(id: string): boolean {
    return this.sources.has(id);
  }

  /**
   * Known ids in caller order; every registered source when no selection is given
   */
  resolve(ids?: string[]): string[] {
    if (!ids || ids.length === 0) return this.listSources();

    const selected: string[] = [];
    for (const id of uniqueInOrder(ids)) {
      if (this.has(id)) {
        selected.push(id);
      } else {
        logger.warn(`[SourceRegistry] Requested source "${id}" not found and will be skipped`);
      }
    }
    return selected;
  }

  async discoverUrls(id: string): Promise<string[]> {
    const source = this.sources.get(id);
    if (!source) throw new SourceUnavailableError(id, 'not registered');

    let raw: string[];
    try {
      raw = await source.discoverUrls();
    } catch (error) {
      throw new SourceUnavailableError(id, describeError(error));
    }

    const canonical: string[] = [];
    for (const url of raw) {
      const normalized = canonicalizeUrl(url);
      if (normalized) {
        canonical.push(normalized);
      } else {
        logger.debug(`[SourceRegistry] ${id}: dropped non-canonical URL "${url}"`);
      }
    }

    const urls = uniqueInOrder(canonical);
    if (urls.length > this.maxUrlsPerSource) {
      logger.info(`[SourceRegistry] ${id}: capping ${urls.length} URLs to ${this.maxUrlsPerSource}`);
      return urls.slice(0, this.maxUrlsPerSource);
    }
    return urls;
  }

  async fetchArticle(id: string, url: string): Promise<ExtractedArticle> {
    const source = this.sources.get(id);
    if (!source) throw new ExtractionFailedError(id, url, 'source not registered');

    let article: ExtractedArticle;
    try {
      article = await source.fetchArticle(url);
    } catch (error) {
      throw new ExtractionFailedError(id, url, describeError(error));
    }

    const body = article.body.trim();
    if (!body) throw new ExtractionFailedError(id, url, 'empty article body');

    return {
      ...article,
      title: article.title.trim(),
      body,
    };
  }
}
