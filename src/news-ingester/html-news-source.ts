// Base class for sources that scrape server-rendered HTML pages

import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import configManager from '../shared/config';
import { ExtractedArticle } from '../shared/types';
import { NewsSource } from './source-registry';
import { canonicalizeUrl } from './url-utils';

export function createScraperClient(): AxiosInstance {
  const { userAgent, timeout } = configManager.get().scraping;
  return axios.create({
    timeout,
    headers: {
      'User-Agent': userAgent,
      Accept: 'text/html,application/xhtml+xml',
    },
  });
}

export abstract class HtmlNewsSource implements NewsSource {
  abstract readonly id: string;
  protected abstract readonly baseUrl: string;
  protected readonly httpClient: AxiosInstance;

  constructor(httpClient?: AxiosInstance) {
    this.httpClient = httpClient || createScraperClient();
  }

  abstract discoverUrls(): Promise<string[]>;

  abstract fetchArticle(url: string): Promise<ExtractedArticle>;

  protected async load(url: string): Promise<cheerio.CheerioAPI> {
    const response = await this.httpClient.get<string>(url, { responseType: 'text' });
    return cheerio.load(response.data);
  }

  protected absolute(href: string | undefined): string | null {
    if (!href) return null;
    return canonicalizeUrl(href, this.baseUrl);
  }

  protected text($: cheerio.CheerioAPI, selector: string): string {
    return collapseWhitespace($(selector).first().text());
  }

  protected attr($: cheerio.CheerioAPI, selector: string, name: string): string | undefined {
    const value = $(selector).first().attr(name);
    return value ? value.trim() : undefined;
  }

  /**
   * Paragraph text under `selector`, one paragraph per line
   */
  protected paragraphs($: cheerio.CheerioAPI, selector: string): string {
    return $(selector)
      .map((_, el) => collapseWhitespace($(el).text()))
      .get()
      .filter(line => line.length > 0)
      .join('\n');
  }
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function parsePublishedDate(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

export function optional(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}
