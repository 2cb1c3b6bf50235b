// gulfnews.com - business section, article ids look like /<section>/<slug>-1.<digits>

import * as cheerio from 'cheerio';
import logger from '../../shared/logger';
import { ExtractedArticle } from '../../shared/types';
import { HtmlNewsSource, collapseWhitespace, optional, parsePublishedDate } from '../html-news-source';
import { canonicalizeUrl } from '../url-utils';

const ARTICLE_PATH = /^\/[^/]+\/.+-1\.\d+/;

export class GulfNewsSource extends HtmlNewsSource {
  readonly id = 'gulfnews.com';
  protected readonly baseUrl = 'https://gulfnews.com';

  async discoverUrls(): Promise<string[]> {
    const $ = await this.load(`${this.baseUrl}/business`);
    const urls = new Set<string>();

    $('a[href]').each((_, anchor) => {
      const href = $(anchor).attr('href');
      if (!href || !ARTICLE_PATH.test(href)) return;
      const url = this.absolute(href);
      if (url) urls.add(url);
    });

    return Array.from(urls).sort();
  }

  async fetchArticle(url: string): Promise<ExtractedArticle> {
    const $ = await this.load(url);

    // Identity stays the discovered URL; a different canonical is only reported
    const canonical = this.absolute(this.attr($, 'link[rel="canonical"]', 'href'));
    if (canonical && canonical !== canonicalizeUrl(url)) {
      logger.warn(`[GulfNewsSource] Canonical link ${canonical} differs from requested ${url}`);
    }

    const paragraphs = $('div.Iqx1L p').length > 0
      ? this.paragraphs($, 'div.Iqx1L p')
      : this.paragraphs($, 'article p');

    return {
      title: this.text($, 'h1'),
      body: collapseWhitespace(paragraphs),
      author: optional(this.text($, 'div._48or4 > a')) || this.attr($, 'meta[name="author"]', 'content'),
      publishedAt: parsePublishedDate(this.findDatePublished($, url)),
    };
  }

  private findDatePublished($: cheerio.CheerioAPI, url: string): string | undefined {
    const scripts = $('script[type="application/ld+json"]')
      .map((_, el) => $(el).text())
      .get();

    for (const script of scripts) {
      const date = readLinkedDataDate(script, url);
      if (date) return date;
    }

    const time = $('time').first();
    if (time.length === 0) return undefined;
    return time.attr('datetime') || optional(collapseWhitespace(time.text()));
  }
}

function readLinkedDataDate(script: string, url: string): string | undefined {
  let data: unknown;
  try {
    data = JSON.parse(script);
  } catch (error) {
    logger.debug(`[GulfNewsSource] Ignoring malformed JSON-LD on ${url}`);
    return undefined;
  }

  const nodes: unknown[] = Array.isArray(data) ? data : [data];
  for (const node of nodes) {
    if (!node || typeof node !== 'object') continue;
    if (!('@type' in node) || !('datePublished' in node)) continue;
    const type = node['@type'];
    if ((type === 'Article' || type === 'NewsArticle') && typeof node.datePublished === 'string') {
      return node.datePublished;
    }
  }
  return undefined;
}
