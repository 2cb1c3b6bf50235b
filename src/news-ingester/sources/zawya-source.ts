// zawya.com - business section teasers

import { ExtractedArticle } from '../../shared/types';
import { HtmlNewsSource, optional, parsePublishedDate } from '../html-news-source';

export class ZawyaSource extends HtmlNewsSource {
  readonly id = 'zawya.com';
  protected readonly baseUrl = 'https://www.zawya.com';

  async discoverUrls(): Promise<string[]> {
    const $ = await this.load(`${this.baseUrl}/en/business`);
    const urls: string[] = [];

    $('div.teaser').each((_, teaser) => {
      const href = $(teaser).find('h2.teaser-title a, h3.teaser-title a').first().attr('href');
      const url = this.absolute(href);
      if (url) urls.push(url);
    });

    return urls;
  }

  async fetchArticle(url: string): Promise<ExtractedArticle> {
    const $ = await this.load(url);

    const body = this.paragraphs($, 'div.article-body p') || this.text($, 'div.article-body');

    return {
      title: this.text($, 'h1.article-title'),
      body,
      author: optional(this.text($, 'span.author-name-text')),
      publishedAt: parsePublishedDate(this.text($, 'div.article-date span')),
    };
  }
}
