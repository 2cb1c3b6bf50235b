// menabytes.com - front page post list

import { ExtractedArticle } from '../../shared/types';
import { HtmlNewsSource, optional, parsePublishedDate } from '../html-news-source';

export class MenaBytesSource extends HtmlNewsSource {
  readonly id = 'menabytes.com';
  protected readonly baseUrl = 'https://www.menabytes.com';

  async discoverUrls(): Promise<string[]> {
    const $ = await this.load(this.baseUrl);
    const urls: string[] = [];

    $('li.infinite-post').each((_, item) => {
      const url = this.absolute($(item).find('a').first().attr('href'));
      if (url) urls.push(url);
    });

    return urls;
  }

  async fetchArticle(url: string): Promise<ExtractedArticle> {
    const $ = await this.load(url);

    return {
      title: this.text($, 'h1.post-title'),
      body: this.paragraphs($, '#content-main p'),
      author: optional(this.text($, 'span.author-name')),
      publishedAt: parsePublishedDate(this.attr($, 'time[itemprop="datePublished"]', 'datetime')),
    };
  }
}
