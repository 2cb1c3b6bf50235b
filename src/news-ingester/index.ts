// Registration table of built-in news sources

import { AxiosInstance } from 'axios';
import { SourceRegistry } from './source-registry';
import { ZawyaSource } from './sources/zawya-source';
import { GulfNewsSource } from './sources/gulfnews-source';
import { MenaBytesSource } from './sources/menabytes-source';

export { SourceRegistry } from './source-registry';
export type { NewsSource } from './source-registry';
export { HtmlNewsSource } from './html-news-source';

export function createDefaultRegistry(httpClient?: AxiosInstance, maxUrlsPerSource?: number): SourceRegistry {
  return new SourceRegistry(maxUrlsPerSource)
    .register(new ZawyaSource(httpClient))
    .register(new GulfNewsSource(httpClient))
    .register(new MenaBytesSource(httpClient));
}
