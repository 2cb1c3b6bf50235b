/**
 * Sentiment Store tests (in-memory SQLite)
 */

import { SentimentStore } from '../../src/data/sentiment-store';
import { EntitySentimentInput, NewArticle, PipelineRunRecord } from '../../src/shared/types';

jest.mock('../../src/shared/logger', () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

function article(url: string, publishedAt?: string): NewArticle {
    return {
        url,
        sourceId: 'test.com',
        title: `Title ${url}`,
        body: 'Body',
        publishedAt: publishedAt ? new Date(publishedAt) : undefined,
        scrapedAt: new Date('2024-06-01T00:00:00Z'),
    };
}

function sentiment(entityName: string, overrides: Partial<EntitySentimentInput> = {}): EntitySentimentInput {
    return {
        entityName,
        entityType: 'company',
        financialSentiment: 'neutral',
        overallSentiment: 'neutral',
        reasoning: `${entityName} reasoning`,
        ...overrides,
    };
}

describe('SentimentStore', () => {
    let store: SentimentStore;

    beforeEach(() => {
        store = new SentimentStore(':memory:');
        store.initialize();
    });

    afterEach(() => {
        store.close();
    });

    describe('pipeline writes', () => {
        it('saves articles and reports their URLs as known', () => {
            expect(store.existsUrl('https://test.com/a')).toBe(false);

            const id = store.saveArticle({ ...article('https://test.com/a', '2024-05-01T10:00:00Z'), author: 'Desk' });

            expect(store.existsUrl('https://test.com/a')).toBe(true);
            const saved = store.getArticleByUrl('https://test.com/a');
            expect(saved).toMatchObject({
                id,
                sourceId: 'test.com',
                title: 'Title https://test.com/a',
                author: 'Desk',
                publishedAt: new Date('2024-05-01T10:00:00Z'),
                scrapedAt: new Date('2024-06-01T00:00:00Z'),
            });
            expect(saved?.analyzedAt).toBeUndefined();
        });

        it('reuses the existing row when a URL is saved twice', () => {
            const first = store.saveArticle(article('https://test.com/a'));
            const second = store.saveArticle(article('https://test.com/a'));
            expect(second).toBe(first);
        });

        it('stores sentiments and marks the article analyzed in one step', () => {
            const id = store.saveArticle(article('https://test.com/a'));
            store.saveEntitySentiments(id, [sentiment('Aramco'), sentiment('Bitcoin', { entityType: 'crypto' })]);

            const rows = store.getSentimentsForArticle(id);
            expect(rows.map(row => row.entityName)).toEqual(['Aramco', 'Bitcoin']);
            expect(rows[1]).toMatchObject({ articleId: id, entityType: 'crypto' });
            expect(store.getArticleByUrl('https://test.com/a')?.analyzedAt).toBeInstanceOf(Date);
        });

        it('rolls back the whole batch when one row is invalid', () => {
            const id = store.saveArticle(article('https://test.com/a'));
            // rejected by the entity_type CHECK constraint
            const invalid: EntitySentimentInput = Object.assign(sentiment('Dubai'), { entityType: 'city' });

            expect(() => store.saveEntitySentiments(id, [sentiment('Aramco'), invalid])).toThrow();
            expect(store.getSentimentsForArticle(id)).toEqual([]);
            expect(store.getArticleByUrl('https://test.com/a')?.analyzedAt).toBeUndefined();
        });

        it('records analysis failures on the article', () => {
            const id = store.saveArticle(article('https://test.com/a'));
            store.markAnalysisFailed(id, 'bad json');
            expect(store.getArticleByUrl('https://test.com/a')?.analysisError).toBe('bad json');
        });

        it('appends usage records and summarizes them per provider', () => {
            const base = { model: 'm', promptTokens: 10, completionTokens: 5, totalTokens: 15, costUsd: 0.5, outcome: 'success' as const };
            store.appendUsage({ ...base, provider: 'openai', timestamp: new Date('2024-06-01T00:00:00Z') });
            store.appendUsage({ ...base, provider: 'openai', outcome: 'failure', error: 'x', timestamp: new Date('2024-06-01T00:01:00Z') });
            store.appendUsage({ ...base, provider: 'groq', costUsd: 0, runId: 'run-1', timestamp: new Date('2024-06-01T00:02:00Z') });

            const log = store.getUsageLog();
            expect(log.map(record => record.provider)).toEqual(['groq', 'openai', 'openai']);
            expect(log[0].runId).toBe('run-1');
            expect(log[1]).toMatchObject({ outcome: 'failure', error: 'x' });

            expect(store.getUsageSummary()).toEqual([
                { provider: 'groq', totalCalls: 1, totalTokens: 15, totalCostUsd: 0 },
                { provider: 'openai', totalCalls: 2, totalTokens: 30, totalCostUsd: 1 },
            ]);
        });

        it('records runs and returns the latest one', () => {
            const run = (runId: string, endedAt: string): PipelineRunRecord => ({
                runId,
                status: 'COMPLETED',
                provider: 'openai',
                model: 'gpt-4o-mini',
                sources: ['a.com', 'b.com'],
                startedAt: new Date('2024-06-01T00:00:00Z'),
                endedAt: new Date(endedAt),
                total: 3,
                progress: 3,
                stats: { sourcesFailed: 0, urlsDiscovered: 4, articlesStored: 3, extractionFailures: 0, analysisFailures: 1, sentimentsStored: 5 },
                error: null,
            });

            expect(store.getLastRun()).toBeNull();
            store.recordRun(run('run-1', '2024-06-01T00:05:00Z'));
            store.recordRun(run('run-2', '2024-06-02T00:05:00Z'));

            expect(store.getLastRun()).toEqual(run('run-2', '2024-06-02T00:05:00Z'));
        });

        it('keeps key/value settings', () => {
            expect(store.getConfigValue('schedule_time')).toBeNull();
            store.setConfigValue('schedule_time', '02:00');
            store.setConfigValue('schedule_time', '03:30');
            expect(store.getConfigValue('schedule_time')).toBe('03:30');
        });
    });

    describe('queries', () => {
        beforeEach(() => {
            const a = store.saveArticle(article('https://test.com/a', '2024-05-01T00:00:00Z'));
            const b = store.saveArticle(article('https://test.com/b', '2024-05-03T00:00:00Z'));
            const c = store.saveArticle(article('https://test.com/c', '2024-05-02T00:00:00Z'));
            store.saveArticle(article('https://test.com/d'));

            store.saveEntitySentiments(a, [
                sentiment('Emirates NBD', { financialSentiment: 'positive', overallSentiment: 'positive', reasoning: 'Profit up' }),
                sentiment('Bitcoin', { entityType: 'crypto', financialSentiment: 'negative', overallSentiment: 'neutral', reasoning: 'Price down' }),
            ]);
            store.saveEntitySentiments(b, [
                sentiment('Emirates NBD', { financialSentiment: 'negative', overallSentiment: 'positive', reasoning: 'Costs rose' }),
            ]);
            store.saveEntitySentiments(c, [
                sentiment('Aramco', { financialSentiment: 'positive', overallSentiment: 'negative', reasoning: 'Spill' }),
            ]);
        });

        it('lists articles newest first with their sentiments', () => {
            const articles = store.getArticles();
            expect(articles.map(item => item.url)).toEqual([
                'https://test.com/b',
                'https://test.com/c',
                'https://test.com/a',
                'https://test.com/d',
            ]);
            expect(articles[2].sentiments.map(item => item.entityName)).toEqual(['Emirates NBD', 'Bitcoin']);
            expect(articles[3].sentiments).toEqual([]);
            expect(articles[0].publishedAt).toBe('2024-05-03T00:00:00.000Z');
        });

        it('filters articles by entity and sentiment', () => {
            expect(store.getArticles({ entityName: 'emirates' }).map(item => item.url)).toEqual([
                'https://test.com/b',
                'https://test.com/a',
            ]);
            expect(store.getArticles({ entityName: 'Emirates', financialSentiment: 'positive' }).map(item => item.url)).toEqual([
                'https://test.com/a',
            ]);
            expect(store.getArticles({ entityType: 'crypto' }).map(item => item.url)).toEqual(['https://test.com/a']);
            expect(store.getArticles({ limit: 1 }).map(item => item.url)).toEqual(['https://test.com/b']);
        });

        it('lists distinct entities', () => {
            expect(store.getEntities()).toEqual([
                { entityName: 'Aramco', entityType: 'company' },
                { entityName: 'Bitcoin', entityType: 'crypto' },
                { entityName: 'Emirates NBD', entityType: 'company' },
            ]);
        });

        it('ranks entities by sentiment count', () => {
            expect(store.getTopEntities({ sentimentType: 'overall', sentiment: 'positive', order: 'desc', limit: 10 })).toEqual([
                { entityName: 'Emirates NBD', entityType: 'company', sentimentCount: 2 },
            ]);
            expect(store.getTopEntities({ sentimentType: 'financial', sentiment: 'positive', order: 'asc', limit: 1 })).toEqual([
                { entityName: 'Aramco', entityType: 'company', sentimentCount: 1 },
            ]);
        });

        it('scores sentiment over time by publication date', () => {
            expect(store.getSentimentOverTime('Emirates NBD')).toEqual({
                entityName: 'Emirates NBD',
                financialSentimentTrend: [['2024-05-01T00:00:00.000Z', 1], ['2024-05-03T00:00:00.000Z', -1]],
                overallSentimentTrend: [['2024-05-01T00:00:00.000Z', 1], ['2024-05-03T00:00:00.000Z', 1]],
            });
            expect(store.getSentimentOverTime('Nobody')).toBeNull();
        });

        it('groups entity articles into sentiment buckets', () => {
            const grouped = store.getEntityArticlesBySentiment('Emirates', 'company');
            expect(grouped).toEqual({
                positive_financial: [{ title: 'Title https://test.com/a', url: 'https://test.com/a', reasoning: 'Profit up' }],
                negative_financial: [{ title: 'Title https://test.com/b', url: 'https://test.com/b', reasoning: 'Costs rose' }],
                neutral_financial: [],
                positive_overall: [
                    { title: 'Title https://test.com/a', url: 'https://test.com/a', reasoning: 'Profit up' },
                    { title: 'Title https://test.com/b', url: 'https://test.com/b', reasoning: 'Costs rose' },
                ],
                negative_overall: [],
                neutral_overall: [],
            });
            expect(store.getEntityArticlesBySentiment('Emirates', 'crypto')).toBeNull();
        });

        it('returns reasonings for an entity', () => {
            expect(store.getEntityReasonings('Aramco')).toEqual([
                { reasoning: 'Spill', financialSentiment: 'positive', overallSentiment: 'negative' },
            ]);
        });

        it('computes dashboard totals', () => {
            expect(store.getDashboardStats()).toEqual({
                totalEntities: 3,
                articlesAnalyzed: 3,
                totalSentimentPoints: 4,
                sentimentDistribution: { positive: 4, negative: 3, neutral: 1 },
            });
        });
    });
});
