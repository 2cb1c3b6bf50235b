/**
 * Entity Summarizer tests
 */

import { EntitySummarizer, ReasoningSource, formatReasonings } from '../../src/analysis/entity-summarizer';
import { AnalysisFailedError } from '../../src/shared/errors';
import { EntityReasoning, UsageRecord } from '../../src/shared/types';
import { ScriptedProvider } from '../helpers/fakes';

jest.mock('../../src/shared/logger', () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

const reasonings: EntityReasoning[] = [
    { reasoning: 'Net profit up 20%', financialSentiment: 'positive', overallSentiment: 'neutral' },
    { reasoning: 'Opened new branches', financialSentiment: 'neutral', overallSentiment: 'positive' },
];

const options = { maxRetries: 2, retryBaseDelayMs: 0, retryMaxDelayMs: 0 };

const summaryReply = JSON.stringify({
    positive_financial: ['Net profit up 20%'],
    negative_financial: [],
    neutral_financial: [],
    positive_overall: ['Opened new branches'],
    negative_overall: [],
    neutral_overall: [],
    final_summary: 'Growing bank with strong earnings.',
});

function source(items: EntityReasoning[]): ReasoningSource & { names: string[] } {
    const names: string[] = [];
    return {
        names,
        getEntityReasonings: (name: string) => {
            names.push(name);
            return items;
        },
    };
}

describe('EntitySummarizer', () => {
    it('formats reasonings one per line', () => {
        expect(formatReasonings(reasonings)).toBe(
            '- (Financial: positive, Overall: neutral) Net profit up 20%\n' +
            '- (Financial: neutral, Overall: positive) Opened new branches'
        );
    });

    it('returns null without calling the provider when nothing is stored', async () => {
        const provider = new ScriptedProvider();
        const summarizer = new EntitySummarizer(source([]), undefined, options);

        await expect(summarizer.summarize('Unknown Co', provider, 'fake-model')).resolves.toBeNull();
        expect(provider.requests).toHaveLength(0);
    });

    it('summarizes stored reasonings', async () => {
        const provider = new ScriptedProvider([summaryReply]);
        const reasoningSource = source(reasonings);
        const records: UsageRecord[] = [];
        const summarizer = new EntitySummarizer(reasoningSource, { appendUsage: record => records.push(record) }, options);

        const summary = await summarizer.summarize('Emirates NBD', provider, 'fake-model');

        expect(summary?.final_summary).toBe('Growing bank with strong earnings.');
        expect(summary?.positive_overall).toEqual(['Opened new branches']);
        expect(reasoningSource.names).toEqual(['Emirates NBD']);
        expect(provider.requests[0].user).toBe(
            'Please summarize the following reasoning points for Emirates NBD:\n\n' + formatReasonings(reasonings)
        );
        expect(records.map(record => record.outcome)).toEqual(['success']);
    });

    it('gives up after repeated invalid summaries', async () => {
        const provider = new ScriptedProvider([], '{"final_summary": ""}');
        const summarizer = new EntitySummarizer(source(reasonings), undefined, options);

        await expect(summarizer.summarize('Emirates NBD', provider, 'fake-model')).rejects.toBeInstanceOf(AnalysisFailedError);
        expect(provider.requests).toHaveLength(2);
    });
});
