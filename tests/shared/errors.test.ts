/**
 * Error taxonomy tests
 */

import axios from 'axios';
import MockAdapter from 'axios-mock-adapter';
import {
    AlreadyRunningError,
    AnalysisFailedError,
    ExtractionFailedError,
    InvalidScheduleError,
    SourceUnavailableError,
    UnknownSourceError,
    describeError,
} from '../../src/shared/errors';

describe('error classes', () => {
    it('carries source context', () => {
        const error = new SourceUnavailableError('zawya.com', 'timeout');
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('SourceUnavailableError');
        expect(error.sourceId).toBe('zawya.com');
        expect(error.message).toBe('Source zawya.com unavailable: timeout');
    });

    it('carries the failing URL', () => {
        const error = new ExtractionFailedError('zawya.com', 'https://example.com/a', 'empty article body');
        expect(error.url).toBe('https://example.com/a');
        expect(error.message).toBe('Extraction failed for https://example.com/a: empty article body');
    });

    it('keeps the reason and attempt count of a failed analysis', () => {
        const error = new AnalysisFailedError('bad json', 3);
        expect(error.reason).toBe('bad json');
        expect(error.attempts).toBe(3);
        expect(error.message).toBe('Analysis failed after 3 attempt(s): bad json');
    });

    it('names the active run when a start is rejected', () => {
        const error = new AlreadyRunningError('run-1');
        expect(error.runId).toBe('run-1');
        expect(error.message).toBe('A pipeline run is already in progress');
    });

    it('lists the requested sources when none match', () => {
        expect(new UnknownSourceError(['a.com', 'b.com']).message).toBe('No registered source matches: a.com, b.com');
        expect(new UnknownSourceError([]).message).toBe('No registered source matches: (none)');
    });

    it('explains the expected schedule format', () => {
        expect(new InvalidScheduleError('25:00').message).toBe('Invalid schedule time "25:00", expected HH:MM (UTC)');
    });
});

describe('describeError', () => {
    it('renders plain errors by message', () => {
        expect(describeError(new Error('boom'))).toBe('boom');
    });

    it('renders non-errors as strings', () => {
        expect(describeError('just text')).toBe('just text');
        expect(describeError(42)).toBe('42');
    });

    it('includes HTTP status and API message for axios errors', async () => {
        const client = axios.create();
        const mock = new MockAdapter(client);
        mock.onGet('https://api.test/items').reply(429, { error: { message: 'rate limited' } });

        let caught: unknown;
        try {
            await client.get('https://api.test/items');
        } catch (error) {
            caught = error;
        }

        const description = describeError(caught);
        expect(description.startsWith('HTTP 429')).toBe(true);
        expect(description).toContain('api=rate limited');
        expect(description).toContain('msg=Request failed with status code 429');
    });

    it('reads a top-level message field from API errors', async () => {
        const client = axios.create();
        const mock = new MockAdapter(client);
        mock.onPost('https://api.test/items').reply(400, { message: 'missing field' });

        let caught: unknown;
        try {
            await client.post('https://api.test/items', {});
        } catch (error) {
            caught = error;
        }

        expect(describeError(caught)).toContain('api=missing field');
    });
});
