/**
 * Config merge tests
 */

import configManager, { mergeConfig } from '../../src/shared/config';
import { Config } from '../../src/shared/types';

function defaults(): Config {
    return {
        app: { name: 'Test', version: '1.0.0', environment: 'test', logLevel: 'info' },
        database: { path: ':memory:' },
        providers: {
            openai: { apiKey: 'test-secret', baseUrl: 'https://openai.test/v1', defaultModel: 'gpt-4o-mini', timeout: 60000 },
        },
        analysis: { maxRetries: 3, retryBaseDelayMs: 1000, retryMaxDelayMs: 30000, maxInputChars: 12000 },
        scraping: { userAgent: 'test-agent', timeout: 15000, maxUrlsPerSource: 100 },
        scheduler: { dailyTime: '01:00', enabled: true, provider: 'openai' },
        server: { port: 5000 },
    };
}

describe('mergeConfig', () => {
    it('overrides individual fields per section', () => {
        const merged = mergeConfig(defaults(), {
            analysis: { maxRetries: 5 },
            scheduler: { dailyTime: '06:30' },
        });

        expect(merged.analysis).toEqual({ maxRetries: 5, retryBaseDelayMs: 1000, retryMaxDelayMs: 30000, maxInputChars: 12000 });
        expect(merged.scheduler.dailyTime).toBe('06:30');
        expect(merged.scheduler.provider).toBe('openai');
    });

    it('treats empty strings as unset', () => {
        const merged = mergeConfig(defaults(), {
            providers: { openai: { apiKey: '', defaultModel: 'gpt-4o' } },
        });

        expect(merged.providers.openai.apiKey).toBe('test-secret');
        expect(merged.providers.openai.defaultModel).toBe('gpt-4o');
    });

    it('adds providers that have no defaults', () => {
        const merged = mergeConfig(defaults(), {
            providers: { local: { apiKey: 'test-secret', baseUrl: 'http://localhost:8080/v1', defaultModel: 'local-model' } },
        });

        expect(merged.providers.local).toEqual({
            apiKey: 'test-secret',
            baseUrl: 'http://localhost:8080/v1',
            defaultModel: 'local-model',
            timeout: 60000,
        });
        expect(merged.providers.openai.apiKey).toBe('test-secret');
    });

    it('returns the defaults untouched for an empty file', () => {
        expect(mergeConfig(defaults(), {})).toEqual(defaults());
    });
});

describe('configManager', () => {
    it('exposes the loaded sections', () => {
        const config = configManager.get();
        expect(configManager.getSection('analysis')).toBe(config.analysis);
        expect(Object.keys(config.providers)).toEqual(expect.arrayContaining(['openai', 'groq']));
    });

    it('rejects unknown providers', () => {
        expect(configManager.canUseProvider('does-not-exist')).toBe(false);
    });

    it('treats any non-empty key as usable, like the provider registry', () => {
        const providers = configManager.get().providers;
        providers['key-check'] = { apiKey: 'your-api-key-here', baseUrl: 'https://llm.test/v1', defaultModel: 'm', timeout: 1000 };
        providers['no-key'] = { apiKey: '', baseUrl: 'https://llm.test/v1', defaultModel: 'm', timeout: 1000 };
        try {
            expect(configManager.canUseProvider('key-check')).toBe(true);
            expect(configManager.canUseProvider('no-key')).toBe(false);
        } finally {
            delete providers['key-check'];
            delete providers['no-key'];
        }
    });
});
