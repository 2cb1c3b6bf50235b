/**
 * Provider registry tests
 */

import { ProviderRegistry, createDefaultProviderRegistry } from '../../src/analysis/providers/provider-registry';
import { OpenAICompatibleProvider } from '../../src/analysis/providers/openai-compatible-provider';
import { ProviderNotConfiguredError } from '../../src/shared/errors';
import configManager from '../../src/shared/config';
import { ScriptedProvider } from '../helpers/fakes';

describe('ProviderRegistry', () => {
    const config = { apiKey: '', baseUrl: 'https://llm.test/v1', defaultModel: 'fake-model', timeout: 1000 };

    it('builds providers through their factory with the configured key', () => {
        const registry = new ProviderRegistry();
        const factory = jest.fn((name: string) => new ScriptedProvider([], undefined, name));
        registry.register('fake', { ...config, apiKey: 'test-secret' }, factory);

        const provider = registry.create('fake');
        expect(provider.name).toBe('fake');
        expect(factory).toHaveBeenCalledWith('fake', { ...config, apiKey: 'test-secret' });
    });

    it('prefers a per-call key over the configured one', () => {
        const registry = new ProviderRegistry();
        const factory = jest.fn((name: string) => new ScriptedProvider([], undefined, name));
        registry.register('fake', config, factory);

        registry.create('fake', 'test-override');
        expect(factory).toHaveBeenCalledWith('fake', { ...config, apiKey: 'test-override' });
    });

    it('rejects unknown providers and missing keys', () => {
        const registry = new ProviderRegistry();
        registry.register('fake', config, name => new ScriptedProvider([], undefined, name));

        expect(() => registry.create('other')).toThrow(ProviderNotConfiguredError);
        expect(() => registry.create('fake')).toThrow('Provider fake is not usable: API key not configured');
    });

    it('lists providers in name order', () => {
        const registry = new ProviderRegistry();
        registry.register('zeta', config, name => new ScriptedProvider([], undefined, name));
        registry.register('alpha', config, name => new ScriptedProvider([], undefined, name));

        expect(registry.list()).toEqual(['alpha', 'zeta']);
    });

    it('registers every configured provider as OpenAI-compatible', () => {
        const base = configManager.get();
        const registry = createDefaultProviderRegistry({
            ...base,
            providers: {
                openai: { apiKey: 'test-secret', baseUrl: 'https://openai.test/v1', defaultModel: 'gpt-4o-mini', timeout: 1000 },
                groq: { apiKey: 'test-secret', baseUrl: 'https://groq.test/v1', defaultModel: 'llama3-8b-8192', timeout: 1000 },
            },
        });

        expect(registry.list()).toEqual(['groq', 'openai']);
        const provider = registry.create('groq');
        expect(provider).toBeInstanceOf(OpenAICompatibleProvider);
        expect(provider.defaultModel).toBe('llama3-8b-8192');
    });
});
