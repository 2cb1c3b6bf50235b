/**
 * OpenAI-compatible provider tests
 */

import axios from 'axios';
import MockAdapter from 'axios-mock-adapter';
import { OpenAICompatibleProvider } from '../../src/analysis/providers/openai-compatible-provider';
import { TextAnalysisSchema } from '../../src/analysis/schemas';

describe('OpenAICompatibleProvider', () => {
    const client = axios.create();
    let mock: MockAdapter;
    let provider: OpenAICompatibleProvider;

    beforeEach(() => {
        mock = new MockAdapter(client);
        provider = new OpenAICompatibleProvider('groq', {
            apiKey: 'test-secret',
            baseUrl: 'https://llm.test/v1/',
            defaultModel: 'llama3-8b-8192',
            timeout: 5000,
        }, client);
    });

    afterEach(() => {
        mock.restore();
    });

    const request = {
        system: 'system prompt',
        user: 'article text',
        model: 'llama3-8b-8192',
        schema: TextAnalysisSchema,
    };

    it('posts a JSON-mode chat completion and parses the reply', async () => {
        mock.onPost('https://llm.test/v1/chat/completions').reply(200, {
            choices: [{ message: { content: '{"entities":[{"entity_name":"Aramco","entity_type":"company","financial_sentiment":"negative","overall_sentiment":"neutral","reasoning":"Lower output"}]}' } }],
            usage: { prompt_tokens: 200, completion_tokens: 40, total_tokens: 240 },
        });

        const result = await provider.completeStructured(request);

        expect(result).toEqual({
            ok: true,
            data: {
                entities: [{
                    entity_name: 'Aramco',
                    entity_type: 'company',
                    financial_sentiment: 'negative',
                    overall_sentiment: 'neutral',
                    reasoning: 'Lower output',
                }],
            },
            usage: { promptTokens: 200, completionTokens: 40, totalTokens: 240 },
        });

        expect(mock.history.post).toHaveLength(1);
        const sent = mock.history.post[0];
        expect(sent.headers?.Authorization).toBe('Bearer test-secret');
        expect(sent.timeout).toBe(5000);
        expect(JSON.parse(sent.data)).toEqual({
            model: 'llama3-8b-8192',
            temperature: 0,
            response_format: { type: 'json_object' },
            messages: [
                { role: 'system', content: 'system prompt' },
                { role: 'user', content: 'article text' },
            ],
        });
    });

    it('returns schema failures with the usage that was spent', async () => {
        mock.onPost('https://llm.test/v1/chat/completions').reply(200, {
            choices: [{ message: { content: '{"entities":[{"entity_name":"Aramco"}]}' } }],
            usage: { prompt_tokens: 50, completion_tokens: 10 },
        });

        const result = await provider.completeStructured(request);
        expect(result.ok).toBe(false);
        expect(result.usage).toEqual({ promptTokens: 50, completionTokens: 10, totalTokens: 60 });
    });

    it('reports zero usage when the API omits it', async () => {
        mock.onPost('https://llm.test/v1/chat/completions').reply(200, {
            choices: [{ message: { content: '{"entities":[]}' } }],
        });

        const result = await provider.completeStructured(request);
        expect(result).toEqual({ ok: true, data: { entities: [] }, usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 } });
    });

    it('throws on HTTP errors', async () => {
        mock.onPost('https://llm.test/v1/chat/completions').reply(401, { error: { message: 'invalid key' } });
        await expect(provider.completeStructured(request)).rejects.toThrow('Request failed with status code 401');
    });
});
