// Chat-completions provider for any OpenAI-compatible API (OpenAI, Groq)

import axios, { AxiosInstance } from 'axios';
import { ProviderConfig, TokenUsage } from '../../shared/types';
import { EMPTY_USAGE, LlmProvider, StructuredRequest, StructuredResult, parseStructured } from './llm-provider';

interface ChatCompletionResponse {
  choices?: { message?: { content?: string | null } }[];
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

export class OpenAICompatibleProvider implements LlmProvider {
  readonly name: string;
  readonly defaultModel: string;
  private baseUrl: string;
  private apiKey: string;
  private timeout: number;
  private httpClient: AxiosInstance;

  constructor(name: string, config: ProviderConfig, httpClient?: AxiosInstance) {
    this.name = name;
    this.defaultModel = config.defaultModel;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.timeout = config.timeout;
    this.httpClient = httpClient || axios.create();
  }

  async completeStructured<T>(request: StructuredRequest<T>): Promise<StructuredResult<T>> {
    const response = await this.httpClient.post<ChatCompletionResponse>(
      `${this.baseUrl}/chat/completions`,
      {
        model: request.model,
        temperature: 0,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
      },
      {
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        timeout: this.timeout,
      }
    );

    const usage = toUsage(response.data.usage);
    const content = response.data.choices?.[0]?.message?.content ?? '';
    return parseStructured(content, request.schema, usage);
  }
}

function toUsage(raw: ChatCompletionResponse['usage']): TokenUsage {
  if (!raw) return EMPTY_USAGE;
  const promptTokens = raw.prompt_tokens ?? 0;
  const completionTokens = raw.completion_tokens ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: raw.total_tokens ?? promptTokens + completionTokens,
  };
}
