// Provider Registry
// Provider name -> factory. The engine asks for a provider by name and never special-cases one.

import { AxiosInstance } from 'axios';
import configManager from '../../shared/config';
import { ProviderNotConfiguredError } from '../../shared/errors';
import { Config, ProviderConfig } from '../../shared/types';
import { LlmProvider } from './llm-provider';
import { OpenAICompatibleProvider } from './openai-compatible-provider';

export type ProviderFactory = (name: string, config: ProviderConfig) => LlmProvider;

interface ProviderEntry {
  config: ProviderConfig;
  factory: ProviderFactory;
}

export class ProviderRegistry {
  private providers: Map<string, ProviderEntry> = new Map();

  register(name: string, config: ProviderConfig, factory: ProviderFactory): this {
    this.providers.set(name, { config, factory });
    return this;
  }

  list(): string[] {
    return Array.from(this.providers.keys()).sort();
  }

  /**
   * Build a provider, optionally with a per-call key. Only the key's presence is checked.
   */
  create(name: string, apiKeyOverride?: string): LlmProvider {
    const entry = this.providers.get(name);
    if (!entry) {
      throw new ProviderNotConfiguredError(name, `unknown provider (available: ${this.list().join(', ')})`);
    }

    const apiKey = apiKeyOverride || entry.config.apiKey;
    if (!apiKey) {
      throw new ProviderNotConfiguredError(name, 'API key not configured');
    }

    return entry.factory(name, { ...entry.config, apiKey });
  }
}

export function createDefaultProviderRegistry(
  config: Config = configManager.get(),
  httpClient?: AxiosInstance
): ProviderRegistry {
  const registry = new ProviderRegistry();
  for (const [name, providerConfig] of Object.entries(config.providers)) {
    registry.register(
      name,
      providerConfig,
      (providerName, resolved) => new OpenAICompatibleProvider(providerName, resolved, httpClient)
    );
  }
  return registry;
}
