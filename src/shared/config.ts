import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Config, ProviderConfig } from './types';

const ProviderFileSchema = z.object({
  apiKey: z.string(),
  baseUrl: z.string(),
  defaultModel: z.string(),
  timeout: z.number(),
}).partial();

// Shape of config/config.json: every section and field optional
const ConfigFileSchema = z.object({
  app: z.object({
    name: z.string(),
    version: z.string(),
    environment: z.enum(['development', 'production', 'test']),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }).partial(),
  database: z.object({ path: z.string() }).partial(),
  providers: z.record(ProviderFileSchema),
  analysis: z.object({
    maxRetries: z.number().int().min(1),
    retryBaseDelayMs: z.number().min(0),
    retryMaxDelayMs: z.number().min(0),
    maxInputChars: z.number().int().min(1),
  }).partial(),
  scraping: z.object({
    userAgent: z.string(),
    timeout: z.number(),
    maxUrlsPerSource: z.number().int().min(1),
  }).partial(),
  scheduler: z.object({
    dailyTime: z.string(),
    enabled: z.boolean(),
    provider: z.string(),
    model: z.string(),
  }).partial(),
  server: z.object({
    port: z.number().int(),
    pipelinePassword: z.string(),
  }).partial(),
}).partial();

export type ConfigOverrides = z.infer<typeof ConfigFileSchema>;

class ConfigManager {
  private config: Config;
  private configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath || process.env.CONFIG_PATH || path.join(__dirname, '../../config/config.json');
    this.config = this.loadConfig();
  }

  private loadConfig(): Config {
    const defaultConfig: Config = {
      app: {
        name: 'Market Sentiment Pipeline',
        version: '1.0.0',
        environment: parseEnvironment(process.env.NODE_ENV),
        logLevel: parseLogLevel(process.env.LOG_LEVEL)
      },
      database: {
        path: process.env.SENTIMENT_DB_PATH || './data/sentiment.db'
      },
      providers: {
        openai: {
          apiKey: process.env.OPENAI_API_KEY || '',
          baseUrl: process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
          defaultModel: process.env.OPENAI_MODEL || 'gpt-4o-mini',
          timeout: parseInt(process.env.OPENAI_TIMEOUT || '60000')
        },
        groq: {
          apiKey: process.env.GROQ_API_KEY || '',
          baseUrl: process.env.GROQ_BASE_URL || 'https://api.groq.com/openai/v1',
          defaultModel: process.env.GROQ_MODEL || 'llama3-8b-8192',
          timeout: parseInt(process.env.GROQ_TIMEOUT || '60000')
        }
      },
      analysis: {
        maxRetries: parseInt(process.env.ANALYSIS_MAX_RETRIES || '3'),
        retryBaseDelayMs: parseInt(process.env.ANALYSIS_RETRY_BASE_DELAY_MS || '1000'),
        retryMaxDelayMs: parseInt(process.env.ANALYSIS_RETRY_MAX_DELAY_MS || '30000'),
        maxInputChars: parseInt(process.env.ANALYSIS_MAX_INPUT_CHARS || '12000')
      },
      scraping: {
        userAgent: process.env.SCRAPER_USER_AGENT || 'Mozilla/5.0 (compatible; MarketSentimentBot/1.0)',
        timeout: parseInt(process.env.SCRAPER_TIMEOUT || '15000'),
        maxUrlsPerSource: parseInt(process.env.SCRAPER_MAX_URLS_PER_SOURCE || '100')
      },
      scheduler: {
        dailyTime: process.env.PIPELINE_SCHEDULE_TIME || '01:00',
        enabled: process.env.PIPELINE_SCHEDULE_ENABLED !== 'false',
        provider: process.env.PIPELINE_PROVIDER || 'openai',
        model: process.env.PIPELINE_MODEL || undefined
      },
      server: {
        port: parseInt(process.env.PORT || '5000'),
        pipelinePassword: process.env.PIPELINE_PASSWORD || undefined
      }
    };

    try {
      if (fs.existsSync(this.configPath)) {
        const configData = fs.readFileSync(this.configPath, 'utf8');
        const parsed = ConfigFileSchema.safeParse(JSON.parse(configData));
        if (parsed.success) {
          return mergeConfig(defaultConfig, parsed.data);
        }
        console.warn(`Invalid config file ${this.configPath}: ${parsed.error.message}, using defaults`);
      }
    } catch (error) {
      console.warn(`Could not load config file ${this.configPath}, using defaults:`, error);
    }

    return defaultConfig;
  }

  public get(): Config {
    return this.config;
  }

  public getSection<K extends keyof Config>(section: K): Config[K] {
    return this.config[section];
  }

  /**
   * Credentials are opaque: a provider is usable when it is known and has a key
   */
  public canUseProvider(name: string): boolean {
    const provider = this.config.providers[name];
    return !!provider && provider.apiKey.length > 0;
  }
}

function parseEnvironment(value: string | undefined): Config['app']['environment'] {
  return value === 'production' || value === 'test' ? value : 'development';
}

function parseLogLevel(value: string | undefined): Config['app']['logLevel'] {
  return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info';
}

// Empty strings and non-finite numbers in config.json count as unset so env/defaults win.
function mergeSection<T extends object>(defaults: T, overrides: Partial<T> | undefined): T {
  if (!overrides) return defaults;
  const present = Object.entries(overrides).filter(([, value]) =>
    value !== undefined &&
    value !== null &&
    value !== '' &&
    !(typeof value === 'number' && !Number.isFinite(value))
  );
  return { ...defaults, ...Object.fromEntries(present) };
}

export function mergeConfig(defaults: Config, parsed: ConfigOverrides): Config {
  const providers: Record<string, ProviderConfig> = { ...defaults.providers };
  for (const [name, overrides] of Object.entries(parsed.providers || {})) {
    const base = defaults.providers[name];
    providers[name] = base
      ? mergeSection(base, overrides)
      : { apiKey: '', baseUrl: '', defaultModel: '', timeout: 60000, ...overrides };
  }

  return {
    app: mergeSection(defaults.app, parsed.app),
    database: mergeSection(defaults.database, parsed.database),
    providers,
    analysis: mergeSection(defaults.analysis, parsed.analysis),
    scraping: mergeSection(defaults.scraping, parsed.scraping),
    scheduler: mergeSection(defaults.scheduler, parsed.scheduler),
    server: mergeSection(defaults.server, parsed.server),
  };
}

const configManager = new ConfigManager();
export default configManager;
