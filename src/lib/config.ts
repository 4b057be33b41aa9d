import { ConfigError } from './errors';
import { clampNumber, parseIntOr } from './utils';
import { MAX_LOOKBACK_DAYS } from '@/schema/validation/reportRequest';

export interface NewsConfig {
  apiKey: string;
  url: string;
  lookbackDays: number;
  timeoutMs: number;
}

export interface LlmConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
}

export interface AppConfig {
  news: NewsConfig;
  llm: LlmConfig;
  extractTimeoutMs: number;
  /** Articles extracted and summarized at once. 1 keeps the loop strictly sequential. */
  concurrency: number;
}

type Env = Record<string, string | undefined>;

const DEFAULT_NEWS_API_URL = 'https://newsapi.org/v2/everything';
const DEFAULT_GROQ_BASE_URL = 'https://api.groq.com/openai/v1';
const DEFAULT_MODEL = 'llama-3.1-8b-instant';
const MAX_CONCURRENCY = 10;

function required(env: Env, key: string, missing: string[]): string {
  const value = env[key]?.trim();
  if (!value) {
    missing.push(key);
    return '';
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const missing: string[] = [];
  const newsApiKey = required(env, 'NEWS_API_KEY', missing);
  const groqApiKey = required(env, 'GROQ_API_KEY', missing);
  if (missing.length) {
    throw new ConfigError(`Missing ${missing.join(' and ')} in environment`);
  }

  const lookbackDays = parseIntOr(env.NEWS_LOOKBACK_DAYS, 30);

  return Object.freeze({
    news: Object.freeze({
      apiKey: newsApiKey,
      url: env.NEWS_API_URL || DEFAULT_NEWS_API_URL,
      lookbackDays: lookbackDays >= 0 ? Math.min(lookbackDays, MAX_LOOKBACK_DAYS) : 30,
      timeoutMs: parseIntOr(env.NEWS_TIMEOUT_MS, 15_000),
    }),
    llm: Object.freeze({
      apiKey: groqApiKey,
      baseUrl: (env.GROQ_BASE_URL || DEFAULT_GROQ_BASE_URL).replace(/\/+$/, ''),
      model: env.GROQ_MODEL || DEFAULT_MODEL,
    }),
    extractTimeoutMs: parseIntOr(env.EXTRACT_TIMEOUT_MS, 15_000),
    concurrency: clampNumber(parseIntOr(env.PIPELINE_CONCURRENCY, 1), 1, MAX_CONCURRENCY),
  });
}

let cached: AppConfig | null = null;

/** Process-wide config, built on first use. Throws ConfigError when secrets are missing. */
export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
