// Environment-driven configuration, validated once per process.

import { z } from 'zod';
import { isLogLevel, type LogLevel } from '../utils/log.js';

// Unset and blank variables both fall through to defaults
const blankAsUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const fromEnv = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankAsUndefined, schema);
const int = (min: number) => z.coerce.number().int().min(min);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: fromEnv(z.string().optional()),
  IMPACT_MODEL: fromEnv(z.string().default('claude-sonnet-4-5-20250929')),
  IMPACT_MAX_RESPONSE_TOKENS: fromEnv(int(1).default(1500)),
  FMP_API_KEY: fromEnv(z.string().optional()),
  FMP_BASE_URL: fromEnv(z.string().url().default('https://financialmodelingprep.com/stable')),
  FMP_RATE_LIMIT: fromEnv(int(1).default(300)),
  FMP_CACHE_TTL: fromEnv(int(0).default(86_400)),
  MAX_CHUNK_CHARS: fromEnv(int(1).default(12_000)),
  CHUNK_LOOKBACK_CHARS: fromEnv(int(0).default(2_000)),
  ANALYSIS_CONCURRENCY: fromEnv(int(1).default(4)),
  ANALYSIS_MAX_ATTEMPTS: fromEnv(int(1).default(3)),
  ANALYSIS_TIMEOUT_MS: fromEnv(int(1).default(60_000)),
  ANALYSIS_BACKOFF_BASE_MS: fromEnv(int(0).default(1_000)),
  ANALYSIS_BACKOFF_MAX_MS: fromEnv(int(0).default(20_000)),
  ANALYSIS_SUMMARY: fromEnv(
    z.enum(['true', 'false', '1', '0', 'yes', 'no'])
      .default('true')
      .transform(v => v === 'true' || v === '1' || v === 'yes'),
  ),
  RUN_TTL_MS: fromEnv(int(1).default(30 * 60_000)),
  RUN_TIMEOUT_MS: fromEnv(int(1).optional()),
  LOG_LEVEL: fromEnv(
    z.string()
      .toLowerCase()
      .refine(isLogLevel, 'must be one of debug, info, warn, error, silent')
      .default('info'),
  ),
});

export interface ImpactConfig {
  anthropicApiKey?: string;
  model: string;
  maxResponseTokens: number;
  fmp: { apiKey?: string; baseUrl: string; rateLimit: number; cacheTtl: number };
  chunking: { maxChars: number; lookbackChars: number };
  analysis: {
    concurrency: number;
    maxAttempts: number;
    timeoutMs: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    summary: boolean;
  };
  runTtlMs: number;
  runTimeoutMs?: number;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ImpactConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;

  return {
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    model: e.IMPACT_MODEL,
    maxResponseTokens: e.IMPACT_MAX_RESPONSE_TOKENS,
    fmp: {
      apiKey: e.FMP_API_KEY,
      baseUrl: e.FMP_BASE_URL,
      rateLimit: e.FMP_RATE_LIMIT,
      cacheTtl: e.FMP_CACHE_TTL,
    },
    chunking: { maxChars: e.MAX_CHUNK_CHARS, lookbackChars: e.CHUNK_LOOKBACK_CHARS },
    analysis: {
      concurrency: e.ANALYSIS_CONCURRENCY,
      maxAttempts: e.ANALYSIS_MAX_ATTEMPTS,
      timeoutMs: e.ANALYSIS_TIMEOUT_MS,
      backoffBaseMs: e.ANALYSIS_BACKOFF_BASE_MS,
      backoffMaxMs: e.ANALYSIS_BACKOFF_MAX_MS,
      summary: e.ANALYSIS_SUMMARY,
    },
    runTtlMs: e.RUN_TTL_MS,
    runTimeoutMs: e.RUN_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
  };
}
