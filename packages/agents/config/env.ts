// Environment configuration — validated once with zod, then passed around explicitly
// Every PROSPECT_* variable is optional; defaults live in the schema below

import { z } from 'zod';
import { ConfigError } from '../types/errors.js';
import type { RetryPolicy } from '../orchestrator/retry-policy.js';
import type { LogLevel } from '../utils/logger.js';

export type RunMode = 'live' | 'demo';
export type CacheBackend = 'file' | 'memory';

export const DEFAULT_MODEL = 'claude-haiku-4-5-20251001';

export interface AppConfig {
  mode: RunMode;
  anthropic: { apiKey?: string; model: string; timeoutMs: number };
  search: { apiKey?: string; engineId?: string; timeoutMs: number };
  retry: RetryPolicy;
  cache: { backend: CacheBackend; filePath: string; ttlMs?: number };
  reportsDir: string;
  logLevel: LogLevel;
}

/** Unset and blank variables both fall through to the default */
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());
const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));
const nonNegativeInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(fallback));

const envSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  GOOGLE_SEARCH_API_KEY: optionalString,
  GOOGLE_SEARCH_ENGINE_ID: optionalString,
  PROSPECT_MODEL: z.preprocess(blankToUndefined, z.string().default(DEFAULT_MODEL)),
  PROSPECT_MODE: z.preprocess(
    (v) => (typeof v === 'string' ? blankToUndefined(v.toLowerCase()) : v),
    z.enum(['live', 'demo']).optional(),
  ),
  PROSPECT_MAX_ATTEMPTS: positiveInt(3),
  PROSPECT_RETRY_BASE_DELAY_MS: nonNegativeInt(500),
  PROSPECT_RETRY_MAX_DELAY_MS: nonNegativeInt(8_000),
  PROSPECT_STAGE_TIMEOUT_MS: positiveInt(120_000),
  PROSPECT_LLM_TIMEOUT_MS: positiveInt(60_000),
  PROSPECT_SEARCH_TIMEOUT_MS: positiveInt(10_000),
  PROSPECT_CACHE_BACKEND: z.preprocess(blankToUndefined, z.enum(['file', 'memory']).default('file')),
  PROSPECT_CACHE_FILE: z.preprocess(blankToUndefined, z.string().default('prospect-cache.json')),
  PROSPECT_CACHE_TTL_HOURS: z.preprocess(blankToUndefined, z.coerce.number().positive().optional()),
  PROSPECT_REPORTS_DIR: z.preprocess(blankToUndefined, z.string().default('reports')),
  PROSPECT_LOG_LEVEL: z.preprocess(
    (v) => (typeof v === 'string' ? blankToUndefined(v.toLowerCase()) : v),
    z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  ),
});

const LIVE_KEYS = ['ANTHROPIC_API_KEY', 'GOOGLE_SEARCH_API_KEY', 'GOOGLE_SEARCH_ENGINE_ID'] as const;

/**
 * Validate and shape the environment.
 * Live mode needs every provider key; without an explicit PROSPECT_MODE the
 * pipeline runs live when all keys are present and in demo mode otherwise.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const vars = parsed.data;

  const missingKeys = LIVE_KEYS.filter(key => !vars[key]);
  const mode: RunMode = vars.PROSPECT_MODE ?? (missingKeys.length === 0 ? 'live' : 'demo');
  if (mode === 'live' && missingKeys.length > 0) {
    throw new ConfigError(missingKeys.map(key => `${key}: required when PROSPECT_MODE=live`));
  }
  if (vars.PROSPECT_RETRY_MAX_DELAY_MS < vars.PROSPECT_RETRY_BASE_DELAY_MS) {
    throw new ConfigError([
      'PROSPECT_RETRY_MAX_DELAY_MS: must not be smaller than PROSPECT_RETRY_BASE_DELAY_MS',
    ]);
  }

  return {
    mode,
    anthropic: {
      apiKey: vars.ANTHROPIC_API_KEY,
      model: vars.PROSPECT_MODEL,
      timeoutMs: vars.PROSPECT_LLM_TIMEOUT_MS,
    },
    search: {
      apiKey: vars.GOOGLE_SEARCH_API_KEY,
      engineId: vars.GOOGLE_SEARCH_ENGINE_ID,
      timeoutMs: vars.PROSPECT_SEARCH_TIMEOUT_MS,
    },
    retry: {
      maxAttempts: vars.PROSPECT_MAX_ATTEMPTS,
      baseDelayMs: vars.PROSPECT_RETRY_BASE_DELAY_MS,
      maxDelayMs: vars.PROSPECT_RETRY_MAX_DELAY_MS,
      stageTimeoutMs: vars.PROSPECT_STAGE_TIMEOUT_MS,
    },
    cache: {
      backend: vars.PROSPECT_CACHE_BACKEND,
      filePath: vars.PROSPECT_CACHE_FILE,
      ttlMs: vars.PROSPECT_CACHE_TTL_HOURS === undefined
        ? undefined
        : vars.PROSPECT_CACHE_TTL_HOURS * 3_600_000,
    },
    reportsDir: vars.PROSPECT_REPORTS_DIR,
    logLevel: vars.PROSPECT_LOG_LEVEL,
  };
}
