// Runtime configuration from environment variables, validated with zod

import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';

export const DEFAULT_MODEL = 'claude-haiku-4-5-20251001';
export const DEFAULT_MAX_MEMORY = 10;
export const DEFAULT_CACHE_TTL_SECONDS = 300;

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  RESEARCH_MODEL: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_MODEL)),
  RESEARCH_MAX_MEMORY: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_MAX_MEMORY),
  ),
  LOG_LEVEL: z.preprocess(
    v => (typeof v === 'string' ? blankToUndefined(v.toLowerCase()) : v),
    z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  ),
  ALPHA_VANTAGE_API_KEY: optionalString,
  FRED_API_KEY: optionalString,
  SEC_USER_AGENT: optionalString,
  MARKET_DATA_CACHE_TTL: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().nonnegative().default(DEFAULT_CACHE_TTL_SECONDS),
  ),
});

export interface ResearchConfig {
  anthropicApiKey?: string;
  model: string;
  maxMemoryEntries: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  alphaVantageApiKey?: string;
  fredApiKey?: string;
  secUserAgent?: string;
  cacheTtlSeconds: number;
}

/**
 * Read and validate configuration. Unset or blank variables take their
 * defaults; malformed values raise a ValidationError naming the variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ResearchConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid configuration — ${details}`, { cause: parsed.error });
  }

  const e = parsed.data;
  return {
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    model: e.RESEARCH_MODEL,
    maxMemoryEntries: e.RESEARCH_MAX_MEMORY,
    logLevel: e.LOG_LEVEL,
    alphaVantageApiKey: e.ALPHA_VANTAGE_API_KEY,
    fredApiKey: e.FRED_API_KEY,
    secUserAgent: e.SEC_USER_AGENT,
    cacheTtlSeconds: e.MARKET_DATA_CACHE_TTL,
  };
}
