import { z } from 'zod';

import { ConfigurationError } from '../errors';
import type { LogThreshold } from '../observability/logger';
import { DEFAULT_API_HOST, DEFAULT_TIMEOUT_MS } from '../uphere/upHereClient';
import { DEFAULT_REQUESTS_PER_SECOND } from '../uphere/rateLimiter';
import { DEFAULT_BACKOFF_BASE_MS, DEFAULT_MAX_RETRIES } from '../uphere/retryPolicy';
import { DEFAULT_CACHE_TTL_MS, DEFAULT_MAX_SEARCH_PAGES } from '../services/satelliteService';

export interface AppConfig {
  apiKey?: string;
  apiHost: string;
  requestsPerSecond: number;
  timeoutMs: number;
  maxRetries: number;
  backoffBaseMs: number;
  cacheTtlMs: number;
  maxSearchPages: number;
  port: number;
  logLevel: LogThreshold;
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  RAPIDAPI_KEY: optionalText,
  RAPIDAPI_HOST: optionalText,
  UPHERE_REQUESTS_PER_SECOND: z.coerce.number().positive().finite().default(DEFAULT_REQUESTS_PER_SECOND),
  UPHERE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  UPHERE_MAX_RETRIES: z.coerce.number().int().min(0).default(DEFAULT_MAX_RETRIES),
  UPHERE_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(DEFAULT_BACKOFF_BASE_MS),
  SATELLITE_CACHE_TTL_MS: z.coerce.number().int().min(0).default(DEFAULT_CACHE_TTL_MS),
  SATELLITE_MAX_SEARCH_PAGES: z.coerce.number().int().positive().default(DEFAULT_MAX_SEARCH_PAGES),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['debug', 'info', 'warn', 'error', 'silent']))
    .default('info')
});

// Les variables vides sont traitées comme absentes pour que les valeurs par défaut s'appliquent.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      out[key] = value;
    }
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  return {
    apiKey: values.RAPIDAPI_KEY,
    apiHost: values.RAPIDAPI_HOST ?? DEFAULT_API_HOST,
    requestsPerSecond: values.UPHERE_REQUESTS_PER_SECOND,
    timeoutMs: values.UPHERE_TIMEOUT_MS,
    maxRetries: values.UPHERE_MAX_RETRIES,
    backoffBaseMs: values.UPHERE_BACKOFF_BASE_MS,
    cacheTtlMs: values.SATELLITE_CACHE_TTL_MS,
    maxSearchPages: values.SATELLITE_MAX_SEARCH_PAGES,
    port: values.PORT,
    logLevel: values.LOG_LEVEL
  };
}
