import { z } from 'zod';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { ConfigError } from './errors.js';

/**
 * Runtime configuration, read once from the environment.
 * Every entry point (CLI, web, MCP) goes through loadConfig().
 */

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  SEC_USER_AGENT: z.string().min(1).default('equity-gather contact@example.com'),
  FINNHUB_API_KEY: z.string().default(''),
  FINNHUB_BASE_URL: z.string().url().default('https://finnhub.io'),
  EQUITY_GATHER_HOME: z.string().min(1).default(join(homedir(), '.equity-gather')),
  GATHER_STORAGE_DIR: z.string().default(''),
  GATHER_REINDEX_URL: z.union([z.literal(''), z.string().url()]).default(''),
  GATHER_REINDEX_TOKEN: z.string().default(''),
  GATHER_PACING_MS: z.coerce.number().int().min(0).default(200),
  GATHER_LOOKBACK_YEARS: z.coerce.number().int().min(1).max(30).default(5),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  PORT: z.coerce.number().int().positive().default(3005),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  secUserAgent: string;
  finnhubApiKey: string;
  finnhubBaseUrl: string;
  homeDir: string;
  cachePath: string;
  storageDir: string;
  reindexUrl: string | null;
  reindexToken: string | null;
  pacingMs: number;
  lookbackYears: number;
  httpTimeoutMs: number;
  logLevel: LogLevel;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }

  const e = parsed.data;
  return {
    secUserAgent: e.SEC_USER_AGENT,
    finnhubApiKey: e.FINNHUB_API_KEY.trim(),
    finnhubBaseUrl: e.FINNHUB_BASE_URL,
    homeDir: e.EQUITY_GATHER_HOME,
    cachePath: join(e.EQUITY_GATHER_HOME, 'cache.db'),
    storageDir: e.GATHER_STORAGE_DIR || join(e.EQUITY_GATHER_HOME, 'store'),
    reindexUrl: e.GATHER_REINDEX_URL || null,
    reindexToken: e.GATHER_REINDEX_TOKEN || null,
    pacingMs: e.GATHER_PACING_MS,
    lookbackYears: e.GATHER_LOOKBACK_YEARS,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
    port: e.PORT,
  };
}
