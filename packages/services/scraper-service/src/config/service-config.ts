/**
 * Scraper Service Configuration
 * Operational limits and collaborator settings read from the environment.
 */

import { z } from 'zod';
import { isExactCronInterval } from '@songharvest/platform-core';
import { ValidationError } from '../application/errors';

export const SERVICE_NAME = 'scraper-service';

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  SERVICE_VERSION: z.string().default('1.0.0'),

  MAX_CONCURRENT_WORKERS: positiveInt.default(3),
  MAX_BATCH_SIZE: positiveInt.default(100),
  ARTIFACT_TTL_SECONDS: positiveInt.default(3600),
  SWEEP_INTERVAL_SECONDS: positiveInt.optional(),

  FETCH_TIMEOUT_MS: positiveInt.default(15000),
  DOWNLOAD_TIMEOUT_MS: positiveInt.default(120000),
  FETCH_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  FETCH_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  MAX_AUDIO_BYTES: positiveInt.default(50 * 1024 * 1024),
  FETCH_USER_AGENT: z
    .string()
    .default('Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36'),

  BLOB_STORAGE_PATH: z.string().min(1).default('./storage'),
  BLOB_PUBLIC_BASE_URL: z.string().url().optional(),

  DATABASE_URL: z.string().min(1).optional(),
  SHUTDOWN_TIMEOUT_MS: positiveInt.default(30000),
}).superRefine((vars, ctx) => {
  // the sweep runs on cron; an interval cron cannot express would drift
  const interval = vars.SWEEP_INTERVAL_SECONDS ?? vars.ARTIFACT_TTL_SECONDS;
  if (!isExactCronInterval(interval * 1000)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SWEEP_INTERVAL_SECONDS'],
      message: `Sweep interval of ${interval}s must divide a minute, an hour or a day evenly, or be exactly one day`,
    });
  }
});

export interface ScraperConfig {
  server: { port: number; host: string; name: string; version: string; nodeEnv: string };
  jobs: { maxConcurrentWorkers: number; maxBatchSize: number };
  storage: { basePath: string; publicBaseUrl: string; artifactTtlSeconds: number; sweepIntervalSeconds: number };
  fetcher: {
    requestTimeoutMs: number;
    downloadTimeoutMs: number;
    maxRetries: number;
    backoffMs: number;
    maxAudioBytes: number;
    userAgent: string;
  };
  database: { url: string | undefined };
  shutdownTimeoutMs: number;
}

export function loadScraperConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.errors.map(issue => issue.path.join('.'));
    throw new ValidationError(`Invalid configuration: ${keys.join(', ')}`, {
      issues: parsed.error.errors.map(issue => ({ key: issue.path.join('.'), message: issue.message })),
    });
  }

  const vars = parsed.data;
  return {
    server: { port: vars.PORT, host: vars.HOST, name: SERVICE_NAME, version: vars.SERVICE_VERSION, nodeEnv: vars.NODE_ENV },
    jobs: { maxConcurrentWorkers: vars.MAX_CONCURRENT_WORKERS, maxBatchSize: vars.MAX_BATCH_SIZE },
    storage: {
      basePath: vars.BLOB_STORAGE_PATH,
      publicBaseUrl: (vars.BLOB_PUBLIC_BASE_URL ?? `http://localhost:${vars.PORT}/files`).replace(/\/+$/, ''),
      artifactTtlSeconds: vars.ARTIFACT_TTL_SECONDS,
      sweepIntervalSeconds: vars.SWEEP_INTERVAL_SECONDS ?? vars.ARTIFACT_TTL_SECONDS,
    },
    fetcher: {
      requestTimeoutMs: vars.FETCH_TIMEOUT_MS,
      downloadTimeoutMs: vars.DOWNLOAD_TIMEOUT_MS,
      maxRetries: vars.FETCH_MAX_RETRIES,
      backoffMs: vars.FETCH_BACKOFF_MS,
      maxAudioBytes: vars.MAX_AUDIO_BYTES,
      userAgent: vars.FETCH_USER_AGENT,
    },
    database: { url: vars.DATABASE_URL },
    shutdownTimeoutMs: vars.SHUTDOWN_TIMEOUT_MS,
  };
}
