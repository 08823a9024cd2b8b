import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://api.simpleemailapi.dev';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const logLevelSchema = z.enum(LOG_LEVELS).catch('info');

/** Unknown or missing levels fall back to `info`. */
export function parseLogLevel(value: string | undefined): LogLevel {
  return logLevelSchema.parse(value);
}

/**
 * Environment for the standalone listener (`src/worker.ts`).
 *
 * - `EMAILAPI_TRANSPORT=redis` reads events from a Redis Stream instead of
 *   the HTTP API; `REDIS_URL` is then used and the API key is optional.
 * - Numeric values arrive as strings and are coerced.
 */
const envSchema = z
  .object({
    EMAILAPI_API_KEY: z.string().default(''),
    EMAILAPI_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
    EMAILAPI_TRANSPORT: z.enum(['connect', 'redis']).default('connect'),
    EMAILAPI_ACK_MODE: z.enum(['auto', 'manual']).default('auto'),
    EMAILAPI_BATCH_SIZE: z.coerce.number().int().positive().default(10),
    EMAILAPI_STREAM_KEY: z.string().min(1).default('email_events'),
    REDIS_URL: z.string().default('redis://localhost:6379'),
    WORKER_ID: z.string().min(1).default('worker-1'),
    LOG_LEVEL: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.EMAILAPI_TRANSPORT === 'connect' && env.EMAILAPI_API_KEY === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['EMAILAPI_API_KEY'],
        message: 'EMAILAPI_API_KEY is required for the connect transport',
      });
    }
  });

export interface WorkerConfig {
  apiKey: string;
  baseUrl: string;
  transport: 'connect' | 'redis';
  ackMode: 'auto' | 'manual';
  batchSize: number;
  streamKey: string;
  redisUrl: string;
  workerId: string;
  logLevel: LogLevel;
}

/**
 * Loads and validates the listener configuration.
 * Throws a `ZodError` listing every invalid variable.
 */
export function loadWorkerConfig(env: Record<string, string | undefined> = process.env): WorkerConfig {
  const parsed = envSchema.parse(env);
  return {
    apiKey: parsed.EMAILAPI_API_KEY,
    baseUrl: parsed.EMAILAPI_BASE_URL,
    transport: parsed.EMAILAPI_TRANSPORT,
    ackMode: parsed.EMAILAPI_ACK_MODE,
    batchSize: parsed.EMAILAPI_BATCH_SIZE,
    streamKey: parsed.EMAILAPI_STREAM_KEY,
    redisUrl: parsed.REDIS_URL,
    workerId: parsed.WORKER_ID,
    logLevel: parseLogLevel(parsed.LOG_LEVEL),
  };
}
