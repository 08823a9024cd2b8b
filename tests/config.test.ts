import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { DEFAULT_BASE_URL, loadWorkerConfig, parseLogLevel } from '../src/config.js';

describe('loadWorkerConfig', () => {
  it('applies defaults', () => {
    expect(loadWorkerConfig({ EMAILAPI_API_KEY: 'test-api-key' })).toEqual({
      apiKey: 'test-api-key',
      baseUrl: DEFAULT_BASE_URL,
      transport: 'connect',
      ackMode: 'auto',
      batchSize: 10,
      streamKey: 'email_events',
      redisUrl: 'redis://localhost:6379',
      workerId: 'worker-1',
      logLevel: 'info',
    });
  });

  it('requires an API key for the connect transport', () => {
    expect(() => loadWorkerConfig({})).toThrow(ZodError);
    expect(() => loadWorkerConfig({})).toThrow('EMAILAPI_API_KEY is required for the connect transport');
  });

  it('does not require an API key for the redis transport', () => {
    const config = loadWorkerConfig({
      EMAILAPI_TRANSPORT: 'redis',
      REDIS_URL: 'redis://cache:6379',
      WORKER_ID: 'worker-7',
    });

    expect(config.transport).toBe('redis');
    expect(config.apiKey).toBe('');
    expect(config.redisUrl).toBe('redis://cache:6379');
    expect(config.workerId).toBe('worker-7');
  });

  it('coerces numeric values', () => {
    const config = loadWorkerConfig({ EMAILAPI_API_KEY: 'test-api-key', EMAILAPI_BATCH_SIZE: '25' });
    expect(config.batchSize).toBe(25);
  });

  it('rejects a non-positive batch size', () => {
    expect(() => loadWorkerConfig({ EMAILAPI_API_KEY: 'test-api-key', EMAILAPI_BATCH_SIZE: '0' })).toThrow(ZodError);
  });

  it('rejects an invalid base URL', () => {
    expect(() => loadWorkerConfig({ EMAILAPI_API_KEY: 'test-api-key', EMAILAPI_BASE_URL: 'not a url' })).toThrow(ZodError);
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels', () => {
    expect(parseLogLevel('debug')).toBe('debug');
  });

  it('falls back to info', () => {
    expect(parseLogLevel('loud')).toBe('info');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});
