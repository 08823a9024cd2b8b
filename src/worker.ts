import { Redis } from 'ioredis';
import { loadWorkerConfig } from './config.js';
import { createLogger } from './logger.js';
import { EmailClient } from './client.js';
import { startStreaming } from './application/event-streamer.js';
import { RedisStreamTransport } from './infrastructure/redis/index.js';
import type { EventHandlers } from './domain/handlers.js';

/**
 * Standalone listener process: streams email events and logs each one.
 *
 * With EMAILAPI_TRANSPORT=connect (default) events come from the HTTP API;
 * with EMAILAPI_TRANSPORT=redis they are read from a Redis Stream consumer
 * group, so several instances with different WORKER_ID values share the load.
 */
const config = loadWorkerConfig();
const log = createLogger(config.logLevel);

// Abort controller for graceful shutdown
const ac = new AbortController();

const handlers: EventHandlers = {
  ackMode: config.ackMode,
  batchSize: config.batchSize,
  onSent: (e, event) => log.info({ event_id: event.id, email_id: e.emailId, recipients: e.recipients }, 'Email sent'),
  onDelivered: (e, event) => log.info({ event_id: event.id, email_id: e.emailId, recipients: e.recipients }, 'Email delivered'),
  onBounced: (e, event) => log.warn(
    { event_id: event.id, email_id: e.emailId, bounceType: e.bounceType, bounceSubType: e.bounceSubType },
    'Email bounced',
  ),
  onComplained: (e, event) => log.warn({ event_id: event.id, email_id: e.emailId, feedbackType: e.feedbackType }, 'Complaint received'),
  onRejected: (e, event) => log.warn({ event_id: event.id, email_id: e.emailId, reason: e.reason }, 'Email rejected'),
  onDelayed: (e, event) => log.info({ event_id: event.id, email_id: e.emailId, delayType: e.delayType }, 'Delivery delayed'),
  onReplied: (e, event) => log.info({ event_id: event.id, email_id: e.emailId, from: e.from, subject: e.subject }, 'Reply received'),
  onFailed: (e, event) => log.error({ event_id: event.id, email_id: e.emailId, reason: e.reason }, 'Email failed'),
  onError: (err) => log.error({ code: err.code, status: err.status, err }, 'Stream error'),
};

let redis: Redis | null = null;
let streamTransport: RedisStreamTransport | null = null;

async function main(): Promise<void> {
  if (config.transport === 'redis') {
    redis = new Redis(config.redisUrl, {
      maxRetriesPerRequest: null, // required for blocking stream reads
      enableReadyCheck: true,
      lazyConnect: true,
    });
    await redis.connect();
    log.info('Redis connected');

    streamTransport = new RedisStreamTransport({
      redis,
      log,
      stream: config.streamKey,
      consumer: config.workerId,
    });
    await startStreaming(streamTransport, ac.signal, handlers, log);
  } else {
    const client = new EmailClient(config.apiKey, { baseUrl: config.baseUrl, logger: log });
    await client.onReceive(ac.signal, handlers);
  }

  log.info('Listener stopped');
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down listener...');
  ac.abort();

  // Give the final ack flush a moment, then force exit
  setTimeout(() => {
    streamTransport?.disconnect();
    void (redis?.quit() ?? Promise.resolve())
      .catch((err: unknown) => log.warn({ err }, 'Redis quit failed'))
      .finally(() => process.exit(0));
  }, 3000);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Listener crashed');
  process.exit(1);
});
