import type { Logger } from 'pino';
import type { EventHandlers, ResolvedEventHandlers } from '../domain/handlers.js';
import { resolveHandlers } from '../domain/handlers.js';
import type { EventTransport } from '../infrastructure/transport/types.js';
import { AckBatcher, type AckBatcherOptions } from './ack-batcher.js';
import { parseError } from './error-classifier.js';
import { reportError } from './event-dispatcher.js';
import { runSession } from './stream-session.js';

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_BACKOFF: Readonly<BackoffOptions> = {
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  multiplier: 2,
};

export interface StreamerOptions {
  backoff?: Partial<BackoffOptions>;
  ack?: AckBatcherOptions;
}

export function nextDelay(currentMs: number, backoff: BackoffOptions): number {
  return Math.min(currentMs * backoff.multiplier, backoff.maxDelayMs);
}

/** The first `count` reconnect delays: `min(initial * multiplier^(n-1), max)`. */
export function backoffDelays(count: number, backoff: BackoffOptions = DEFAULT_BACKOFF): number[] {
  const delays: number[] = [];
  let delay = backoff.initialDelayMs;
  for (let i = 0; i < count; i++) {
    delays.push(delay);
    delay = nextDelay(delay, backoff);
  }
  return delays;
}

/**
 * Keeps an event stream alive until `signal` is aborted.
 *
 * Each iteration runs one session; when it ends (server close, transport
 * error) the error is reported through `onError`, pending acks are flushed
 * and the loop sleeps before reconnecting. The delay doubles per ended
 * session up to `maxDelayMs` and is never reset, so a long-lived session
 * that later drops still waits the last delay reached.
 *
 * There is no retry limit. Only the signal stops the loop, and on every
 * stop path the pending acks are flushed once more.
 */
export class EventStreamer {
  private readonly handlers: ResolvedEventHandlers;
  private readonly backoff: BackoffOptions;
  private readonly batcher: AckBatcher;

  constructor(
    private readonly transport: EventTransport,
    handlers: EventHandlers,
    private readonly log: Logger,
    options: StreamerOptions = {},
  ) {
    this.handlers = resolveHandlers(handlers);
    this.backoff = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.batcher = new AckBatcher(
      (eventIds, signal) => this.transport.ackEvents({ eventIds }, { signal }),
      log,
      options.ack,
    );
  }

  async run(signal: AbortSignal): Promise<void> {
    let delay = this.backoff.initialDelayMs;
    let attempt = 0;

    this.log.info(
      { ackMode: this.handlers.ackMode, batchSize: this.handlers.batchSize },
      'Event streaming started',
    );

    for (;;) {
      if (signal.aborted) break;

      attempt++;
      const err = await runSession({
        transport: this.transport,
        handlers: this.handlers,
        batcher: this.batcher,
        log: this.log,
        signal,
      });

      if (signal.aborted) break;

      const apiErr = parseError(err);
      if (apiErr) {
        this.log.warn({ err: apiErr, attempt, delayMs: delay }, 'Event stream failed, reconnecting');
        reportError(this.handlers, this.log, apiErr);
      } else {
        this.log.info({ attempt, delayMs: delay }, 'Event stream ended, reconnecting');
      }

      this.batcher.flush();

      if (!(await sleep(delay, signal))) break;

      delay = nextDelay(delay, this.backoff);
    }

    this.batcher.flush();
    this.log.info({ attempts: attempt }, 'Event streaming stopped');
  }
}

/**
 * Starts an {@link EventStreamer} in the background. The returned promise
 * settles once `signal` is aborted and the final flush has been issued;
 * it never rejects.
 */
export function startStreaming(
  transport: EventTransport,
  signal: AbortSignal,
  handlers: EventHandlers,
  log: Logger,
  options?: StreamerOptions,
): Promise<void> {
  const streamer = new EventStreamer(transport, handlers, log, options);
  return streamer.run(signal).catch((err: unknown) => {
    log.error({ err }, 'Event streamer crashed');
  });
}

/** Resolves `true` after `ms`, or `false` as soon as `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
