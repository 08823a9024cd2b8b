import type { Logger } from 'pino';
import { isHeartbeat } from '../domain/event.js';
import type { ResolvedEventHandlers } from '../domain/handlers.js';
import type { EventStreamHandle, EventTransport } from '../infrastructure/transport/types.js';
import type { AckBatcher } from './ack-batcher.js';
import { dispatchEvent } from './event-dispatcher.js';

export interface SessionDeps {
  transport: EventTransport;
  handlers: ResolvedEventHandlers;
  batcher: AckBatcher;
  log: Logger;
  signal: AbortSignal;
}

/**
 * Runs one streaming connection to completion.
 *
 * 1. Open the stream for all event types.
 * 2. For each event: skip heartbeats → dispatch → queue the id for
 *    acknowledgment (auto mode, non-empty id only).
 * 3. Close the stream on every exit path.
 *
 * Resolves with the terminal transport error, or `null` when the server
 * closed the stream cleanly or `signal` was aborted.
 */
export async function runSession(deps: SessionDeps): Promise<unknown> {
  const { transport, handlers, batcher, log, signal } = deps;

  let stream: EventStreamHandle;
  try {
    stream = await transport.openStream(
      { eventTypes: [], batchSize: handlers.batchSize },
      { signal },
    );
  } catch (err: unknown) {
    return signal.aborted ? null : err;
  }

  log.debug({ batchSize: handlers.batchSize }, 'Event stream opened');

  try {
    for await (const event of stream) {
      if (signal.aborted) return null;
      if (isHeartbeat(event)) continue;

      await dispatchEvent(handlers, log, event);

      if (handlers.ackMode === 'auto' && event.id !== '') {
        batcher.queue(event.id);
      }
    }
    log.debug('Event stream closed by server');
    return null;
  } catch (err: unknown) {
    return signal.aborted ? null : err;
  } finally {
    await stream.close().catch((err: unknown) => {
      log.debug({ err }, 'Failed to close event stream');
    });
  }
}
