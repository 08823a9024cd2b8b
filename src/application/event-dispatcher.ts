import type { Logger } from 'pino';
import { ApiError, ErrorCode } from '../domain/errors.js';
import type { Event } from '../domain/event.js';
import type { ResolvedEventHandlers } from '../domain/handlers.js';

/**
 * Forwards an error to the caller's `onError` hook, if any.
 * A throwing hook is logged and contained.
 */
export function reportError(handlers: ResolvedEventHandlers, log: Logger, err: ApiError): void {
  if (!handlers.onError) return;
  try {
    handlers.onError(err);
  } catch (hookErr: unknown) {
    log.error({ err: hookErr }, 'onError handler threw');
  }
}

/**
 * Routes one event to the callback registered for its payload variant.
 *
 * Heartbeats and unknown variants invoke nothing. Variants without a
 * callback are dropped.
 *
 * A callback that throws or rejects is reported through `onError` as an
 * `Internal` error and logged; it never propagates to the stream loop.
 */
export async function dispatchEvent(
  handlers: ResolvedEventHandlers,
  log: Logger,
  event: Event,
): Promise<void> {
  try {
    await invokeHandler(handlers, event);
  } catch (err: unknown) {
    reportError(
      handlers,
      log,
      new ApiError({ code: ErrorCode.Internal, message: 'panic in event handler' }),
    );
    log.warn({ err, event_id: event.id, event_type: event.type }, 'Event handler failed');
  }
}

async function invokeHandler(handlers: ResolvedEventHandlers, event: Event): Promise<void> {
  const { payload } = event;

  switch (payload.case) {
    case 'sent':
      return handlers.onSent?.(payload.value, event);
    case 'delivered':
      return handlers.onDelivered?.(payload.value, event);
    case 'bounced':
      return handlers.onBounced?.(payload.value, event);
    case 'complained':
      return handlers.onComplained?.(payload.value, event);
    case 'rejected':
      return handlers.onRejected?.(payload.value, event);
    case 'delayed':
      return handlers.onDelayed?.(payload.value, event);
    case 'replied':
      return handlers.onReplied?.(payload.value, event);
    case 'failed':
      return handlers.onFailed?.(payload.value, event);
    case undefined:
      return;
  }
}
