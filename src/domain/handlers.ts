import type { ApiError } from './errors.js';
import type {
  Event,
  EmailSentEvent,
  EmailDeliveredEvent,
  EmailBouncedEvent,
  EmailComplainedEvent,
  EmailRejectedEvent,
  EmailDelayedEvent,
  EmailRepliedEvent,
  EmailFailedEvent,
} from './event.js';

/**
 * `auto` acknowledges each event once its handler has completed.
 * `manual` leaves acknowledgment to the caller (`client.ack(ids)`).
 */
export type AckMode = 'auto' | 'manual';

/**
 * Callback for one payload variant. The envelope is passed as the second
 * argument so manual-ack callers can read `event.id`. A returned promise is
 * awaited before the next event is processed.
 */
export type EventCallback<T> = (payload: T, event: Event) => void | Promise<void>;

/**
 * Callbacks for the email event stream. Define only the ones you need;
 * events without a callback are dropped after dispatch.
 */
export interface EventHandlers {
  onSent?: EventCallback<EmailSentEvent>;
  onDelivered?: EventCallback<EmailDeliveredEvent>;
  onBounced?: EventCallback<EmailBouncedEvent>;
  onComplained?: EventCallback<EmailComplainedEvent>;
  onRejected?: EventCallback<EmailRejectedEvent>;
  onDelayed?: EventCallback<EmailDelayedEvent>;
  onReplied?: EventCallback<EmailRepliedEvent>;
  onFailed?: EventCallback<EmailFailedEvent>;

  /** Stream failures and handler failures. */
  onError?: (err: ApiError) => void;

  /** Default `auto`. */
  ackMode?: AckMode;

  /** Events per receive batch requested from the server. Default 10. */
  batchSize?: number;
}

export const DEFAULT_BATCH_SIZE = 10;

/** Handlers with defaults applied. */
export type ResolvedEventHandlers = Readonly<
  Omit<EventHandlers, 'ackMode' | 'batchSize'> & { ackMode: AckMode; batchSize: number }
>;

/** Whole batch sizes of at least 1; anything else falls back to the default. */
function resolveBatchSize(value: number | undefined): number {
  if (value === undefined) return DEFAULT_BATCH_SIZE;
  const size = Math.floor(value);
  return Number.isFinite(size) && size >= 1 ? size : DEFAULT_BATCH_SIZE;
}

export function resolveHandlers(handlers: EventHandlers): ResolvedEventHandlers {
  return Object.freeze({
    ...handlers,
    ackMode: handlers.ackMode ?? 'auto',
    batchSize: resolveBatchSize(handlers.batchSize),
  });
}
