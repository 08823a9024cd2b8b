import type { ConnectCode } from '../../domain/errors.js';
import type { Event, EventType } from '../../domain/event.js';

/** One entry of a Connect error's `details` array. */
export interface ErrorDetailEnvelope {
  /** Fully-qualified message name, e.g. `v1.ErrorDetail`. */
  readonly type: string;
  /** Base64 protobuf encoding of the detail. */
  readonly value: string;
  /** JSON rendition of the detail, when the server includes it. */
  readonly debug?: unknown;
}

/**
 * A failed call as reported by the transport: a Connect status code,
 * the server's message and any structured details.
 */
export class TransportError extends Error {
  readonly code: ConnectCode;
  readonly details: readonly ErrorDetailEnvelope[];

  constructor(code: ConnectCode, message: string, details: readonly ErrorDetailEnvelope[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.code = code;
    this.details = details;
  }
}

export interface StreamEventsRequest {
  /** Empty means all event types. */
  eventTypes: EventType[];
  batchSize: number;
}

export interface AckEventsRequest {
  eventIds: string[];
}

export interface AckEventsResponse {
  acknowledgedCount: number;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * A live server-streaming call. Iteration ends when the server closes the
 * stream and throws on a transport failure. `close()` must be called on
 * every exit path and is safe to call more than once.
 */
export interface EventStreamHandle extends AsyncIterable<Event> {
  close(): Promise<void>;
}

/** What the streaming core needs from a transport. */
export interface EventTransport {
  openStream(request: StreamEventsRequest, options?: CallOptions): Promise<EventStreamHandle>;
  ackEvents(request: AckEventsRequest, options?: CallOptions): Promise<AckEventsResponse>;
}
