import type { Logger } from 'pino';
import { z } from 'zod';
import { CONNECT_CODES, type ConnectCode } from '../../domain/errors.js';
import type { Event } from '../../domain/event.js';
import { decodeEvent } from '../../application/event-schema.js';
import { FLAG_COMPRESSED, FLAG_END_STREAM, encodeEnvelope, readEnvelopes } from './envelope.js';
import {
  TransportError,
  type AckEventsRequest,
  type AckEventsResponse,
  type CallOptions,
  type EventStreamHandle,
  type EventTransport,
  type StreamEventsRequest,
} from './types.js';

export const EMAIL_SERVICE = 'v1.EmailService';
export const DOMAIN_SERVICE = 'v1.DomainService';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ConnectTransportOptions {
  baseUrl: string;
  /** Sent with every call, e.g. `Authorization`. */
  headers?: Record<string, string>;
  fetch?: FetchLike;
  log: Logger;
}

/** A server-streaming call yielding raw JSON messages. */
export interface MessageStream extends AsyncIterable<unknown> {
  close(): Promise<void>;
}

const errorDetailEnvelopeSchema = z.object({
  type: z.string(),
  value: z.string().default(''),
  debug: z.unknown().optional(),
});

const connectErrorSchema = z.object({
  code: z.enum(CONNECT_CODES),
  message: z.string().default(''),
  details: z.array(errorDetailEnvelopeSchema).default([]),
});

const endStreamSchema = z.object({
  error: connectErrorSchema.optional(),
});

const ackEventsResponseSchema = z.object({
  acknowledgedCount: z.number().int().default(0),
});

/** Status used when an error response has no Connect error body. */
function codeFromHttpStatus(status: number): ConnectCode {
  switch (status) {
    case 400: return 'internal';
    case 401: return 'unauthenticated';
    case 403: return 'permission_denied';
    case 404: return 'unimplemented';
    case 429: return 'unavailable';
    case 502:
    case 503:
    case 504: return 'unavailable';
    default: return 'unknown';
  }
}

function toTransportError(raw: z.infer<typeof connectErrorSchema>): TransportError {
  return new TransportError(raw.code, raw.message, raw.details);
}

async function errorFromResponse(response: Response): Promise<TransportError> {
  let body: unknown;
  try {
    body = await response.json();
  } catch {
    body = undefined;
  }

  const parsed = connectErrorSchema.safeParse(body);
  if (parsed.success) return toTransportError(parsed.data);

  return new TransportError(
    codeFromHttpStatus(response.status),
    `HTTP ${response.status} ${response.statusText}`.trim(),
  );
}

/**
 * Connect protocol client over `fetch`, using the JSON codec.
 *
 * Unary calls POST `application/json` to `<baseUrl>/<service>/<method>`.
 * Server-streaming calls POST one enveloped `application/connect+json`
 * message and read enveloped messages until the end-stream frame.
 */
export class ConnectTransport implements EventTransport {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetch: FetchLike;
  private readonly log: Logger;
  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder();

  constructor(options: ConnectTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = options.headers ?? {};
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.log = options.log;
  }

  async unary(service: string, method: string, request: unknown, options: CallOptions = {}): Promise<unknown> {
    const response = await this.post(service, method, {
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
      signal: options.signal,
    });

    if (!response.ok) throw await errorFromResponse(response);

    const text = await response.text();
    return text === '' ? {} : this.parseJson(text);
  }

  async serverStream(service: string, method: string, request: unknown, options: CallOptions = {}): Promise<MessageStream> {
    const controller = new AbortController();
    const signal = options.signal
      ? AbortSignal.any([controller.signal, options.signal])
      : controller.signal;

    const response = await this.post(service, method, {
      headers: { 'Content-Type': 'application/connect+json' },
      body: encodeEnvelope(0, this.encoder.encode(JSON.stringify(request))),
      signal,
    });

    if (!response.ok) throw await errorFromResponse(response);
    if (!response.body) throw new TransportError('internal', 'streaming response has no body');

    const messages = this.readMessages(response.body, signal);

    return {
      [Symbol.asyncIterator]: () => messages,
      close: async () => {
        controller.abort();
        await messages.return(undefined).catch(() => undefined);
      },
    };
  }

  async openStream(request: StreamEventsRequest, options?: CallOptions): Promise<EventStreamHandle> {
    const messages = await this.serverStream(EMAIL_SERVICE, 'StreamEvents', request, options);

    async function* events(): AsyncGenerator<Event, void, undefined> {
      for await (const raw of messages) {
        yield decodeEvent(raw);
      }
    }

    return {
      [Symbol.asyncIterator]: () => events(),
      close: () => messages.close(),
    };
  }

  async ackEvents(request: AckEventsRequest, options?: CallOptions): Promise<AckEventsResponse> {
    const raw = await this.unary(EMAIL_SERVICE, 'AckEvents', request, options);
    return ackEventsResponseSchema.parse(raw);
  }

  private async post(
    service: string,
    method: string,
    init: { headers: Record<string, string>; body: string | Uint8Array; signal: AbortSignal | undefined },
  ): Promise<Response> {
    const url = `${this.baseUrl}/${service}/${method}`;
    try {
      return await this.fetch(url, {
        method: 'POST',
        headers: { ...this.headers, ...init.headers, 'Connect-Protocol-Version': '1' },
        body: init.body,
        signal: init.signal,
      });
    } catch (err: unknown) {
      this.log.debug({ err, url }, 'Connect request failed');
      throw this.networkError(err, init.signal);
    }
  }

  private async *readMessages(body: ReadableStream<Uint8Array>, signal: AbortSignal): AsyncGenerator<unknown, void, undefined> {
    try {
      for await (const envelope of readEnvelopes(body)) {
        if ((envelope.flags & FLAG_COMPRESSED) !== 0) {
          throw new TransportError('internal', 'received compressed message without negotiated compression');
        }

        const json = this.parseJson(this.decoder.decode(envelope.data));

        if ((envelope.flags & FLAG_END_STREAM) !== 0) {
          const end = endStreamSchema.safeParse(json);
          if (!end.success) throw new TransportError('internal', 'malformed end-of-stream message');
          if (end.data.error) throw toTransportError(end.data.error);
          return;
        }

        yield json;
      }
    } catch (err: unknown) {
      if (err instanceof TransportError) throw err;
      throw this.networkError(err, signal);
    }

    throw new TransportError('unavailable', 'stream ended without end-of-stream message');
  }

  private parseJson(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch (err: unknown) {
      throw new TransportError('internal', 'received invalid JSON message', [], { cause: err });
    }
  }

  private networkError(err: unknown, signal: AbortSignal | undefined): TransportError {
    if (signal?.aborted) {
      return new TransportError('canceled', 'call canceled', [], { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new TransportError('unavailable', message, [], { cause: err });
  }
}
