/**
 * SimpleEmailAPI client.
 *
 * @example
 * ```ts
 * const client = new EmailClient('test-api-key');
 *
 * const { id } = await client.send({
 *   from: 'hello@example.com',
 *   to: ['user@example.com'],
 *   subject: 'Hello!',
 *   body: 'World',
 * });
 *
 * const ac = new AbortController();
 * void client.onReceive(ac.signal, {
 *   onDelivered: (e) => console.log('Delivered to:', e.recipients),
 *   onBounced: (e) => console.log('Bounced:', e.bounceType),
 *   onError: (err) => console.error('Stream error:', err.message),
 * });
 * // later
 * ac.abort();
 * ```
 */

import type { Logger } from 'pino';
import { DEFAULT_BASE_URL } from './config.js';
import type { EventHandlers } from './domain/handlers.js';
import { startStreaming, type StreamerOptions } from './application/event-streamer.js';
import { ConnectTransport, type FetchLike } from './infrastructure/transport/connect-transport.js';
import {
  DomainServiceClient,
  EmailServiceClient,
  type SendEmailRequest,
  type SendEmailResponse,
} from './infrastructure/transport/services.js';
import type { AckEventsResponse, CallOptions } from './infrastructure/transport/types.js';
import { defaultLogger } from './logger.js';

export interface ClientOptions {
  baseUrl?: string;
  /** Replaces the global `fetch`, e.g. for proxies or tests. */
  fetch?: FetchLike;
  logger?: Logger;
  /** Reconnect backoff and ack batching for `onReceive`. */
  streaming?: StreamerOptions;
}

export class EmailClient {
  /** Email operations. */
  readonly emails: EmailServiceClient;
  /** Domain management operations. */
  readonly domains: DomainServiceClient;

  private readonly transport: ConnectTransport;
  private readonly log: Logger;
  private readonly streaming: StreamerOptions | undefined;

  constructor(apiKey: string, options: ClientOptions = {}) {
    this.log = options.logger ?? defaultLogger;
    this.streaming = options.streaming;
    this.transport = new ConnectTransport({
      baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
      headers: { Authorization: `Bearer ${apiKey}` },
      fetch: options.fetch,
      log: this.log,
    });
    this.emails = new EmailServiceClient(this.transport);
    this.domains = new DomainServiceClient(this.transport);
  }

  /** Sends an email. Shorthand for `emails.sendEmail`. */
  send(request: SendEmailRequest, options?: CallOptions): Promise<SendEmailResponse> {
    return this.emails.sendEmail(request, options);
  }

  /** Acknowledges events, for handlers running with `ackMode: 'manual'`. */
  ack(eventIds: string[], options?: CallOptions): Promise<AckEventsResponse> {
    return this.emails.ackEvents(eventIds, options);
  }

  /**
   * Streams events to `handlers` in the background, reconnecting with
   * exponential backoff, until `signal` is aborted.
   *
   * The returned promise settles once streaming has stopped; it never
   * rejects, and awaiting it is optional.
   */
  onReceive(signal: AbortSignal, handlers: EventHandlers): Promise<void> {
    return startStreaming(this.transport, signal, handlers, this.log, this.streaming);
  }
}
