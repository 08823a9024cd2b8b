import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { Event } from '../../domain/event.js';
import { decodeEvent } from '../../application/event-schema.js';
import {
  TransportError,
  type AckEventsRequest,
  type AckEventsResponse,
  type CallOptions,
  type EventStreamHandle,
  type EventTransport,
  type StreamEventsRequest,
} from '../transport/types.js';

const DEFAULT_STREAM_KEY = 'email_events';
const DEFAULT_GROUP_NAME = 'emailapi_sdk';
// How long one XREADGROUP blocks before a heartbeat is emitted (ms)
const DEFAULT_BLOCK_MS = 5000;

export interface RedisStreamTransportOptions {
  /** Used for group management and XACK. */
  redis: Redis;
  /**
   * Connection for blocking XREADGROUP calls. Defaults to `redis.duplicate()`,
   * which the transport owns and disconnects in {@link RedisStreamTransport.disconnect}.
   */
  reader?: Redis;
  log: Logger;
  stream?: string;
  group?: string;
  consumer?: string;
  blockMs?: number;
}

/**
 * XREADGROUP reply: [[stream, [[entryId, [field, value, ...] | null], ...]], ...]
 * Fields are null for pending entries that were deleted from the stream.
 */
const xreadgroupReplySchema = z
  .array(z.tuple([z.string(), z.array(z.tuple([z.string(), z.array(z.string()).nullable()]))]))
  .nullable();

type StreamEntry = [entryId: string, fields: string[] | null];

/** Rejects with a `TransportError` as soon as `signal` aborts. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      const timedOut = signal.reason instanceof Error && signal.reason.name === 'TimeoutError';
      reject(timedOut
        ? new TransportError('deadline_exceeded', 'redis call timed out', [], { cause: signal.reason })
        : new TransportError('canceled', 'redis call canceled', [], { cause: signal.reason }));
    };

    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );

    if (signal.aborted) onAbort();
  });
}

function heartbeat(): Event {
  return {
    id: '',
    type: 'EVENT_TYPE_HEARTBEAT',
    timestamp: new Date().toISOString(),
    payload: { case: undefined },
  };
}

/**
 * Event transport over a Redis Stream consumer group.
 *
 * A bridge process appends events with `XADD <stream> * event <json>`,
 * where `<json>` is the same wire event the HTTP stream carries. Each
 * entry id becomes the event id, so acknowledging an event `XACK`s its
 * entry.
 *
 * A session first re-reads this consumer's pending entries list (entries
 * delivered earlier but never acknowledged), then blocks for new entries.
 * A block timeout yields a heartbeat so the session can observe
 * cancellation. Blocking reads run on their own connection so XACK is never
 * queued behind them. Entries that cannot be decoded are acknowledged and
 * dropped.
 */
export class RedisStreamTransport implements EventTransport {
  private readonly redis: Redis;
  private readonly reader: Redis;
  private readonly ownsReader: boolean;
  private readonly log: Logger;
  private readonly stream: string;
  private readonly group: string;
  private readonly consumer: string;
  private readonly blockMs: number;
  private groupReady = false;

  constructor(options: RedisStreamTransportOptions) {
    this.redis = options.redis;
    this.reader = options.reader ?? options.redis.duplicate();
    this.ownsReader = options.reader === undefined;
    this.log = options.log;
    this.stream = options.stream ?? DEFAULT_STREAM_KEY;
    this.group = options.group ?? DEFAULT_GROUP_NAME;
    this.consumer = options.consumer ?? process.env['WORKER_ID'] ?? 'consumer-1';
    this.blockMs = options.blockMs ?? DEFAULT_BLOCK_MS;
  }

  async openStream(request: StreamEventsRequest, options: CallOptions = {}): Promise<EventStreamHandle> {
    await this.ensureConsumerGroup();

    let closed = false;
    const stopped = (): boolean => closed || options.signal?.aborted === true;
    const accepts = (event: Event): boolean =>
      request.eventTypes.length === 0 || request.eventTypes.includes(event.type);

    const read = (cursor: string): Promise<StreamEntry[]> => this.read(request.batchSize, cursor);
    const decode = (entries: StreamEntry[]): Promise<Event[]> => this.decode(entries);

    async function* events(): AsyncGenerator<Event, void, undefined> {
      // Pending entries first, walking the PEL by id
      let cursor = '0';
      while (!stopped()) {
        const entries = await read(cursor);
        const last = entries.at(-1);
        if (last === undefined) break;
        cursor = last[0];
        for (const event of await decode(entries)) {
          if (accepts(event)) yield event;
        }
      }

      while (!stopped()) {
        const entries = await read('>');
        if (entries.length === 0) {
          yield heartbeat();
          continue;
        }
        for (const event of await decode(entries)) {
          if (accepts(event)) yield event;
        }
      }
    }

    return {
      [Symbol.asyncIterator]: () => events(),
      close: async () => {
        closed = true;
      },
    };
  }

  async ackEvents(request: AckEventsRequest, options: CallOptions = {}): Promise<AckEventsResponse> {
    if (request.eventIds.length === 0) return { acknowledgedCount: 0 };
    const acknowledgedCount = await abortable(
      this.redis.xack(this.stream, this.group, ...request.eventIds),
      options.signal,
    );
    return { acknowledgedCount };
  }

  /** Closes the reader connection if this transport created it. */
  disconnect(): void {
    if (this.ownsReader) this.reader.disconnect();
  }

  /**
   * Creates the consumer group if needed. Start id "$" delivers only
   * entries added after creation; MKSTREAM creates the stream itself.
   * BUSYGROUP (group already exists) is not an error.
   */
  private async ensureConsumerGroup(): Promise<void> {
    if (this.groupReady) return;
    try {
      await this.redis.xgroup('CREATE', this.stream, this.group, '$', 'MKSTREAM');
      this.log.info({ group: this.group, stream: this.stream }, 'Consumer group created (from $)');
    } catch (err: unknown) {
      if (!(err instanceof Error && err.message.includes('BUSYGROUP'))) throw err;
      this.log.debug({ group: this.group }, 'Consumer group already exists');
    }
    this.groupReady = true;
  }

  private async read(count: number, cursor: string): Promise<StreamEntry[]> {
    const reply: unknown = cursor === '>'
      ? await this.reader.xreadgroup(
        'GROUP', this.group, this.consumer,
        'COUNT', count,
        'BLOCK', this.blockMs,
        'STREAMS', this.stream,
        cursor,
      )
      : await this.reader.xreadgroup(
        'GROUP', this.group, this.consumer,
        'COUNT', count,
        'STREAMS', this.stream,
        cursor,
      );

    const parsed = xreadgroupReplySchema.parse(reply);
    return parsed?.flatMap(([, entries]) => entries) ?? [];
  }

  /**
   * Decodes a batch of entries. Deleted and malformed entries can never be
   * delivered, so they are acknowledged here to keep them out of the PEL.
   */
  private async decode(entries: StreamEntry[]): Promise<Event[]> {
    const events: Event[] = [];
    const dropped: string[] = [];

    for (const entry of entries) {
      const event = this.toEvent(entry);
      if (event) events.push(event);
      else dropped.push(entry[0]);
    }

    if (dropped.length > 0) {
      await this.redis.xack(this.stream, this.group, ...dropped).catch((err: unknown) => {
        this.log.warn({ err, entryIds: dropped }, 'Failed to ack dropped stream entries');
      });
    }

    return events;
  }

  private toEvent([entryId, fields]: StreamEntry): Event | null {
    if (fields === null) return null;

    const values = new Map<string, string>();
    for (let i = 0; i + 1 < fields.length; i += 2) {
      const key = fields[i];
      const value = fields[i + 1];
      if (key !== undefined && value !== undefined) values.set(key, value);
    }

    try {
      const raw: unknown = JSON.parse(values.get('event') ?? '');
      const event = decodeEvent(raw);
      return { ...event, id: entryId };
    } catch (err: unknown) {
      this.log.warn({ err, entryId }, 'Malformed stream entry, dropping');
      return null;
    }
  }
}
