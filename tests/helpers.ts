import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Event, EventPayload } from '../src/domain/index.js';
import type {
  AckEventsRequest,
  AckEventsResponse,
  CallOptions,
  EventStreamHandle,
  EventTransport,
  StreamEventsRequest,
} from '../src/infrastructure/transport/types.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}

let counter = 0;

/** Event factory; ids are `evt-<n>` unless overridden. */
export function makeEvent(payload: EventPayload, overrides: Partial<Event> = {}): Event {
  counter++;
  return {
    id: overrides.id ?? `evt-${counter}`,
    type: overrides.type ?? 'EVENT_TYPE_EMAIL_SENT',
    timestamp: overrides.timestamp ?? '2026-03-01T12:00:00Z',
    payload,
  };
}

export function sentEvent(id: string, emailId = 'email-1'): Event {
  return makeEvent(
    { case: 'sent', value: { emailId, from: 'hello@example.com', recipients: ['user@example.com'], subject: 'Hi' } },
    { id, type: 'EVENT_TYPE_EMAIL_SENT' },
  );
}

export function bouncedEvent(id: string): Event {
  return makeEvent(
    {
      case: 'bounced',
      value: {
        emailId: 'email-2',
        recipients: ['gone@example.com'],
        bounceType: 'Permanent',
        bounceSubType: 'General',
        diagnosticCode: 'smtp; 550 5.1.1 user unknown',
      },
    },
    { id, type: 'EVENT_TYPE_EMAIL_BOUNCED' },
  );
}

export function heartbeatEvent(): Event {
  return makeEvent({ case: undefined }, { id: '', type: 'EVENT_TYPE_HEARTBEAT' });
}

/** One scripted session of a {@link FakeTransport}. */
export interface SessionScript {
  /** `openStream` rejects with this. */
  openError?: unknown;
  events?: Event[];
  /** Iteration throws this after the events. */
  error?: unknown;
  /** Keep the stream open until the call's signal aborts. */
  hang?: boolean;
}

function untilAborted(signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (!signal || signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * In-process transport. Sessions play their scripts in order; once the
 * scripts run out, every session hangs until aborted.
 */
export class FakeTransport implements EventTransport {
  readonly requests: StreamEventsRequest[] = [];
  readonly openedAt: number[] = [];
  readonly acks: string[][] = [];
  closeCount = 0;
  ackImpl: (request: AckEventsRequest) => Promise<AckEventsResponse> = async (request) => ({
    acknowledgedCount: request.eventIds.length,
  });

  constructor(private readonly scripts: SessionScript[] = []) {}

  get opens(): number {
    return this.requests.length;
  }

  async openStream(request: StreamEventsRequest, options: CallOptions = {}): Promise<EventStreamHandle> {
    this.requests.push(request);
    this.openedAt.push(Date.now());
    const script = this.scripts.shift() ?? { hang: true };
    if (script.openError !== undefined) throw script.openError;

    async function* events(): AsyncGenerator<Event, void, undefined> {
      for (const event of script.events ?? []) yield event;
      if (script.error !== undefined) throw script.error;
      if (script.hang) await untilAborted(options.signal);
    }

    return {
      [Symbol.asyncIterator]: () => events(),
      close: async () => {
        this.closeCount++;
      },
    };
  }

  async ackEvents(request: AckEventsRequest): Promise<AckEventsResponse> {
    this.acks.push(request.eventIds);
    return this.ackImpl(request);
  }
}
