import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runSession } from '../../src/application/stream-session.js';
import { AckBatcher } from '../../src/application/ack-batcher.js';
import { resolveHandlers, type EventHandlers } from '../../src/domain/index.js';
import { TransportError } from '../../src/infrastructure/transport/types.js';
import { FakeTransport, fakeLogger, makeEvent, sentEvent, bouncedEvent, heartbeatEvent, type SessionScript } from '../helpers.js';

describe('runSession', () => {
  let log: ReturnType<typeof fakeLogger>;
  let send: ReturnType<typeof vi.fn>;
  let batcher: AckBatcher;

  beforeEach(() => {
    log = fakeLogger();
    send = vi.fn().mockResolvedValue(undefined);
    batcher = new AckBatcher(send, log, { threshold: 100, flushIntervalMs: 60_000 });
  });

  afterEach(() => {
    // clears any scheduled interval flush
    batcher.flush();
  });

  function run(scripts: SessionScript[], handlers: EventHandlers, signal = new AbortController().signal) {
    const transport = new FakeTransport(scripts);
    const result = runSession({ transport, handlers: resolveHandlers(handlers), batcher, log, signal });
    return { transport, result };
  }

  it('requests all event types with the configured batch size', async () => {
    const { transport, result } = run([{ events: [] }], { batchSize: 25 });
    await result;
    expect(transport.requests).toEqual([{ eventTypes: [], batchSize: 25 }]);
  });

  it('dispatches in order, skips heartbeats and queues ackable ids', async () => {
    const seen: string[] = [];
    const events = [
      sentEvent('evt-1'),
      heartbeatEvent(),
      bouncedEvent('evt-2'),
      makeEvent(
        { case: 'rejected', value: { emailId: 'email-5', reason: 'blocked' } },
        { id: '', type: 'EVENT_TYPE_EMAIL_REJECTED' },
      ),
    ];

    const { transport, result } = run([{ events }], {
      onSent: (_p, e) => { seen.push(`sent:${e.id}`); },
      onBounced: (_p, e) => { seen.push(`bounced:${e.id}`); },
      onRejected: (p) => { seen.push(`rejected:${p.reason}`); },
    });

    await expect(result).resolves.toBeNull();
    expect(seen).toEqual(['sent:evt-1', 'bounced:evt-2', 'rejected:blocked']);
    expect(batcher.size).toBe(2);

    batcher.flush();
    expect(send.mock.calls[0]?.[0]).toEqual(['evt-1', 'evt-2']);
    expect(transport.closeCount).toBe(1);
  });

  it('never dispatches or queues a heartbeat, even one with an id and payload', async () => {
    const onSent = vi.fn();
    const heartbeat = makeEvent(
      { case: 'sent', value: { emailId: 'email-9', from: 'a@example.com', recipients: [], subject: '' } },
      { id: 'hb-1', type: 'EVENT_TYPE_HEARTBEAT' },
    );

    const { result } = run([{ events: [heartbeat] }], { onSent });

    await expect(result).resolves.toBeNull();
    expect(onSent).not.toHaveBeenCalled();
    expect(batcher.size).toBe(0);
  });

  it('queues ids of events without a callback', async () => {
    const { result } = run([{ events: [bouncedEvent('evt-9')] }], {});
    await result;
    expect(batcher.size).toBe(1);
  });

  it('queues nothing in manual mode', async () => {
    const onSent = vi.fn();
    const { result } = run([{ events: [sentEvent('evt-1'), sentEvent('evt-2')] }], { ackMode: 'manual', onSent });
    await result;
    expect(onSent).toHaveBeenCalledTimes(2);
    expect(batcher.size).toBe(0);
  });

  it('returns the terminal error and closes the stream', async () => {
    const failure = new TransportError('unavailable', 'connection reset');
    const { transport, result } = run([{ events: [sentEvent('evt-1')], error: failure }], {});

    await expect(result).resolves.toBe(failure);
    expect(transport.closeCount).toBe(1);
    expect(batcher.size).toBe(1);
  });

  it('returns the open error without a stream to close', async () => {
    const failure = new TransportError('unauthenticated', 'invalid api key');
    const { transport, result } = run([{ openError: failure }], {});

    await expect(result).resolves.toBe(failure);
    expect(transport.closeCount).toBe(0);
  });

  it('returns null and closes the stream when cancelled while waiting', async () => {
    const ac = new AbortController();
    const { transport, result } = run([{ hang: true }], {}, ac.signal);

    await Promise.resolve();
    ac.abort();

    await expect(result).resolves.toBeNull();
    expect(transport.closeCount).toBe(1);
  });

  it('stops before the next event once cancelled', async () => {
    const ac = new AbortController();
    const onSent = vi.fn(() => ac.abort());
    const { transport, result } = run([{ events: [sentEvent('evt-1'), sentEvent('evt-2')] }], { onSent }, ac.signal);

    await expect(result).resolves.toBeNull();
    expect(onSent).toHaveBeenCalledTimes(1);
    expect(transport.closeCount).toBe(1);
  });
});
