import type { Logger } from 'pino';

export const DEFAULT_ACK_THRESHOLD = 10;
export const DEFAULT_ACK_FLUSH_INTERVAL_MS = 1000;
export const DEFAULT_ACK_TIMEOUT_MS = 5000;

/** Sends one batch of acknowledgments. Must honour `signal`. */
export type AckSender = (eventIds: string[], signal: AbortSignal) => Promise<unknown>;

export interface AckBatcherOptions {
  /** Batch size that triggers an immediate flush. */
  threshold?: number;
  flushIntervalMs?: number;
  /** Upper bound for one acknowledgment call. */
  ackTimeoutMs?: number;
}

/**
 * Accumulates event ids awaiting acknowledgment and flushes them when the
 * batch reaches `threshold` or `flushIntervalMs` after the first queued id,
 * whichever comes first.
 *
 * All mutation paths (queue, threshold flush, timer flush, external flush)
 * are synchronous, so Node's single thread serializes them: a flush always
 * swaps out the whole list and a concurrent `queue()` lands in the next one.
 *
 * Flushes are fire-and-forget. A failed acknowledgment is logged and
 * dropped; the server redelivers unacknowledged events on the next session.
 */
export class AckBatcher {
  private pending: string[] = [];
  private timer: NodeJS.Timeout | null = null;
  private readonly threshold: number;
  private readonly flushIntervalMs: number;
  private readonly ackTimeoutMs: number;

  constructor(
    private readonly send: AckSender,
    private readonly log: Logger,
    options: AckBatcherOptions = {},
  ) {
    this.threshold = options.threshold ?? DEFAULT_ACK_THRESHOLD;
    this.flushIntervalMs = options.flushIntervalMs ?? DEFAULT_ACK_FLUSH_INTERVAL_MS;
    this.ackTimeoutMs = options.ackTimeoutMs ?? DEFAULT_ACK_TIMEOUT_MS;
  }

  /** Ids queued but not yet flushed. */
  get size(): number {
    return this.pending.length;
  }

  /** Whether an interval flush is scheduled. */
  get scheduled(): boolean {
    return this.timer !== null;
  }

  queue(eventId: string): void {
    this.pending.push(eventId);

    if (this.pending.length >= this.threshold) {
      this.flush();
      return;
    }

    if (this.timer === null) {
      this.timer = setTimeout(() => {
        this.timer = null;
        this.flush();
      }, this.flushIntervalMs);
    }
  }

  flush(): void {
    if (this.pending.length === 0) return;

    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    const eventIds = this.pending;
    this.pending = [];

    void this.send(eventIds, AbortSignal.timeout(this.ackTimeoutMs))
      .then(() => {
        this.log.debug({ count: eventIds.length }, 'Events acknowledged');
      })
      .catch((err: unknown) => {
        this.log.warn({ err, count: eventIds.length }, 'Failed to ack events');
      });
  }
}
