export { decodeEvent, wireEventSchema } from './event-schema.js';
export type { WireEvent } from './event-schema.js';
export { parseError, isApiError } from './error-classifier.js';
export { dispatchEvent, reportError } from './event-dispatcher.js';
export {
  AckBatcher,
  DEFAULT_ACK_THRESHOLD,
  DEFAULT_ACK_FLUSH_INTERVAL_MS,
  DEFAULT_ACK_TIMEOUT_MS,
} from './ack-batcher.js';
export type { AckBatcherOptions, AckSender } from './ack-batcher.js';
export { runSession } from './stream-session.js';
export type { SessionDeps } from './stream-session.js';
export { EventStreamer, startStreaming, backoffDelays, nextDelay, DEFAULT_BACKOFF } from './event-streamer.js';
export type { BackoffOptions, StreamerOptions } from './event-streamer.js';
