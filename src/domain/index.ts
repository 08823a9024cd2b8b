export type {
  Event,
  EventType,
  EventPayload,
  PayloadCase,
  EmailSentEvent,
  EmailDeliveredEvent,
  EmailBouncedEvent,
  EmailComplainedEvent,
  EmailRejectedEvent,
  EmailDelayedEvent,
  EmailRepliedEvent,
  EmailFailedEvent,
} from './event.js';
export { EVENT_TYPES, isHeartbeat } from './event.js';
export type { ApiErrorInit, ConnectCode, ErrorCategory } from './errors.js';
export { ApiError, CONNECT_CODES, ErrorCode } from './errors.js';
export type { AckMode, EventCallback, EventHandlers, ResolvedEventHandlers } from './handlers.js';
export { DEFAULT_BATCH_SIZE, resolveHandlers } from './handlers.js';
