/**
 * Core domain types for the email event stream.
 *
 * These types describe an event after it has been decoded from the wire.
 * They carry no transport or framework dependencies.
 */

export const EVENT_TYPES = [
  'EVENT_TYPE_UNSPECIFIED',
  'EVENT_TYPE_HEARTBEAT',
  'EVENT_TYPE_EMAIL_SENT',
  'EVENT_TYPE_EMAIL_DELIVERED',
  'EVENT_TYPE_EMAIL_BOUNCED',
  'EVENT_TYPE_EMAIL_COMPLAINED',
  'EVENT_TYPE_EMAIL_REJECTED',
  'EVENT_TYPE_EMAIL_DELAYED',
  'EVENT_TYPE_EMAIL_REPLIED',
  'EVENT_TYPE_EMAIL_FAILED',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

/** Accepted for delivery. */
export interface EmailSentEvent {
  readonly emailId: string;
  readonly from: string;
  readonly recipients: readonly string[];
  readonly subject: string;
}

export interface EmailDeliveredEvent {
  readonly emailId: string;
  readonly recipients: readonly string[];
  readonly smtpResponse: string;
}

export interface EmailBouncedEvent {
  readonly emailId: string;
  readonly recipients: readonly string[];
  /** `Permanent`, `Transient` or `Undetermined`. */
  readonly bounceType: string;
  readonly bounceSubType: string;
  readonly diagnosticCode: string;
}

/** A recipient marked the email as spam. */
export interface EmailComplainedEvent {
  readonly emailId: string;
  readonly recipients: readonly string[];
  readonly feedbackType: string;
}

export interface EmailRejectedEvent {
  readonly emailId: string;
  readonly reason: string;
}

export interface EmailDelayedEvent {
  readonly emailId: string;
  readonly recipients: readonly string[];
  readonly delayType: string;
  readonly expirationTime: string;
}

export interface EmailRepliedEvent {
  readonly emailId: string;
  readonly from: string;
  readonly subject: string;
  readonly text: string;
}

/** Sending failed permanently. */
export interface EmailFailedEvent {
  readonly emailId: string;
  readonly reason: string;
}

/**
 * Closed union of payload variants. `case: undefined` covers heartbeats
 * and any variant this SDK version does not know.
 */
export type EventPayload =
  | { readonly case: 'sent'; readonly value: EmailSentEvent }
  | { readonly case: 'delivered'; readonly value: EmailDeliveredEvent }
  | { readonly case: 'bounced'; readonly value: EmailBouncedEvent }
  | { readonly case: 'complained'; readonly value: EmailComplainedEvent }
  | { readonly case: 'rejected'; readonly value: EmailRejectedEvent }
  | { readonly case: 'delayed'; readonly value: EmailDelayedEvent }
  | { readonly case: 'replied'; readonly value: EmailRepliedEvent }
  | { readonly case: 'failed'; readonly value: EmailFailedEvent }
  | { readonly case: undefined; readonly value?: undefined };

export type PayloadCase = NonNullable<EventPayload['case']>;

/**
 * One event from the stream.
 *
 * `id` is empty for events that cannot be acknowledged (heartbeats).
 */
export interface Event {
  readonly id: string;
  readonly type: EventType;
  readonly timestamp: string; // ISO-8601, '' when the server omits it
  readonly payload: EventPayload;
}

export function isHeartbeat(event: Event): boolean {
  return event.type === 'EVENT_TYPE_HEARTBEAT';
}
