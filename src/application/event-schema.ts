import { z } from 'zod';
import { EVENT_TYPES } from '../domain/event.js';
import type { Event, EventPayload } from '../domain/event.js';

/**
 * Zod schemas for one wire event in proto3 JSON form.
 *
 * - Field names are camelCase; default values (empty strings, empty lists)
 *   are omitted by the server, so every field defaults here.
 * - Unknown `type` values decode as `EVENT_TYPE_UNSPECIFIED` so a newer
 *   server never breaks an older client.
 * - The payload is a oneof: exactly one of the `email*` keys is present.
 */
const str = z.string().default('');
const strList = z.array(z.string()).default([]);

const sentSchema = z.object({ emailId: str, from: str, recipients: strList, subject: str });
const deliveredSchema = z.object({ emailId: str, recipients: strList, smtpResponse: str });
const bouncedSchema = z.object({
  emailId: str,
  recipients: strList,
  bounceType: str,
  bounceSubType: str,
  diagnosticCode: str,
});
const complainedSchema = z.object({ emailId: str, recipients: strList, feedbackType: str });
const rejectedSchema = z.object({ emailId: str, reason: str });
const delayedSchema = z.object({ emailId: str, recipients: strList, delayType: str, expirationTime: str });
const repliedSchema = z.object({ emailId: str, from: str, subject: str, text: str });
const failedSchema = z.object({ emailId: str, reason: str });

export const wireEventSchema = z.object({
  id: str,
  type: z.enum(EVENT_TYPES).catch('EVENT_TYPE_UNSPECIFIED'),
  timestamp: str,
  emailSent: sentSchema.optional(),
  emailDelivered: deliveredSchema.optional(),
  emailBounced: bouncedSchema.optional(),
  emailComplained: complainedSchema.optional(),
  emailRejected: rejectedSchema.optional(),
  emailDelayed: delayedSchema.optional(),
  emailReplied: repliedSchema.optional(),
  emailFailed: failedSchema.optional(),
});

export type WireEvent = z.infer<typeof wireEventSchema>;

function toPayload(wire: WireEvent): EventPayload {
  if (wire.emailSent) return { case: 'sent', value: wire.emailSent };
  if (wire.emailDelivered) return { case: 'delivered', value: wire.emailDelivered };
  if (wire.emailBounced) return { case: 'bounced', value: wire.emailBounced };
  if (wire.emailComplained) return { case: 'complained', value: wire.emailComplained };
  if (wire.emailRejected) return { case: 'rejected', value: wire.emailRejected };
  if (wire.emailDelayed) return { case: 'delayed', value: wire.emailDelayed };
  if (wire.emailReplied) return { case: 'replied', value: wire.emailReplied };
  if (wire.emailFailed) return { case: 'failed', value: wire.emailFailed };
  return { case: undefined };
}

/**
 * Decodes one wire message into an {@link Event}.
 * Throws a `ZodError` when the message is not an event object.
 */
export function decodeEvent(raw: unknown): Event {
  const wire = wireEventSchema.parse(raw);
  return {
    id: wire.id,
    type: wire.type,
    timestamp: wire.timestamp,
    payload: toPayload(wire),
  };
}
