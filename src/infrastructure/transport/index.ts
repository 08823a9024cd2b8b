export { TransportError } from './types.js';
export type {
  AckEventsRequest,
  AckEventsResponse,
  CallOptions,
  ErrorDetailEnvelope,
  EventStreamHandle,
  EventTransport,
  StreamEventsRequest,
} from './types.js';
export { ConnectTransport, EMAIL_SERVICE, DOMAIN_SERVICE } from './connect-transport.js';
export type { ConnectTransportOptions, FetchLike, MessageStream } from './connect-transport.js';
export { encodeEnvelope, readEnvelopes, FLAG_COMPRESSED, FLAG_END_STREAM } from './envelope.js';
export type { Envelope } from './envelope.js';
export { EmailServiceClient, DomainServiceClient } from './services.js';
export type { SendEmailRequest, SendEmailResponse, Domain, DnsRecord } from './services.js';
