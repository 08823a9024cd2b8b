import { z } from 'zod';
import type { EventStreamHandle, CallOptions, AckEventsResponse, StreamEventsRequest } from './types.js';
import { DOMAIN_SERVICE, EMAIL_SERVICE, type ConnectTransport } from './connect-transport.js';

/* ── Email service ─────────────────────────────────────────────── */

export interface SendEmailRequest {
  from: string;
  to: string[];
  cc?: string[];
  bcc?: string[];
  replyTo?: string;
  subject: string;
  /** Plain-text body. */
  body: string;
  html?: string;
}

const sendEmailResponseSchema = z.object({
  id: z.string().default(''),
});

export type SendEmailResponse = z.infer<typeof sendEmailResponseSchema>;

/** Typed wrapper over the `v1.EmailService` calls. */
export class EmailServiceClient {
  constructor(private readonly transport: ConnectTransport) {}

  async sendEmail(request: SendEmailRequest, options?: CallOptions): Promise<SendEmailResponse> {
    const raw = await this.transport.unary(EMAIL_SERVICE, 'SendEmail', request, options);
    return sendEmailResponseSchema.parse(raw);
  }

  streamEvents(request: StreamEventsRequest, options?: CallOptions): Promise<EventStreamHandle> {
    return this.transport.openStream(request, options);
  }

  ackEvents(eventIds: string[], options?: CallOptions): Promise<AckEventsResponse> {
    return this.transport.ackEvents({ eventIds }, options);
  }
}

/* ── Domain service ────────────────────────────────────────────── */

const dnsRecordSchema = z.object({
  type: z.string().default(''),
  name: z.string().default(''),
  value: z.string().default(''),
  verified: z.boolean().default(false),
});

const domainSchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  status: z.string().default(''),
  records: z.array(dnsRecordSchema).default([]),
  createdAt: z.string().default(''),
});

export type DnsRecord = z.infer<typeof dnsRecordSchema>;
export type Domain = z.infer<typeof domainSchema>;

const domainResponseSchema = z.object({ domain: domainSchema.default({}) });
const listDomainsResponseSchema = z.object({ domains: z.array(domainSchema).default([]) });

/** Typed wrapper over the `v1.DomainService` calls. */
export class DomainServiceClient {
  constructor(private readonly transport: ConnectTransport) {}

  async createDomain(name: string, options?: CallOptions): Promise<Domain> {
    const raw = await this.transport.unary(DOMAIN_SERVICE, 'CreateDomain', { name }, options);
    return domainResponseSchema.parse(raw).domain;
  }

  async getDomain(id: string, options?: CallOptions): Promise<Domain> {
    const raw = await this.transport.unary(DOMAIN_SERVICE, 'GetDomain', { id }, options);
    return domainResponseSchema.parse(raw).domain;
  }

  async listDomains(options?: CallOptions): Promise<Domain[]> {
    const raw = await this.transport.unary(DOMAIN_SERVICE, 'ListDomains', {}, options);
    return listDomainsResponseSchema.parse(raw).domains;
  }

  async verifyDomain(id: string, options?: CallOptions): Promise<Domain> {
    const raw = await this.transport.unary(DOMAIN_SERVICE, 'VerifyDomain', { id }, options);
    return domainResponseSchema.parse(raw).domain;
  }

  async deleteDomain(id: string, options?: CallOptions): Promise<void> {
    await this.transport.unary(DOMAIN_SERVICE, 'DeleteDomain', { id }, options);
  }
}
