/**
 * SimpleEmailAPI SDK for Node.js.
 *
 * @example
 * ```ts
 * import { EmailClient, parseError, ErrorCode } from 'emailapi-sdk';
 *
 * const client = new EmailClient(process.env['EMAILAPI_API_KEY'] ?? '');
 * try {
 *   await client.send({ from: 'a@example.com', to: ['b@example.com'], subject: 'Hi', body: 'Hello' });
 * } catch (err) {
 *   const e = parseError(err);
 *   if (e?.is(ErrorCode.DomainNotVerified)) console.log('Verify your domain first');
 *   if (e?.isCategory('validation')) console.log('Invalid field:', e.field);
 * }
 * ```
 */

// Client
export { EmailClient } from './client.js';
export type { ClientOptions } from './client.js';

// Domain model: events, handlers, errors
export * from './domain/index.js';

// Error classification and the streaming core, for custom transports
export * from './application/index.js';

// Transports
export * from './infrastructure/index.js';

// Configuration & logging
export { DEFAULT_BASE_URL, loadWorkerConfig, parseLogLevel } from './config.js';
export type { LogLevel, WorkerConfig } from './config.js';
export { createLogger } from './logger.js';
