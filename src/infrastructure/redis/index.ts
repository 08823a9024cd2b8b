export { RedisStreamTransport } from './redis-stream-transport.js';
export type { RedisStreamTransportOptions } from './redis-stream-transport.js';
