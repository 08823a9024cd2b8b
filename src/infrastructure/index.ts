export * from './transport/index.js';
export * from './redis/index.js';
