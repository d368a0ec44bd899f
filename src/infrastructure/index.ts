export { loadRuntimeConfig } from './config/index.js';
export type { Env, RuntimeConfig } from './config/index.js';
export { InProcessCore, createInProcessCore } from './core/index.js';
export type { InProcessCoreOptions } from './core/index.js';
export { RedisStreamBroker, RedisStreamConnection, RedisStreamPublisher, createRedisClient } from './redis/index.js';
export type { RedisStreamBrokerOptions } from './redis/index.js';
