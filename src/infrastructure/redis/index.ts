export { RedisStreamBroker, createRedisClient, redactUrl } from './redis-broker.js';
export type { RedisStreamBrokerOptions } from './redis-broker.js';
export { RedisStreamConnection } from './stream-connection.js';
export { DEFAULT_CLUSTER, RedisStreamPublisher } from './stream-publisher.js';
export type { RedisStreamPublisherOptions } from './stream-publisher.js';
export { parseStreamEntry, readGroupReplySchema, toStreamFields } from './stream-entry.js';
export type { ParsedStreamEntry } from './stream-entry.js';
