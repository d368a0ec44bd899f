import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { BrokerClient, BrokerConnection, BrokerPublisher } from '../../application/broker.js';
import type { ConnectionConfig } from '../../domain/index.js';
import { RedisStreamConnection } from './stream-connection.js';
import { RedisStreamPublisher } from './stream-publisher.js';

export interface RedisStreamBrokerOptions {
  /** Consumer name within the group. */
  readonly consumerName: string;
  /** cluster name → broker URL for output destinations */
  readonly clusters?: Readonly<Record<string, string>>;
  readonly log: Logger;
  readonly createClient?: (url: string) => Redis;
}

/**
 * A request that cannot be served fails after one reconnect attempt,
 * so a broker outage reaches the engine's transport error counter.
 */
export function createRedisClient(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: 1,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}

/** Opens Redis Streams connections from the settings the Core hands out. */
export class RedisStreamBroker implements BrokerClient {
  private readonly consumerName: string;
  private readonly clusters: Readonly<Record<string, string>>;
  private readonly log: Logger;
  private readonly createClient: (url: string) => Redis;

  constructor(options: RedisStreamBrokerOptions) {
    this.consumerName = options.consumerName;
    this.clusters = options.clusters ?? {};
    this.log = options.log;
    this.createClient = options.createClient ?? createRedisClient;
  }

  async connect(config: ConnectionConfig): Promise<BrokerConnection> {
    const redis = await this.open(config.broker);
    this.log.info({ broker: redactUrl(config.broker) }, 'Redis connected');
    return new RedisStreamConnection(redis, this.consumerName, this.log.child({ component: 'stream-connection' }));
  }

  async createPublisher(config: ConnectionConfig): Promise<BrokerPublisher> {
    const primary = await this.open(config.broker);
    return new RedisStreamPublisher({
      primary,
      clusters: this.clusters,
      createClient: this.createClient,
      log: this.log.child({ component: 'stream-publisher' }),
    });
  }

  private async open(url: string): Promise<Redis> {
    const redis = this.createClient(url);
    try {
      await redis.connect();
    } catch (err: unknown) {
      redis.disconnect();
      throw err;
    }
    return redis;
  }
}

/** Drops credentials from a broker URL before it is logged. */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password !== '') parsed.password = '***';
    return parsed.toString();
  } catch (err: unknown) {
    if (err instanceof TypeError) return url;
    throw err;
  }
}
