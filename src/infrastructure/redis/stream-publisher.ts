import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { BrokerPublisher, OutboundMessage } from '../../application/broker.js';
import { toStreamFields } from './stream-entry.js';

/** Name under which the primary broker is addressable as a cluster. */
export const DEFAULT_CLUSTER = 'default';

export interface RedisStreamPublisherOptions {
  /** Connection to the broker the engine consumes from. */
  readonly primary: Redis;
  /** cluster name → broker URL */
  readonly clusters: Readonly<Record<string, string>>;
  /** Opens a connection to a named cluster on first use. */
  readonly createClient: (url: string) => Redis;
  readonly log: Logger;
}

/**
 * Outbound side: appends records with XADD. Owns the primary publishing
 * connection and every cluster connection it opened.
 */
export class RedisStreamPublisher implements BrokerPublisher {
  private readonly primary: Redis;
  private readonly clusters: Readonly<Record<string, string>>;
  private readonly createClient: (url: string) => Redis;
  private readonly log: Logger;
  private readonly clusterClients = new Map<string, Redis>();
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(options: RedisStreamPublisherOptions) {
    this.primary = options.primary;
    this.clusters = options.clusters;
    this.createClient = options.createClient;
    this.log = options.log;
  }

  /** @throws Error when `message.cluster` names no configured cluster. */
  async publish(message: OutboundMessage): Promise<void> {
    const client = this.clientFor(message.cluster);
    const pending = client.xadd(message.topic, '*', ...toStreamFields(message.key, message.value, message.headers));

    this.inFlight.add(pending);
    try {
      const entryId = await pending;
      this.log.debug({ stream: message.topic, entry_id: entryId, cluster: message.cluster }, 'Entry appended');
    } finally {
      this.inFlight.delete(pending);
    }
  }

  async flush(timeoutMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) return true;

    let timer: NodeJS.Timeout | undefined;
    const elapsed = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = Promise.allSettled([...this.inFlight]).then(() => true);

    try {
      return await Promise.race([settled, elapsed]);
    } finally {
      clearTimeout(timer);
    }
  }

  async close(): Promise<void> {
    const clients = [this.primary, ...this.clusterClients.values()];
    this.clusterClients.clear();
    await Promise.all(clients.map((client) => closeClient(client)));
    this.log.info('Stream publisher closed');
  }

  private clientFor(cluster: string | undefined): Redis {
    if (cluster === undefined || cluster === DEFAULT_CLUSTER) return this.primary;

    const existing = this.clusterClients.get(cluster);
    if (existing !== undefined) return existing;

    const url = this.clusters[cluster];
    if (url === undefined) {
      throw new Error(`Unknown broker cluster: ${cluster}`);
    }

    const client = this.createClient(url);
    this.clusterClients.set(cluster, client);
    this.log.info({ cluster }, 'Opened cluster connection');
    return client;
  }
}

async function closeClient(client: Redis): Promise<void> {
  if (client.status === 'ready') {
    await client.quit();
  } else {
    client.disconnect();
  }
}
