import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { AssignmentPolicy, BrokerConnection, BrokerMessage } from '../../application/broker.js';
import { parseStreamEntry, readGroupReplySchema } from './stream-entry.js';

interface Subscription {
  readonly topic: string;
  readonly group: string;
  readonly startId: '0' | '$';
}

/**
 * Inbound side of the broker over a Redis Stream consumer group.
 *
 * Entries are acknowledged as soon as they are read (auto-commit), so a
 * message whose handler fails is not redelivered.
 */
export class RedisStreamConnection implements BrokerConnection {
  private readonly redis: Redis;
  private readonly consumer: string;
  private readonly log: Logger;
  private subscription: Subscription | null = null;

  constructor(redis: Redis, consumer: string, log: Logger) {
    this.redis = redis;
    this.consumer = consumer;
    this.log = log;
  }

  /**
   * Creates the consumer group (and the stream, via MKSTREAM) or moves an
   * existing group to the policy's start position. The move is repeated
   * every time the connection becomes ready again.
   */
  async subscribe(topic: string, group: string, policy: AssignmentPolicy): Promise<void> {
    const subscription: Subscription = {
      topic,
      group,
      startId: policy.startFrom === 'earliest' ? '0' : '$',
    };

    await this.assign(subscription);
    this.subscription = subscription;
    this.redis.on('ready', this.onReady);

    this.log.info({ topic, group, consumer: this.consumer, start_from: policy.startFrom }, 'Subscribed to stream');
  }

  /**
   * XREADGROUP with BLOCK for at most one entry.
   * `null` = timeout with no new messages.
   */
  async receive(timeoutMs: number): Promise<BrokerMessage | null> {
    const subscription = this.subscription;
    if (subscription === null) {
      throw new Error('receive() called before subscribe()');
    }
    const { topic, group } = subscription;

    const raw: unknown = await this.redis.xreadgroup(
      'GROUP', group, this.consumer,
      'COUNT', 1,
      'BLOCK', timeoutMs,
      'STREAMS', topic,
      '>',
    );

    const reply = readGroupReplySchema.parse(raw);
    if (reply === null) return null;

    for (const [, entries] of reply) {
      for (const [id, fields] of entries) {
        await this.redis.xack(topic, group, id);
        if (fields === null) continue;

        const entry = parseStreamEntry(fields);
        return { id, topic, key: entry.key, value: entry.value, headers: entry.headers };
      }
    }
    return null;
  }

  /** Leaves the group (releasing its pending entries) and closes the connection. */
  async close(): Promise<void> {
    this.redis.off('ready', this.onReady);
    const subscription = this.subscription;
    this.subscription = null;

    if (this.redis.status !== 'ready') {
      this.redis.disconnect();
      return;
    }

    if (subscription !== null) {
      try {
        await this.redis.xgroup('DELCONSUMER', subscription.topic, subscription.group, this.consumer);
      } catch (err: unknown) {
        this.log.warn({ err, consumer: this.consumer }, 'Failed to remove consumer from group');
      }
    }

    await this.redis.quit();
    this.log.info('Stream connection closed');
  }

  private readonly onReady = (): void => {
    const subscription = this.subscription;
    if (subscription === null) return;
    this.assign(subscription).catch((err: unknown) => {
      this.log.error({ err, topic: subscription.topic, group: subscription.group }, 'Failed to reassign consumer group');
    });
  };

  private async assign(subscription: Subscription): Promise<void> {
    const { topic, group, startId } = subscription;
    try {
      await this.redis.xgroup('CREATE', topic, group, startId, 'MKSTREAM');
      this.log.info({ group, stream: topic, start_id: startId }, 'Consumer group created');
    } catch (err: unknown) {
      // BUSYGROUP = group already exists; move it instead
      if (!(err instanceof Error && err.message.includes('BUSYGROUP'))) throw err;
      await this.redis.xgroup('SETID', topic, group, startId);
      this.log.info({ group, stream: topic, start_id: startId }, 'Consumer group position reset');
    }
  }
}
