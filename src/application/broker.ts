import type { ConnectionConfig } from '../domain/index.js';

/**
 * One message as delivered by the broker.
 *
 * `key` and `value` mirror a keyed log record; every other field the
 * broker carried with the record arrives in `headers`.
 */
export interface BrokerMessage {
  readonly id: string;
  readonly topic: string;
  readonly key?: string | undefined;
  readonly value: string;
  readonly headers: Readonly<Record<string, string>>;
}

/** A record the output router asks the publisher to append. */
export interface OutboundMessage {
  readonly topic: string;
  readonly cluster?: string | undefined;
  readonly key: string;
  readonly value: string;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Where a consumer starts reading whenever ownership of the topic is
 * (re)assigned to it. `earliest` replays everything still retained.
 */
export interface AssignmentPolicy {
  readonly startFrom: 'earliest' | 'latest';
}

/** Inbound side: a subscribed, blocking-read connection. */
export interface BrokerConnection {
  subscribe(topic: string, group: string, policy: AssignmentPolicy): Promise<void>;
  /**
   * Waits up to `timeoutMs` for the next message.
   * Resolves `null` on timeout; rejects on a transport failure.
   */
  receive(timeoutMs: number): Promise<BrokerMessage | null>;
  /** Releases topic ownership and closes the connection. */
  close(): Promise<void>;
}

/** Outbound side, a second connection owned by the engine. */
export interface BrokerPublisher {
  publish(message: OutboundMessage): Promise<void>;
  /** Waits for in-flight publishes. Resolves `false` if the bound elapsed first. */
  flush(timeoutMs: number): Promise<boolean>;
  close(): Promise<void>;
}

/** Opens broker connections from the settings the Core hands out. */
export interface BrokerClient {
  connect(config: ConnectionConfig): Promise<BrokerConnection>;
  createPublisher(config: ConnectionConfig): Promise<BrokerPublisher>;
}
