import type { Logger } from 'pino';
import type {
  AssignmentPolicy,
  BrokerClient,
  BrokerConnection,
  BrokerMessage,
  BrokerPublisher,
  OutboundMessage,
} from '../src/application/broker.js';
import type { ConnectionConfig, OutputDestination } from '../src/domain/index.js';

/** Minimal fake logger; `child()` returns the same instance. */
export function fakeLogger() {
  const log = {
    level: 'info',
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/** Structured-mode CloudEvent envelope for an order. */
export function orderCreatedEnvelope(id = 'e1'): Record<string, unknown> {
  return {
    specversion: '1.0',
    id,
    source: '/shop',
    type: 'order.created',
    data: { order_id: 'o-1', amount: 25 },
  };
}

let sequence = 0;

export function makeMessage(value: string, overrides: Partial<BrokerMessage> = {}): BrokerMessage {
  sequence++;
  return { id: `1700000000000-${sequence}`, topic: 'events', value, headers: {}, ...overrides };
}

export function structuredMessage(envelope: Record<string, unknown>): BrokerMessage {
  return makeMessage(JSON.stringify(envelope));
}

/**
 * Core stand-in with spy methods. Every close is appended to `calls` so
 * tests can assert release order across resources.
 */
export function fakeCore(calls: string[] = []) {
  return {
    getConnectionConfig: vi.fn(async (): Promise<ConnectionConfig> => ({
      broker: 'redis://localhost:6379',
      topic: 'events',
      group: 'test-group',
    })),
    shouldRetry: vi.fn(async (_errorMessage: string, _attempt: number): Promise<boolean> => false),
    calculateBackoff: vi.fn(async (_attempt: number): Promise<number> => 0),
    getOutputDestination: vi.fn(async (_eventJson: string): Promise<OutputDestination> => ({
      kind: 'broker',
      target: 'events-out',
    })),
    loadRoutingConfig: vi.fn(async (_path: string): Promise<void> => undefined),
    close: vi.fn(async (): Promise<void> => {
      calls.push('core.close');
    }),
  };
}

/**
 * Scripted inbound connection. Each receive() takes the next item: a
 * message is delivered, an Error is thrown as a transport failure, `null`
 * is a poll timeout. Once the script is exhausted `onIdle` runs and
 * receive() reports a timeout.
 */
export class ScriptedConnection implements BrokerConnection {
  readonly script: Array<BrokerMessage | Error | null>;
  readonly calls: string[];
  onIdle: () => void = () => undefined;
  subscription: { topic: string; group: string; policy: AssignmentPolicy } | null = null;
  receiveCount = 0;

  constructor(script: Array<BrokerMessage | Error | null>, calls: string[]) {
    this.script = script;
    this.calls = calls;
  }

  async subscribe(topic: string, group: string, policy: AssignmentPolicy): Promise<void> {
    this.subscription = { topic, group, policy };
  }

  async receive(_timeoutMs: number): Promise<BrokerMessage | null> {
    this.receiveCount++;
    if (this.script.length === 0) {
      this.onIdle();
      return null;
    }
    const next = this.script.shift();
    if (next instanceof Error) throw next;
    return next ?? null;
  }

  async close(): Promise<void> {
    this.calls.push('connection.close');
  }
}

export class RecordingPublisher implements BrokerPublisher {
  readonly published: OutboundMessage[] = [];
  readonly calls: string[];

  constructor(calls: string[]) {
    this.calls = calls;
  }

  async publish(message: OutboundMessage): Promise<void> {
    this.published.push(message);
  }

  async flush(_timeoutMs: number): Promise<boolean> {
    this.calls.push('publisher.flush');
    return true;
  }

  async close(): Promise<void> {
    this.calls.push('publisher.close');
  }
}

/** In-process broker handing out one scripted connection and one publisher. */
export class InMemoryBroker implements BrokerClient {
  readonly calls: string[];
  readonly connection: ScriptedConnection;
  readonly publisher: RecordingPublisher;
  publishersCreated = 0;

  constructor(script: Array<BrokerMessage | Error | null> = [], calls: string[] = []) {
    this.calls = calls;
    this.connection = new ScriptedConnection(script, calls);
    this.publisher = new RecordingPublisher(calls);
  }

  async connect(_config: ConnectionConfig): Promise<BrokerConnection> {
    return this.connection;
  }

  async createPublisher(_config: ConnectionConfig): Promise<BrokerPublisher> {
    this.publishersCreated++;
    return this.publisher;
  }
}
