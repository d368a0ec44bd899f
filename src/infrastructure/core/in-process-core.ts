import type { Logger } from 'pino';
import type { Core, CoreFactory } from '../../application/core.js';
import type { RoutingTable } from '../../application/routing/index.js';
import { envelopeLookup, loadRoutingTable } from '../../application/routing/index.js';
import type { ConnectionConfig, OutputDestination } from '../../domain/index.js';
import type { RuntimeConfig } from '../config/index.js';

export interface InProcessCoreOptions {
  readonly config: RuntimeConfig;
  readonly log: Logger;
}

/**
 * Decision backend living in the worker process.
 *
 * Connection settings come from the runtime configuration, routing from
 * an optional routing file. The retry policy is a stub driven by
 * RETRY_* settings; with the defaults it never retries.
 */
export class InProcessCore implements Core {
  private readonly config: RuntimeConfig;
  private readonly log: Logger;
  private readonly defaultDestination: OutputDestination;
  private routing: RoutingTable | null = null;
  private closed = false;

  constructor(options: InProcessCoreOptions) {
    this.config = options.config;
    this.log = options.log;
    const destination: OutputDestination = { kind: 'broker', target: options.config.outputTopic };
    this.defaultDestination = Object.freeze(destination);
  }

  async getConnectionConfig(): Promise<ConnectionConfig> {
    this.assertOpen();
    return {
      broker: this.config.brokerUrl,
      topic: this.config.topic,
      group: this.config.consumerGroup,
    };
  }

  async shouldRetry(errorMessage: string, attempt: number): Promise<boolean> {
    this.assertOpen();
    const retry = attempt <= this.config.retry.maxAttempts;
    this.log.debug({ attempt, retry, error_message: errorMessage }, 'Retry decision');
    return retry;
  }

  /** min(base * 2^(attempt - 1), max) */
  async calculateBackoff(attempt: number): Promise<number> {
    this.assertOpen();
    const { baseBackoffMs, maxBackoffMs } = this.config.retry;
    const exponent = Math.max(attempt - 1, 0);
    return Math.min(baseBackoffMs * 2 ** exponent, maxBackoffMs);
  }

  /** @throws SyntaxError when `eventJson` is not valid JSON. */
  async getOutputDestination(eventJson: string): Promise<OutputDestination> {
    this.assertOpen();
    const lookup = envelopeLookup(eventJson);

    if (this.routing === null) return this.defaultDestination;

    const decision = this.routing.resolve(lookup);
    if (decision === null) return this.defaultDestination;

    this.log.debug(
      { rule: decision.rule, dest_kind: decision.destination.kind, dest_target: decision.destination.target },
      'Routing rule matched',
    );
    return decision.destination;
  }

  async loadRoutingConfig(path: string): Promise<void> {
    this.assertOpen();
    const table = await loadRoutingTable(path);
    this.routing = table;
    this.log.info(
      { path, rules: table.routes.length, has_default: table.fallback !== null },
      'Routing configuration loaded',
    );
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.routing = null;
    this.log.debug('Core closed');
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Core is closed');
    }
  }
}

export function createInProcessCore(options: InProcessCoreOptions): CoreFactory {
  return () => new InProcessCore(options);
}
