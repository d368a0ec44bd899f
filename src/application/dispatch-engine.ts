import type { Logger } from 'pino';
import type { ConnectionConfig, Event, FatalPhase, RetryAttempt } from '../domain/index.js';
import { ConnectionConfigError, EngineFatalError, toError } from '../domain/index.js';
import type { AssignmentPolicy, BrokerClient, BrokerConnection, BrokerMessage, BrokerPublisher } from './broker.js';
import type { Core, CoreFactory } from './core.js';
import type { EventCodec } from './event-codec.js';
import { createEventCodec } from './event-codec.js';
import type { AdaptedHandler, HandlerDefinition } from './handler-adapter.js';
import { adaptHandler } from './handler-adapter.js';
import { OutputRouter } from './output-router.js';
import { EngineTelemetry } from './telemetry.js';

export type EngineState =
  | 'created'
  | 'configured'
  | 'subscribed'
  | 'running'
  | 'draining'
  | 'closed'
  | 'failed';

export const DEFAULT_POLL_TIMEOUT_MS = 100;
export const DEFAULT_FLUSH_TIMEOUT_MS = 5000;
export const MAX_CONSECUTIVE_TRANSPORT_ERRORS = 5;

export interface DispatchEngineOptions {
  coreFactory: CoreFactory;
  handler: HandlerDefinition;
  broker: BrokerClient;
  log: Logger;
  /** External cancellation (process signal or deadline). */
  signal?: AbortSignal | undefined;
  codec?: EventCodec | undefined;
  telemetry?: EngineTelemetry | undefined;
  /** Routing file to hand to the Core at startup; `null` when none exists. */
  routingConfigPath?: string | null | undefined;
  /** Treat a routing file that fails to load as fatal. */
  requireRouting?: boolean | undefined;
  pollTimeoutMs?: number | undefined;
  flushTimeoutMs?: number | undefined;
  maxConsecutiveTransportErrors?: number | undefined;
  /** Defaults to replaying from the earliest entry on every (re)assignment. */
  assignment?: AssignmentPolicy | undefined;
}

/**
 * Dispatch engine: turns a stream of broker messages into handler
 * invocations and routed output events.
 *
 * Lifecycle: created → configured → subscribed → running → draining →
 * closed, with failed reachable from every setup state and from running
 * when the transport circuit breaker trips. Closed and failed are terminal;
 * a new instance is needed to start again.
 *
 * One message is fully processed (decode → handler → retry decision or
 * routing) before the next is polled. Cancellation is observed between
 * iterations only, so an in-flight handler always runs to completion.
 *
 * Owned resources are created in the order Core → connection → publisher
 * and released in reverse, each release guaranteed even if an earlier one
 * fails.
 */
export class DispatchEngine {
  private readonly options: DispatchEngineOptions;
  private readonly log: Logger;
  private readonly codec: EventCodec;
  private readonly abort = new AbortController();
  private readonly onExternalAbort = (): void => this.abort.abort();
  readonly telemetry: EngineTelemetry;

  private current: EngineState = 'created';
  private handler: AdaptedHandler | null = null;
  private core: Core | null = null;
  private config: ConnectionConfig | null = null;
  private connection: BrokerConnection | null = null;
  private publisher: BrokerPublisher | null = null;
  private router: OutputRouter | null = null;

  constructor(options: DispatchEngineOptions) {
    this.options = options;
    this.log = options.log;
    this.codec = options.codec ?? createEventCodec();
    this.telemetry = options.telemetry ?? new EngineTelemetry();

    const external = options.signal;
    if (external !== undefined) {
      if (external.aborted) {
        this.abort.abort();
      } else {
        external.addEventListener('abort', this.onExternalAbort, { once: true });
      }
    }
  }

  get state(): EngineState {
    return this.current;
  }

  /** Settings in effect once configured; `null` before. */
  get connectionConfig(): ConnectionConfig | null {
    return this.config;
  }

  /** Requests a graceful stop; the loop drains after the in-flight message. */
  stop(): void {
    this.abort.abort();
  }

  /**
   * Runs the whole lifecycle. Resolves after a clean shutdown and rejects
   * with an EngineFatalError otherwise.
   */
  async start(): Promise<void> {
    if (this.current !== 'created') {
      throw new Error(`Engine cannot start from state "${this.current}"; create a new instance`);
    }
    await this.configure();
    await this.subscribe();
    await this.run();
  }

  /**
   * created → configured: detect the handler shape, materialise the Core,
   * fetch and validate connection settings, load routing rules.
   */
  async configure(): Promise<void> {
    this.expectState('created', 'configure');

    try {
      this.handler = adaptHandler(this.options.handler);

      this.core = await this.options.coreFactory();

      let config: ConnectionConfig;
      try {
        config = await this.core.getConnectionConfig();
      } catch (err: unknown) {
        throw new ConnectionConfigError('Failed to get connection config from core', { cause: err });
      }
      if (config.broker.trim() === '') throw new ConnectionConfigError('Connection config has an empty broker');
      if (config.topic.trim() === '') throw new ConnectionConfigError('Connection config has an empty topic');
      this.config = Object.freeze({ ...config });

      this.log.info(
        { broker: config.broker, topic: config.topic, group: config.group, handler_shape: this.handler.shape },
        'Connection configuration loaded',
      );

      await this.loadRouting(this.core);
    } catch (err: unknown) {
      return this.fail('configure', err);
    }

    this.transition('configured');
  }

  /**
   * configured → subscribed: open the inbound connection, subscribe with
   * the assignment policy, and open the publisher for output handlers.
   */
  async subscribe(): Promise<void> {
    this.expectState('configured', 'subscribe');
    const { config, core, handler } = this.requireConfigured();

    try {
      this.connection = await this.options.broker.connect(config);
      const policy = this.options.assignment ?? { startFrom: 'earliest' };
      await this.connection.subscribe(config.topic, config.group, policy);
      this.log.info({ topic: config.topic, group: config.group, start_from: policy.startFrom }, 'Subscribed to topic');

      if (handler.shape === 'output') {
        this.publisher = await this.options.broker.createPublisher(config);
        this.log.info('Publisher initialised for output events');
      }

      this.router = new OutputRouter(core, this.codec, this.publisher, this.log);
    } catch (err: unknown) {
      return this.fail('subscribe', err);
    }

    this.transition('subscribed');
  }

  /**
   * subscribed → running → draining → closed. Resolves once every owned
   * resource is released.
   */
  async run(): Promise<void> {
    this.expectState('subscribed', 'run');
    this.transition('running');
    this.log.info('Starting consumer');

    let fatal: EngineFatalError | null = null;
    try {
      await this.pollLoop();
    } catch (err: unknown) {
      fatal = err instanceof EngineFatalError
        ? err
        : new EngineFatalError('run', `Consumer loop failed: ${toError(err).message}`, { cause: err });
    }

    if (fatal !== null) {
      this.log.fatal({ err: fatal }, 'Consumer stopped on fatal error');
      await this.release();
      this.detachSignal();
      this.transition('failed');
      throw fatal;
    }

    this.transition('draining');
    this.log.info('Consumer draining');
    await this.release();
    this.detachSignal();
    this.transition('closed');
    this.log.info('Consumer stopped');
  }

  // --- Loop -----------------------------------------------------------

  private async pollLoop(): Promise<void> {
    const connection = this.connection;
    if (connection === null) throw new Error('Engine has no broker connection');

    const pollTimeoutMs = this.options.pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
    const maxErrors = this.options.maxConsecutiveTransportErrors ?? MAX_CONSECUTIVE_TRANSPORT_ERRORS;
    const signal = this.abort.signal;
    let consecutiveErrors = 0;

    while (!signal.aborted) {
      let message: BrokerMessage | null;
      try {
        message = await connection.receive(pollTimeoutMs);
      } catch (err: unknown) {
        consecutiveErrors++;
        this.telemetry.recordTransportFailure();
        this.log.error({ err, consecutive_errors: consecutiveErrors }, 'Error reading message');
        if (consecutiveErrors >= maxErrors) {
          throw new EngineFatalError(
            'run',
            `Too many consecutive transport errors (${maxErrors}), giving up`,
            { cause: err },
          );
        }
        continue;
      }

      // Timeout with nothing delivered
      if (message === null) continue;

      consecutiveErrors = 0;
      try {
        await this.processMessage(message);
      } catch (err: unknown) {
        this.log.error({ err, message_id: message.id, topic: message.topic }, 'Unexpected error processing message, skipping');
      }
    }
  }

  /**
   * Decode → invoke → interpret. Every failure in here is scoped to this
   * message; nothing propagates to the loop.
   */
  private async processMessage(message: BrokerMessage): Promise<void> {
    this.telemetry.recordReceived();

    let event: Event;
    try {
      event = this.codec.decode(message);
    } catch (err: unknown) {
      this.telemetry.recordDecodeFailure();
      this.log.error({ err, message_id: message.id, topic: message.topic }, 'Failed to decode message, skipping');
      return;
    }

    const handler = this.handler;
    if (handler === null) throw new Error('Engine has no handler');

    this.log.debug({ event_id: event.id, event_type: event.type, message_id: message.id }, 'Event received');
    const outcome = await handler.invoke(event);

    switch (outcome.kind) {
      case 'ack':
        this.telemetry.recordProcessed(event.type, true);
        return;

      case 'ack-with-output':
        this.telemetry.recordProcessed(event.type, true);
        await this.routeOutput(outcome.event);
        return;

      case 'failure':
        this.telemetry.recordProcessed(event.type, false);
        this.log.error({ err: outcome.error, event_id: event.id, event_type: event.type }, 'Handler error');
        await this.decideRetry(event, { errorMessage: outcome.error.message, attemptNumber: 1 });
        return;
    }
  }

  private async routeOutput(output: Event): Promise<void> {
    const router = this.router;
    if (router === null) throw new Error('Engine has no output router');

    try {
      const result = await router.route(output);
      this.telemetry.recordRouted(result);
    } catch (err: unknown) {
      this.telemetry.recordRoutingFailure();
      this.log.error({ err, event_id: output.id, event_type: output.type }, 'Failed to route output event');
    }
  }

  /**
   * Consults the Core about a failed invocation. The decision is logged,
   * not enacted: the message is not re-delivered.
   */
  private async decideRetry(event: Event, attempt: RetryAttempt): Promise<void> {
    const core = this.core;
    if (core === null) throw new Error('Engine has no core');

    let retry: boolean;
    try {
      retry = await core.shouldRetry(attempt.errorMessage, attempt.attemptNumber);
    } catch (err: unknown) {
      this.log.error({ err, event_id: event.id, attempt: attempt.attemptNumber }, 'Error checking retry decision, not retrying');
      return;
    }
    this.telemetry.recordRetryDecision(retry);
    if (!retry) return;

    let backoffMs: number;
    try {
      backoffMs = await core.calculateBackoff(attempt.attemptNumber);
    } catch (err: unknown) {
      this.log.error({ err, event_id: event.id, attempt: attempt.attemptNumber }, 'Error calculating backoff');
      return;
    }

    this.log.warn(
      { event_id: event.id, attempt: attempt.attemptNumber, backoff_ms: backoffMs },
      'Would retry after backoff (re-delivery not performed)',
    );
  }

  // --- Setup helpers ----------------------------------------------------

  private async loadRouting(core: Core): Promise<void> {
    const path = this.options.routingConfigPath;
    if (path === undefined || path === null) return;

    this.log.info({ path }, 'Loading routing configuration');
    try {
      await core.loadRoutingConfig(path);
    } catch (err: unknown) {
      if (this.options.requireRouting === true) throw err;
      this.log.warn({ err, path }, 'Failed to load routing configuration, using default destination');
    }
  }

  private requireConfigured(): { config: ConnectionConfig; core: Core; handler: AdaptedHandler } {
    if (this.config === null || this.core === null || this.handler === null) {
      throw new Error('Engine is not configured');
    }
    return { config: this.config, core: this.core, handler: this.handler };
  }

  // --- Lifecycle helpers ------------------------------------------------

  private expectState(expected: EngineState, operation: string): void {
    if (this.current !== expected) {
      throw new Error(`Cannot ${operation} from state "${this.current}" (expected "${expected}")`);
    }
  }

  private detachSignal(): void {
    this.options.signal?.removeEventListener('abort', this.onExternalAbort);
  }

  private transition(next: EngineState): void {
    this.log.debug({ from: this.current, to: next }, 'Engine state change');
    this.current = next;
  }

  /** Releases whatever was acquired, marks the engine failed and throws. */
  private async fail(phase: FatalPhase, err: unknown): Promise<never> {
    const cause = toError(err);
    this.log.fatal({ err: cause, phase }, 'Engine setup failed');
    await this.release();
    this.detachSignal();
    this.transition('failed');
    throw new EngineFatalError(phase, `Engine ${phase} failed: ${cause.message}`, { cause });
  }

  /**
   * Publisher (bounded flush) → connection → Core. Each step runs even if
   * the previous one failed; failures are logged.
   */
  private async release(): Promise<void> {
    const publisher = this.publisher;
    this.publisher = null;
    if (publisher !== null) {
      const flushTimeoutMs = this.options.flushTimeoutMs ?? DEFAULT_FLUSH_TIMEOUT_MS;
      await this.releaseStep('publisher', async () => {
        const flushed = await publisher.flush(flushTimeoutMs);
        if (!flushed) {
          this.log.warn({ flush_timeout_ms: flushTimeoutMs }, 'Publisher flush timed out, pending output events may be lost');
        }
        await publisher.close();
      });
    }

    const connection = this.connection;
    this.connection = null;
    if (connection !== null) {
      await this.releaseStep('connection', () => connection.close());
    }

    const core = this.core;
    this.core = null;
    if (core !== null) {
      await this.releaseStep('core', () => core.close());
    }
  }

  private async releaseStep(resource: string, close: () => Promise<void>): Promise<void> {
    try {
      await close();
      this.log.debug({ resource }, 'Resource released');
    } catch (err: unknown) {
      this.log.error({ err, resource }, 'Failed to release resource');
    }
  }
}
