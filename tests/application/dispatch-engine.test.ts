import { DispatchEngine } from '../../src/application/dispatch-engine.js';
import type { DispatchEngineOptions } from '../../src/application/dispatch-engine.js';
import type { HandlerDefinition } from '../../src/application/handler-adapter.js';
import { outputHandler, simpleHandler } from '../../src/application/handler-adapter.js';
import { EngineTelemetry } from '../../src/application/telemetry.js';
import { EngineFatalError, deriveEvent } from '../../src/domain/index.js';
import type { Event } from '../../src/domain/index.js';
import { processOrder } from '../../examples/order-processor/handler.js';
import { InMemoryBroker, fakeCore, fakeLogger, makeMessage, orderCreatedEnvelope, structuredMessage } from '../helpers.js';

type Script = ConstructorParameters<typeof InMemoryBroker>[0];

/** Wires an engine to in-process fakes; the engine stops once the script runs dry. */
function setup(handler: HandlerDefinition, script: Script, overrides: Partial<DispatchEngineOptions> = {}) {
  const calls: string[] = [];
  const core = fakeCore(calls);
  const broker = new InMemoryBroker(script, calls);
  const log = fakeLogger();
  const engine = new DispatchEngine({
    coreFactory: () => core,
    handler,
    broker,
    log,
    pollTimeoutMs: 1,
    ...overrides,
  });
  broker.connection.onIdle = () => engine.stop();
  return { engine, core, broker, log, calls };
}

const processed = (event: Event): Event =>
  deriveEvent(event, { id: `processed-${event.id}`, type: 'order.processed' });

describe('DispatchEngine', () => {
  describe('message processing', () => {
    it('skips a malformed message and keeps consuming', async () => {
      const fn = vi.fn();
      const malformed = makeMessage('not json');
      const { engine, log } = setup(simpleHandler(fn), [malformed, structuredMessage(orderCreatedEnvelope('e2'))]);

      await engine.start();

      expect(fn).toHaveBeenCalledTimes(1);
      expect(fn.mock.calls[0]?.[0]).toMatchObject({ id: 'e2', type: 'order.created' });
      expect(log.error).toHaveBeenCalledWith(
        expect.objectContaining({ message_id: malformed.id, topic: 'events' }),
        'Failed to decode message, skipping',
      );
      expect(engine.telemetry.snapshot()).toMatchObject({ received: 2, decode_failures: 1, handler_successes: 1 });
      expect(engine.state).toBe('closed');
    });

    it('acknowledges a simple handler without routing or retry', async () => {
      const { engine, core, broker } = setup(simpleHandler(() => undefined), [
        structuredMessage(orderCreatedEnvelope()),
      ]);

      await engine.start();

      expect(core.getOutputDestination).not.toHaveBeenCalled();
      expect(core.shouldRetry).not.toHaveBeenCalled();
      expect(core.calculateBackoff).not.toHaveBeenCalled();
      expect(broker.publishersCreated).toBe(0);
    });

    it('asks the core exactly once for the destination of a derived event, with its JSON', async () => {
      const { engine, core, broker } = setup(outputHandler(processed), [structuredMessage(orderCreatedEnvelope())]);

      await engine.start();

      const json = '{"specversion":"1.0","id":"processed-e1","source":"/shop","type":"order.processed"}';
      expect(core.getOutputDestination).toHaveBeenCalledTimes(1);
      expect(core.getOutputDestination).toHaveBeenCalledWith(json);
      expect(broker.publisher.published).toEqual([
        {
          topic: 'events-out',
          cluster: undefined,
          key: 'processed-e1',
          value: json,
          headers: { 'content-type': 'application/cloudevents+json' },
        },
      ]);
    });

    it('treats an output handler returning null as a plain acknowledgement', async () => {
      const { engine, core, broker } = setup(outputHandler(() => null), [structuredMessage(orderCreatedEnvelope())]);

      await engine.start();

      expect(core.getOutputDestination).not.toHaveBeenCalled();
      expect(broker.publisher.published).toHaveLength(0);
      expect(engine.telemetry.snapshot().handler_successes).toBe(1);
    });

    it('never publishes when the core decides to discard', async () => {
      const { engine, core, broker } = setup(outputHandler(processed), [structuredMessage(orderCreatedEnvelope())]);
      core.getOutputDestination.mockResolvedValueOnce({ kind: 'discard', target: '' });

      await engine.start();

      expect(broker.publisher.published).toHaveLength(0);
      expect(engine.telemetry.snapshot().discarded).toBe(1);
    });

    it('keeps consuming after a routing failure', async () => {
      const { engine, core, broker, log } = setup(outputHandler(processed), [
        structuredMessage(orderCreatedEnvelope('e1')),
        structuredMessage(orderCreatedEnvelope('e2')),
      ]);
      core.getOutputDestination.mockRejectedValueOnce(new Error('routing backend down'));

      await engine.start();

      expect(log.error).toHaveBeenCalledWith(
        expect.objectContaining({ event_id: 'processed-e1' }),
        'Failed to route output event',
      );
      expect(broker.publisher.published.map((m) => m.key)).toEqual(['processed-e2']);
      expect(engine.telemetry.snapshot().routing_failures).toBe(1);
    });

    it('treats an output event that cannot be copied as a handler failure and keeps consuming', async () => {
      const handler = outputHandler((event) =>
        deriveEvent(event, {
          id: `processed-${event.id}`,
          type: 'order.processed',
          data: event.id === 'e1' ? { cb: () => 1 } : { ok: true },
        }),
      );
      const { engine, core, broker } = setup(handler, [
        structuredMessage(orderCreatedEnvelope('e1')),
        structuredMessage(orderCreatedEnvelope('e2')),
      ]);

      await engine.start();

      expect(engine.state).toBe('closed');
      expect(core.shouldRetry).toHaveBeenCalledTimes(1);
      expect(core.shouldRetry.mock.calls[0]?.[0]).toMatch(/^Handler returned an event that cannot be copied: /);
      expect(broker.publisher.published.map((m) => m.key)).toEqual(['processed-e2']);
      expect(engine.telemetry.snapshot()).toMatchObject({ handler_failures: 1, handler_successes: 1 });
    });

    it('logs and skips a message whose processing throws unexpectedly', async () => {
      class FlakyTelemetry extends EngineTelemetry {
        private failed = false;

        override recordProcessed(eventType: string, success: boolean): void {
          if (!this.failed) {
            this.failed = true;
            throw new Error('counter store unavailable');
          }
          super.recordProcessed(eventType, success);
        }
      }
      const fn = vi.fn();
      const first = structuredMessage(orderCreatedEnvelope('e1'));
      const { engine, log } = setup(simpleHandler(fn), [first, structuredMessage(orderCreatedEnvelope('e2'))], {
        telemetry: new FlakyTelemetry(),
      });

      await engine.start();

      expect(engine.state).toBe('closed');
      expect(fn).toHaveBeenCalledTimes(2);
      expect(log.error).toHaveBeenCalledWith(
        expect.objectContaining({ message_id: first.id, topic: 'events' }),
        'Unexpected error processing message, skipping',
      );
    });
  });

  describe('retry decision', () => {
    it('consults the core with attempt 1 and skips backoff when it declines', async () => {
      const { engine, core, log } = setup(
        simpleHandler(() => {
          throw new Error('boom');
        }),
        [structuredMessage(orderCreatedEnvelope())],
      );

      await engine.start();

      expect(core.shouldRetry).toHaveBeenCalledTimes(1);
      expect(core.shouldRetry).toHaveBeenCalledWith('boom', 1);
      expect(core.calculateBackoff).not.toHaveBeenCalled();
      expect(log.error).toHaveBeenCalledWith(
        expect.objectContaining({ event_id: 'e1', event_type: 'order.created' }),
        'Handler error',
      );
    });

    it('asks for a backoff only when the core wants a retry, and only logs it', async () => {
      const { engine, core, log } = setup(
        simpleHandler(async () => {
          throw new Error('temporary');
        }),
        [structuredMessage(orderCreatedEnvelope())],
      );
      core.shouldRetry.mockResolvedValueOnce(true);
      core.calculateBackoff.mockResolvedValueOnce(250);

      await engine.start();

      expect(core.calculateBackoff).toHaveBeenCalledWith(1);
      expect(log.warn).toHaveBeenCalledWith(
        { event_id: 'e1', attempt: 1, backoff_ms: 250 },
        'Would retry after backoff (re-delivery not performed)',
      );
      expect(engine.telemetry.snapshot()).toMatchObject({ retry_decisions: 1, retries_requested: 1 });
    });

    it('does not route output when an output handler fails', async () => {
      const { engine, core } = setup(
        outputHandler(() => {
          throw new Error('bad order');
        }),
        [structuredMessage(orderCreatedEnvelope())],
      );

      await engine.start();

      expect(core.getOutputDestination).not.toHaveBeenCalled();
      expect(core.shouldRetry).toHaveBeenCalledWith('bad order', 1);
    });

    it('does not retry when the retry decision itself fails', async () => {
      const { engine, core, log } = setup(
        simpleHandler(() => {
          throw new Error('boom');
        }),
        [structuredMessage(orderCreatedEnvelope())],
      );
      core.shouldRetry.mockRejectedValueOnce(new Error('core unavailable'));

      await engine.start();

      expect(core.calculateBackoff).not.toHaveBeenCalled();
      expect(log.error).toHaveBeenCalledWith(
        expect.objectContaining({ event_id: 'e1', attempt: 1 }),
        'Error checking retry decision, not retrying',
      );
      expect(engine.state).toBe('closed');
    });
  });

  describe('transport circuit breaker', () => {
    const transportError = () => new Error('connection reset');

    it('gives up after five consecutive transport errors', async () => {
      const script = [transportError(), transportError(), transportError(), transportError(), transportError()];
      const { engine, broker, calls } = setup(simpleHandler(() => undefined), script);

      const started = engine.start();

      await expect(started).rejects.toBeInstanceOf(EngineFatalError);
      await expect(started).rejects.toThrow('Too many consecutive transport errors (5), giving up');
      expect(broker.connection.receiveCount).toBe(5);
      expect(engine.state).toBe('failed');
      expect(calls).toEqual(['connection.close', 'core.close']);
    });

    it('resets the count when a message is delivered', async () => {
      const message = structuredMessage(orderCreatedEnvelope());
      const script = [
        transportError(), transportError(), transportError(), transportError(),
        message,
        transportError(), transportError(), transportError(), transportError(),
      ];
      const { engine, broker } = setup(simpleHandler(() => undefined), script);

      await engine.start();

      expect(engine.state).toBe('closed');
      // nine scripted reads plus the idle read that stops the engine
      expect(broker.connection.receiveCount).toBe(10);
      expect(engine.telemetry.snapshot().transport_failures).toBe(8);
    });

    it('does not reset the count on a poll timeout', async () => {
      const script = [transportError(), transportError(), null, transportError(), transportError(), transportError()];
      const { engine, broker } = setup(simpleHandler(() => undefined), script);

      await expect(engine.start()).rejects.toBeInstanceOf(EngineFatalError);
      expect(broker.connection.receiveCount).toBe(6);
    });
  });

  describe('shutdown', () => {
    it('releases publisher, then connection, then core', async () => {
      const { engine, calls } = setup(outputHandler(processed), [structuredMessage(orderCreatedEnvelope())]);

      await engine.start();

      expect(calls).toEqual(['publisher.flush', 'publisher.close', 'connection.close', 'core.close']);
      expect(engine.state).toBe('closed');
    });

    it('lets an in-flight handler finish before releasing resources', async () => {
      let engine: DispatchEngine | null = null;
      const handler = simpleHandler(async () => {
        engine?.stop();
        await new Promise((resolve) => setTimeout(resolve, 5));
        ctx.calls.push('handler.done');
      });
      const ctx = setup(handler, [
        structuredMessage(orderCreatedEnvelope('e1')),
        structuredMessage(orderCreatedEnvelope('e2')),
      ]);
      engine = ctx.engine;

      await ctx.engine.start();

      expect(ctx.calls).toEqual(['handler.done', 'connection.close', 'core.close']);
      expect(ctx.broker.connection.receiveCount).toBe(1);
    });

    it('stops without polling when the external signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const { engine, broker } = setup(simpleHandler(() => undefined), [], { signal: controller.signal });

      await engine.start();

      expect(broker.connection.receiveCount).toBe(0);
      expect(engine.state).toBe('closed');
    });

    it('detaches from the external signal once closed', async () => {
      const controller = new AbortController();
      const add = vi.spyOn(controller.signal, 'addEventListener');
      const remove = vi.spyOn(controller.signal, 'removeEventListener');
      const { engine } = setup(simpleHandler(() => undefined), [], { signal: controller.signal });

      await engine.start();

      expect(add).toHaveBeenCalledTimes(1);
      expect(remove).toHaveBeenCalledWith('abort', add.mock.calls[0]?.[1]);
    });

    it('cannot be started twice', async () => {
      const { engine } = setup(simpleHandler(() => undefined), []);
      await engine.start();

      await expect(engine.start()).rejects.toThrow('Engine cannot start from state "closed"; create a new instance');
    });
  });

  describe('startup', () => {
    it('fails configure when the core cannot provide connection settings', async () => {
      const { engine, core, broker } = setup(simpleHandler(() => undefined), []);
      core.getConnectionConfig.mockRejectedValueOnce(new Error('no settings'));

      const started = engine.start();

      await expect(started).rejects.toMatchObject({
        name: 'EngineFatalError',
        phase: 'configure',
        message: 'Engine configure failed: Failed to get connection config from core',
      });
      expect(core.close).toHaveBeenCalledTimes(1);
      expect(broker.connection.subscription).toBeNull();
      expect(engine.state).toBe('failed');
    });

    it('rejects a bare function before building the core', async () => {
      const coreFactory = vi.fn();
      const bare = (() => undefined) as unknown as HandlerDefinition;
      const { engine } = setup(bare, [], { coreFactory });

      await expect(engine.start()).rejects.toMatchObject({ phase: 'configure' });
      expect(coreFactory).not.toHaveBeenCalled();
    });

    it('subscribes from the earliest entry by default', async () => {
      const { engine, broker } = setup(simpleHandler(() => undefined), []);

      await engine.start();

      expect(broker.connection.subscription).toEqual({
        topic: 'events',
        group: 'test-group',
        policy: { startFrom: 'earliest' },
      });
    });
  });

  describe('routing file', () => {
    it('still asks the core for a destination when no routing file exists', async () => {
      const { engine, core, broker } = setup(outputHandler(processed), [structuredMessage(orderCreatedEnvelope())], {
        routingConfigPath: null,
      });

      await engine.start();

      expect(core.loadRoutingConfig).not.toHaveBeenCalled();
      expect(core.getOutputDestination).toHaveBeenCalledTimes(1);
      expect(broker.publisher.published[0]?.topic).toBe('events-out');
    });

    it('continues with the default destination when the routing file fails to load', async () => {
      const { engine, core, log } = setup(outputHandler(processed), [structuredMessage(orderCreatedEnvelope())], {
        routingConfigPath: '/etc/eventfn/routing.yaml',
      });
      core.loadRoutingConfig.mockRejectedValueOnce(new Error('bad yaml'));

      await engine.start();

      expect(core.loadRoutingConfig).toHaveBeenCalledWith('/etc/eventfn/routing.yaml');
      expect(log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ path: '/etc/eventfn/routing.yaml' }),
        'Failed to load routing configuration, using default destination',
      );
      expect(engine.state).toBe('closed');
    });

    it('fails configure on a bad routing file when routing is required', async () => {
      const { engine, core } = setup(simpleHandler(() => undefined), [], {
        routingConfigPath: '/etc/eventfn/routing.yaml',
        requireRouting: true,
      });
      core.loadRoutingConfig.mockRejectedValueOnce(new Error('bad yaml'));

      await expect(engine.start()).rejects.toMatchObject({
        phase: 'configure',
        message: 'Engine configure failed: bad yaml',
      });
      expect(core.close).toHaveBeenCalledTimes(1);
    });
  });

  it('turns order.created into a published order.processed event', async () => {
    const { engine, broker } = setup(processOrder, [structuredMessage(orderCreatedEnvelope('e1'))]);

    await engine.start();

    expect(broker.publisher.published).toHaveLength(1);
    expect(broker.publisher.published[0]?.value).toBe(
      '{"specversion":"1.0","id":"processed-e1","source":"/shop","type":"order.processed",' +
        '"datacontenttype":"application/json","data":{"order_id":"o-1","amount":25,"status":"processed"}}',
    );
  });
});
