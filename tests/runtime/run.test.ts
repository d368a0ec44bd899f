import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { simpleHandler } from '../../src/application/handler-adapter.js';
import { EngineFatalError } from '../../src/domain/index.js';
import { discoverRoutingFile, run } from '../../src/runtime/run.js';
import { processOrder } from '../../examples/order-processor/handler.js';
import { InMemoryBroker, fakeCore, fakeLogger, orderCreatedEnvelope, structuredMessage } from '../helpers.js';

vi.mock('../../src/interfaces/http/index.js', () => ({
  startStatusServer: vi.fn(async () => {
    throw new Error('listen EADDRINUSE: address already in use 0.0.0.0:9464');
  }),
}));

describe('run', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'eventfn-run-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('runs the handler until the caller aborts, then releases everything', async () => {
    const controller = new AbortController();
    const calls: string[] = [];
    const core = fakeCore(calls);
    const broker = new InMemoryBroker([structuredMessage(orderCreatedEnvelope('e1'))], calls);
    broker.connection.onIdle = () => controller.abort();

    await run(processOrder, {
      env: {},
      log: fakeLogger(),
      coreFactory: () => core,
      broker,
      handlerDir: dir,
      signal: controller.signal,
    });

    expect(broker.publisher.published.map((m) => m.key)).toEqual(['processed-e1']);
    expect(calls).toEqual(['publisher.flush', 'publisher.close', 'connection.close', 'core.close']);
  });

  it('hands the routing file beside the handler to the core', async () => {
    const path = join(dir, 'routing.yaml');
    writeFileSync(path, 'routing:\n  rules: []\n', 'utf-8');
    const controller = new AbortController();
    controller.abort();
    const core = fakeCore();

    await run(simpleHandler(() => undefined), {
      env: {},
      log: fakeLogger(),
      coreFactory: () => core,
      broker: new InMemoryBroker(),
      handlerDir: dir,
      signal: controller.signal,
    });

    expect(core.loadRoutingConfig).toHaveBeenCalledWith(path);
  });

  it('removes its process signal listeners on exit', async () => {
    const before = process.listenerCount('SIGTERM');
    const controller = new AbortController();
    controller.abort();

    await run(simpleHandler(() => undefined), {
      env: {},
      log: fakeLogger(),
      coreFactory: () => fakeCore(),
      broker: new InMemoryBroker(),
      signal: controller.signal,
    });

    expect(process.listenerCount('SIGTERM')).toBe(before);
  });

  it('rejects an invalid environment as a configure failure', async () => {
    const run$ = run(simpleHandler(() => undefined), {
      env: { POLL_TIMEOUT_MS: 'soon' },
      log: fakeLogger(),
      handleProcessSignals: false,
    });

    await expect(run$).rejects.toBeInstanceOf(EngineFatalError);
    await expect(run$).rejects.toMatchObject({ phase: 'configure' });
  });

  it('rejects a status server that cannot listen as a configure failure', async () => {
    const before = process.listenerCount('SIGTERM');
    const coreFactory = vi.fn(() => fakeCore());

    const run$ = run(simpleHandler(() => undefined), {
      env: { STATUS_PORT: '9464' },
      log: fakeLogger(),
      coreFactory,
      broker: new InMemoryBroker(),
    });

    await expect(run$).rejects.toBeInstanceOf(EngineFatalError);
    await expect(run$).rejects.toMatchObject({
      phase: 'configure',
      message: 'Status server failed to start: listen EADDRINUSE: address already in use 0.0.0.0:9464',
    });
    expect(coreFactory).not.toHaveBeenCalled();
    expect(process.listenerCount('SIGTERM')).toBe(before);
  });

  it('rejects when the engine fails', async () => {
    const core = fakeCore();
    core.getConnectionConfig.mockRejectedValueOnce(new Error('no settings'));

    await expect(
      run(simpleHandler(() => undefined), {
        env: {},
        log: fakeLogger(),
        coreFactory: () => core,
        broker: new InMemoryBroker(),
        handleProcessSignals: false,
      }),
    ).rejects.toThrow('Engine configure failed: Failed to get connection config from core');
  });
});

describe('discoverRoutingFile', () => {
  let handlerDir: string;
  let entryDir: string;

  beforeEach(() => {
    handlerDir = mkdtempSync(join(tmpdir(), 'eventfn-handler-'));
    entryDir = mkdtempSync(join(tmpdir(), 'eventfn-entry-'));
  });

  afterEach(() => {
    rmSync(handlerDir, { recursive: true, force: true });
    rmSync(entryDir, { recursive: true, force: true });
  });

  it('uses an explicit path as given, even if it does not exist', () => {
    expect(discoverRoutingFile({ routingConfigPath: '/etc/eventfn/routing.yaml', handlerDir })).toBe(
      '/etc/eventfn/routing.yaml',
    );
  });

  it('prefers the handler directory over the entry script directory', () => {
    writeFileSync(join(handlerDir, 'routing.yaml'), 'routing: {}\n');
    writeFileSync(join(entryDir, 'routing.yaml'), 'routing: {}\n');

    expect(discoverRoutingFile({ handlerDir }, join(entryDir, 'main.js'))).toBe(join(handlerDir, 'routing.yaml'));
  });

  it('falls back to the directory of the entry script', () => {
    writeFileSync(join(entryDir, 'routing.yaml'), 'routing: {}\n');

    expect(discoverRoutingFile({ handlerDir }, join(entryDir, 'main.js'))).toBe(join(entryDir, 'routing.yaml'));
  });

  it('returns null when no file exists', () => {
    expect(discoverRoutingFile({ handlerDir }, join(entryDir, 'main.js'))).toBeNull();
  });
});
