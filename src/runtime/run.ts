import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import pino from 'pino';
import type { Logger } from 'pino';
import type { BrokerClient } from '../application/broker.js';
import type { CoreFactory } from '../application/core.js';
import { DispatchEngine } from '../application/dispatch-engine.js';
import { createEventCodec } from '../application/event-codec.js';
import type { HandlerDefinition } from '../application/handler-adapter.js';
import { EngineFatalError, toError } from '../domain/index.js';
import type { Env, RuntimeConfig } from '../infrastructure/config/index.js';
import { loadRuntimeConfig } from '../infrastructure/config/index.js';
import { createInProcessCore } from '../infrastructure/core/index.js';
import { RedisStreamBroker } from '../infrastructure/redis/index.js';
import { startStatusServer } from '../interfaces/http/index.js';

export const ROUTING_FILE_NAME = 'routing.yaml';

export interface RunOptions {
  /** Defaults to `process.env`. */
  env?: Env | undefined;
  /** Defaults to a pino logger at LOG_LEVEL. */
  log?: Logger | undefined;
  /** Defaults to the in-process Core. */
  coreFactory?: CoreFactory | undefined;
  /** Defaults to Redis Streams. */
  broker?: BrokerClient | undefined;
  /** Explicit routing file; discovery is skipped when set. */
  routingConfigPath?: string | undefined;
  /** Directory holding the handler module, searched for routing.yaml. */
  handlerDir?: string | undefined;
  /** Stops the worker when aborted, e.g. a deadline. */
  signal?: AbortSignal | undefined;
  /** Stop on SIGINT / SIGTERM. Defaults to true. */
  handleProcessSignals?: boolean | undefined;
}

/**
 * Runs `handler` against the configured stream until a shutdown signal
 * or a fatal error.
 *
 * Order:
 * 1) Runtime configuration and logger
 * 2) Core factory, broker client, routing file discovery
 * 3) Signal handlers and the optional status server
 * 4) Engine lifecycle
 *
 * Resolves after a clean shutdown. Every failure, including a status
 * server that cannot listen, rejects with EngineFatalError.
 */
export async function run(handler: HandlerDefinition, options: RunOptions = {}): Promise<void> {
  let config: RuntimeConfig;
  try {
    config = loadRuntimeConfig(options.env ?? process.env);
  } catch (err: unknown) {
    throw new EngineFatalError('configure', `Engine configure failed: ${toError(err).message}`, { cause: err });
  }

  const log = options.log ?? pino({ level: config.logLevel });

  const coreFactory = options.coreFactory ?? createInProcessCore({ config, log: log.child({ component: 'core' }) });
  const broker = options.broker ?? new RedisStreamBroker({
    consumerName: config.consumerName,
    clusters: config.clusters,
    log,
  });

  const routingConfigPath = discoverRoutingFile(options);
  if (routingConfigPath === null) {
    log.debug('No routing file found, using the default destination');
  }

  const controller = new AbortController();
  const external = options.signal;
  const onExternalAbort = (): void => {
    log.info('Shutdown requested');
    controller.abort();
  };
  if (external !== undefined) {
    if (external.aborted) controller.abort();
    else external.addEventListener('abort', onExternalAbort, { once: true });
  }

  const onSignal = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Shutdown signal received');
    controller.abort();
  };
  const handleSignals = options.handleProcessSignals ?? true;
  if (handleSignals) {
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  }

  const engine = new DispatchEngine({
    coreFactory,
    handler,
    broker,
    log,
    signal: controller.signal,
    codec: createEventCodec({ wrapRawMessages: config.wrapRawMessages }),
    routingConfigPath,
    requireRouting: config.requireRouting,
    pollTimeoutMs: config.pollTimeoutMs,
    flushTimeoutMs: config.flushTimeoutMs,
  });

  let status: Awaited<ReturnType<typeof startStatusServer>> | null = null;
  try {
    if (config.statusPort !== null) {
      try {
        status = await startStatusServer({ engine, log, port: config.statusPort });
      } catch (err: unknown) {
        throw new EngineFatalError('configure', `Status server failed to start: ${toError(err).message}`, { cause: err });
      }
    }
    await engine.start();
  } finally {
    if (handleSignals) {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
    external?.removeEventListener('abort', onExternalAbort);
    if (status !== null) {
      await status.close();
    }
  }
}

/**
 * Where the routing file is looked for, first hit wins:
 * 1) `routingConfigPath`, used as given
 * 2) routing.yaml in `handlerDir`
 * 3) routing.yaml beside the entry script
 *
 * `null` when no candidate exists.
 */
export function discoverRoutingFile(
  options: Pick<RunOptions, 'routingConfigPath' | 'handlerDir'>,
  entryScript: string | undefined = process.argv[1],
): string | null {
  if (options.routingConfigPath !== undefined) {
    return resolve(options.routingConfigPath);
  }

  const candidates: string[] = [];
  if (options.handlerDir !== undefined) {
    candidates.push(join(options.handlerDir, ROUTING_FILE_NAME));
  }
  if (entryScript !== undefined) {
    candidates.push(join(dirname(resolve(entryScript)), ROUTING_FILE_NAME));
  }

  return candidates.find((candidate) => existsSync(candidate)) ?? null;
}
