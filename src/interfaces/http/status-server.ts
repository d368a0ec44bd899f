import Fastify from 'fastify';
import type { Logger } from 'pino';
import statusRoutes from './status-routes.js';
import type { EngineStatusSource } from './status-routes.js';

export interface StatusServerOptions {
  readonly engine: EngineStatusSource;
  readonly log: Logger;
  readonly port: number;
  readonly host?: string | undefined;
}

/**
 * Builds the status server without listening, so tests can use inject().
 * The server logs at the runtime's level; request logging is off.
 */
export async function buildStatusServer(engine: EngineStatusSource, logLevel: string) {
  const fastify = Fastify({
    logger: { level: logLevel },
    disableRequestLogging: true,
  });
  await fastify.register(statusRoutes, { engine });
  return fastify;
}

/** Starts listening; close the returned instance on shutdown. */
export async function startStatusServer(options: StatusServerOptions) {
  const fastify = await buildStatusServer(options.engine, options.log.level);
  const address = await fastify.listen({ port: options.port, host: options.host ?? '0.0.0.0' });
  options.log.info({ address }, 'Status server listening');
  return fastify;
}
