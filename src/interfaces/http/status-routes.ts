import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';
import type { EngineState } from '../../application/dispatch-engine.js';
import type { TelemetrySnapshot } from '../../application/telemetry.js';

/** What the status routes read from the running engine. */
export interface EngineStatusSource {
  readonly state: EngineState;
  readonly telemetry: { snapshot(): TelemetrySnapshot };
}

export interface StatusRoutesOptions {
  engine: EngineStatusSource;
}

/**
 * Status API routes.
 *
 * GET /healthz: 200 while the engine is running, 503 otherwise.
 * GET /metrics: engine counters.
 */
async function statusRoutes(fastify: FastifyInstance, options: StatusRoutesOptions): Promise<void> {
  const { engine } = options;

  fastify.get('/healthz', async (_request, reply: FastifyReply) => {
    const state = engine.state;
    if (state === 'running') {
      return reply.status(200).send({ status: 'ok', state });
    }
    return reply.status(503).send({ status: 'unavailable', state });
  });

  fastify.get('/metrics', async (_request, reply: FastifyReply) => {
    return reply.status(200).send({ state: engine.state, ...engine.telemetry.snapshot() });
  });
}

export default fp(statusRoutes, {
  name: 'status-routes',
  fastify: '5.x',
});
