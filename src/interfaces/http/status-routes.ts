import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';
import type { DispatcherStatus } from '../../application/index.js';

export interface StatusSource {
  status(): DispatcherStatus;
}

export interface StatusRoutesOptions {
  source: StatusSource;
  /** Readiness fails when the last successful heartbeat is older than this. */
  staleAfterMs: number;
  /** Injectable clock for tests. */
  now?: (() => number) | undefined;
}

/**
 * Health and status routes for container orchestration.
 *
 * GET /health/liveness   the dispatch loop is running
 * GET /health/readiness  running, and the service answered recently
 * GET /status            full dispatcher status
 */
async function statusRoutes(fastify: FastifyInstance, opts: StatusRoutesOptions): Promise<void> {
  const now = opts.now ?? Date.now;

  fastify.get('/health/liveness', async (_request, reply: FastifyReply) => {
    const { state } = opts.source.status();
    if (state === 'running' || state === 'stopping') {
      return reply.status(200).send({ status: 'UP' });
    }
    return reply.status(503).send({ status: 'DOWN', state });
  });

  fastify.get('/health/readiness', async (_request, reply: FastifyReply) => {
    const status = opts.source.status();

    if (status.state !== 'running') {
      return reply.status(503).send({ status: 'DOWN', reason: `dispatcher is ${status.state}` });
    }
    if (!status.lastSuccessfulHeartbeatAt) {
      return reply.status(503).send({ status: 'DOWN', reason: 'no successful heartbeat yet' });
    }

    const ageMs = now() - status.lastSuccessfulHeartbeatAt.getTime();
    if (ageMs > opts.staleAfterMs) {
      fastify.log.warn({ ageMs, staleAfterMs: opts.staleAfterMs }, 'Heartbeat is stale');
      return reply.status(503).send({ status: 'DOWN', reason: 'last successful heartbeat is stale' });
    }

    return reply.status(200).send({ status: 'UP' });
  });

  fastify.get('/status', async (_request, reply: FastifyReply) => {
    const status = opts.source.status();
    return reply.status(200).send({
      ...status,
      lastHeartbeatAt: status.lastHeartbeatAt?.toISOString() ?? null,
      lastSuccessfulHeartbeatAt: status.lastSuccessfulHeartbeatAt?.toISOString() ?? null,
    });
  });
}

export default fp(statusRoutes, {
  name: 'status-routes',
  fastify: '5.x',
});
