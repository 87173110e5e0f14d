import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';
import type { EngineState } from '../../modules/engine-state/engine-state.service.js';

export async function healthRoutes(app: FastifyInstance, container: Container, state: EngineState): Promise<void> {
  app.get('/health', async (_request, reply) => {
    try {
      const redisPing = await container.redis.ping();
      const slot = await container.solana.connection.getSlot();
      const totals = state.ledger.totals();

      return reply.send({
        status: 'healthy',
        timestamp: new Date(container.clock()).toISOString(),
        checks: {
          redis: redisPing === 'PONG' ? 'ok' : 'degraded',
          solanaRpc: { status: 'ok', slot },
        },
        engine: {
          openPositions: totals.openPositions,
          pendingDeliveries: state.pendingDeliveries.size,
          queuedFlows: state.executor.queued,
        },
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      container.logger.error({ err }, 'Health check failed');
      return reply.status(503).send({
        status: 'unhealthy',
        timestamp: new Date(container.clock()).toISOString(),
        error: message,
      });
    }
  });
}
