import type { FastifyInstance } from 'fastify';
import type { EngineState } from '../../modules/engine-state/engine-state.service.js';
import type { Authenticator } from '../auth.js';

export async function ledgerRoutes(
  app: FastifyInstance,
  authenticate: Authenticator,
  state: EngineState,
): Promise<void> {
  app.get('/destinations', async (request, reply) => {
    authenticate(request);
    const { local } = state.destinations;

    return reply.send(
      state.destinations.list().map((d) => ({ ...d, local: d.networkId === local.networkId })),
    );
  });

  app.get('/fees', async (request, reply) => {
    authenticate(request);
    const totals = state.ledger.totals();

    return reply.send({
      accumulatedFees: state.ledger.accumulatedFees.toString(),
      totalInitial: totals.totalInitial.toString(),
      totalRemaining: totals.totalRemaining.toString(),
      openPositions: totals.openPositions,
      closedPositions: totals.closedPositions,
    });
  });
}
