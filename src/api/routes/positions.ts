import type { FastifyInstance } from 'fastify';
import type { Orchestrator } from '../../modules/orchestrator/orchestrator.service.js';
import type { Authenticator } from '../auth.js';
import {
  holderParamsSchema,
  parseRequest,
  positionParamsSchema,
  redeemSchema,
  transferSchema,
} from '../schemas.js';
import { claimView, positionView, redeemView } from '../views.js';

export async function positionRoutes(
  app: FastifyInstance,
  authenticate: Authenticator,
  orchestrator: Orchestrator,
): Promise<void> {
  app.get('/positions/:id', async (request, reply) => {
    authenticate(request);
    const { id } = parseRequest(positionParamsSchema, request.params);

    return reply.send(positionView(orchestrator.getPosition(id)));
  });

  app.post('/positions/:id/redeem', async (request, reply) => {
    const caller = authenticate(request);
    const { id } = parseRequest(positionParamsSchema, request.params);
    const input = parseRequest(redeemSchema, request.body);

    const receipt = await orchestrator.redeem(caller, { positionId: id, ...input });
    return reply.send(redeemView(receipt));
  });

  app.post('/positions/:id/claim-expired', async (request, reply) => {
    const caller = authenticate(request);
    const { id } = parseRequest(positionParamsSchema, request.params);

    const receipt = await orchestrator.claimExpired(caller, id);
    return reply.send(claimView(receipt));
  });

  app.post('/positions/:id/transfer', async (request, reply) => {
    const caller = authenticate(request);
    const { id } = parseRequest(positionParamsSchema, request.params);
    const { to } = parseRequest(transferSchema, request.body);

    await orchestrator.transferPosition(caller, id, to);
    return reply.send(positionView(orchestrator.getPosition(id)));
  });

  app.get('/holders/:identity/positions', async (request, reply) => {
    authenticate(request);
    const { identity } = parseRequest(holderParamsSchema, request.params);

    return reply.send(orchestrator.listHoldings(identity).map(positionView));
  });
}
