import type { FastifyInstance } from 'fastify';
import type { Orchestrator } from '../../modules/orchestrator/orchestrator.service.js';
import type { Authenticator } from '../auth.js';
import { parseRequest, purchaseSchema } from '../schemas.js';
import { purchaseView } from '../views.js';

export async function purchaseRoutes(
  app: FastifyInstance,
  authenticate: Authenticator,
  orchestrator: Orchestrator,
): Promise<void> {
  app.post('/purchases', async (request, reply) => {
    const caller = authenticate(request);
    const input = parseRequest(purchaseSchema, request.body);

    const receipt = await orchestrator.purchase(caller, input);
    return reply.status(201).send(purchaseView(receipt));
  });
}
