import type { FastifyInstance } from 'fastify';
import type { AdminService } from '../../modules/admin/admin.service.js';
import type { Authenticator } from '../auth.js';
import {
  deliveryParamsSchema,
  emergencySweepSchema,
  parseRequest,
  registerDestinationSchema,
  setBridgeSchema,
  setOperatorSchema,
  setVenueSchema,
  swapParamsSchema,
  sweepFeesSchema,
} from '../schemas.js';
import { pendingDeliveryView, unsettledSwapView } from '../views.js';

export async function adminRoutes(
  app: FastifyInstance,
  authenticate: Authenticator,
  admin: AdminService,
): Promise<void> {
  app.put('/admin/operator', async (request, reply) => {
    const caller = authenticate(request);
    const { operator } = parseRequest(setOperatorSchema, request.body);

    await admin.setOperator(caller, operator);
    return reply.status(204).send();
  });

  app.put('/admin/venue', async (request, reply) => {
    const caller = authenticate(request);
    const { pair } = parseRequest(setVenueSchema, request.body);

    await admin.setVenue(caller, pair);
    return reply.status(204).send();
  });

  app.put('/admin/bridge', async (request, reply) => {
    const caller = authenticate(request);
    const { address } = parseRequest(setBridgeSchema, request.body);

    await admin.setBridge(caller, address);
    return reply.status(204).send();
  });

  app.post('/admin/destinations', async (request, reply) => {
    const caller = authenticate(request);
    const { name, networkId } = parseRequest(registerDestinationSchema, request.body);

    const destination = await admin.registerDestination(caller, name, networkId);
    return reply.status(201).send(destination);
  });

  app.post('/admin/fees/sweep', async (request, reply) => {
    const caller = authenticate(request);
    const { recipient } = parseRequest(sweepFeesSchema, request.body);

    const amount = await admin.sweepFees(caller, recipient);
    return reply.send({ amount: amount.toString(), recipient });
  });

  app.post('/admin/emergency-sweep', async (request, reply) => {
    const caller = authenticate(request);
    const { amount, recipient } = parseRequest(emergencySweepSchema, request.body);

    await admin.emergencySweep(caller, amount, recipient);
    return reply.send({ amount: amount.toString(), recipient });
  });

  app.get('/admin/deliveries', async (request, reply) => {
    const caller = authenticate(request);

    return reply.send(admin.listPendingDeliveries(caller).map(pendingDeliveryView));
  });

  app.post('/admin/deliveries/:id/retry', async (request, reply) => {
    const caller = authenticate(request);
    const { id } = parseRequest(deliveryParamsSchema, request.params);

    return reply.send(await admin.retryDelivery(caller, id));
  });

  app.post('/admin/deliveries/:id/resolve', async (request, reply) => {
    const caller = authenticate(request);
    const { id } = parseRequest(deliveryParamsSchema, request.params);

    return reply.send(pendingDeliveryView(await admin.resolveDelivery(caller, id)));
  });

  app.get('/admin/swaps', async (request, reply) => {
    const caller = authenticate(request);

    return reply.send(admin.listUnsettledSwaps(caller).map(unsettledSwapView));
  });

  app.post('/admin/swaps/:id/resolve', async (request, reply) => {
    const caller = authenticate(request);
    const { id } = parseRequest(swapParamsSchema, request.params);

    return reply.send(unsettledSwapView(await admin.resolveUnsettledSwap(caller, id)));
  });
}
