import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type { Container } from '../infra/container.js';
import type { EngineState } from '../modules/engine-state/engine-state.service.js';
import type { Orchestrator } from '../modules/orchestrator/orchestrator.service.js';
import type { AdminService } from '../modules/admin/admin.service.js';
import { isEngineError, type EngineErrorCode } from '../services/engine-error.js';
import { createAuthenticator } from './auth.js';
import { RequestValidationError } from './schemas.js';
import { healthRoutes } from './routes/health.js';
import { purchaseRoutes } from './routes/purchases.js';
import { positionRoutes } from './routes/positions.js';
import { ledgerRoutes } from './routes/ledger.js';
import { adminRoutes } from './routes/admin.js';

export interface ServerDeps {
  container: Container;
  state: EngineState;
  orchestrator: Orchestrator;
  admin: AdminService;
  apiKeys: ReadonlyMap<string, string>;
  rateLimitMax?: number;
}

export const ENGINE_ERROR_STATUS: Record<EngineErrorCode, number> = {
  AccessDenied: 403,
  NotFound: 404,
  ZeroAmount: 422,
  InvalidDestination: 422,
  InvalidRecipient: 422,
  DuplicateDestination: 409,
  InvalidExpiry: 422,
  SlippageExceeded: 409,
  SwapFailed: 502,
  SwapUnsettled: 502,
  InsufficientRemaining: 422,
  Expired: 409,
  NotYetExpired: 409,
  TransferFailed: 502,
  BridgeFailed: 502,
  BridgeNotConfigured: 409,
  VenueNotConfigured: 409,
  PersistenceFailed: 503,
};

export async function createServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { container, state, orchestrator, admin } = deps;

  const app = Fastify({
    logger: false,
    requestTimeout: 30_000,
    bodyLimit: 65_536,
  });

  await app.register(rateLimit, {
    max: deps.rateLimitMax ?? 100,
    timeWindow: '1 minute',
  });

  app.addHook('onRequest', async (request) => {
    container.logger.debug({ method: request.method, url: request.url }, 'Incoming request');
  });

  app.addHook('onResponse', async (request, reply) => {
    container.logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed',
    );
  });

  app.setErrorHandler((error: Error & { statusCode?: number }, request, reply) => {
    if (isEngineError(error)) {
      const statusCode = ENGINE_ERROR_STATUS[error.code];
      const log = statusCode >= 500 || error.committed ? 'error' : 'warn';
      container.logger[log]({ err: error, url: request.url }, 'Engine operation rejected');
      return reply.status(statusCode).send({ ...error.toJSON(), error: error.message, statusCode });
    }

    if (error instanceof RequestValidationError) {
      return reply.status(400).send({ error: error.message, details: error.details, statusCode: 400 });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      container.logger.error({ err: error, url: request.url }, 'Unhandled route error');
    }
    return reply.status(statusCode).send({
      error: statusCode >= 500 ? 'Internal server error' : error.message,
      statusCode,
    });
  });

  const authenticate = createAuthenticator(deps.apiKeys);

  await healthRoutes(app, container, state);
  await purchaseRoutes(app, authenticate, orchestrator);
  await positionRoutes(app, authenticate, orchestrator);
  await ledgerRoutes(app, authenticate, state);
  await adminRoutes(app, authenticate, admin);

  return app;
}
