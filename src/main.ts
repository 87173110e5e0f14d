import { loadEnv, parseApiKeys } from './config/env.js';
import { createLogger, createRedisClient, createSolanaContext, checkRpcHealth } from './infra/index.js';
import type { Container } from './infra/container.js';
import { EventBus } from './services/event-bus.js';
import { SnapshotStore } from './services/snapshot-store.js';
import { TransactionSender } from './services/transaction-sender.js';
import { EngineState } from './modules/engine-state/index.js';
import { AccessControl } from './modules/access-control/index.js';
import { PriceExecutionAdapter } from './modules/price-execution/index.js';
import { SettlementRouter, DeliveryGuard } from './modules/settlement-router/index.js';
import { Orchestrator } from './modules/orchestrator/index.js';
import { AdminService } from './modules/admin/index.js';
import { SplCustodyAsset, CustodyLocalTransfer } from './modules/custody/index.js';
import { PoolVenue } from './modules/pool-venue/index.js';
import { BridgeProgramClient } from './modules/bridge-program/index.js';
import { createServer } from './api/server.js';

async function main(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ LOG_LEVEL: env.LOG_LEVEL, NODE_ENV: env.NODE_ENV });
  logger.info('Gas reserve engine starting');

  const apiKeys = parseApiKeys(env.API_KEYS);
  if (apiKeys.size === 0) {
    logger.warn('API_KEYS is empty; every authenticated route will reject');
  }

  // Infrastructure
  const redis = createRedisClient(env.REDIS_URL, logger);
  await redis.connect();
  logger.info('Redis connected');

  const solana = createSolanaContext(env, logger);
  await checkRpcHealth(solana.connection, logger);

  const container: Container = {
    logger,
    redis,
    solana,
    clock: () => Date.now(),
  };

  // Engine state
  const state = new EngineState({
    admin: env.ADMIN_IDENTITY,
    custody: solana.keypair.publicKey.toBase58(),
    local: { name: env.LOCAL_DESTINATION, networkId: env.LOCAL_NETWORK_ID },
    settings: {
      operator: env.OPERATOR_IDENTITY ?? null,
      venuePair: env.VENUE_POOL ?? null,
      bridgeAddress: env.BRIDGE_PROGRAM_ID ?? null,
    },
  });
  const snapshots = new SnapshotStore(container);
  await snapshots.load(state);

  // Network collaborators
  const sender = new TransactionSender(container);
  const depositAsset = new SplCustodyAsset(container, sender, env.DEPOSIT_MINT, env.DEPOSIT_DECIMALS);
  const lockedAsset = new SplCustodyAsset(container, sender, env.LOCKED_MINT, env.LOCKED_DECIMALS);
  const venue = new PoolVenue(container, sender, env.VENUE_PROGRAM_ID, {
    deposit: depositAsset,
    locked: lockedAsset,
  });
  const bridge = new BridgeProgramClient(container, sender, env.LOCKED_MINT);

  // Core services
  const eventBus = new EventBus(logger);
  const access = new AccessControl(state, state.tokens);
  const priceExecution = new PriceExecutionAdapter(container, venue);
  const router = new SettlementRouter(container, {
    destinations: state.destinations,
    settings: state.settings,
    lockedAsset,
    localTransfer: new CustodyLocalTransfer(lockedAsset),
    bridge,
  });
  const deliveries = new DeliveryGuard(container, state, router, eventBus);
  const orchestrator = new Orchestrator(container, {
    state,
    access,
    priceExecution,
    router,
    deliveries,
    depositAsset,
    lockedAsset,
    eventBus,
    snapshots,
  });
  const admin = new AdminService(container, {
    state,
    access,
    deliveries,
    lockedAsset,
    eventBus,
    snapshots,
  });

  const pending = deliveries.list();
  if (pending.length > 0) {
    logger.warn({ count: pending.length }, 'Pending deliveries awaiting remediation');
  }
  if (state.unsettledSwaps.size > 0) {
    logger.warn({ count: state.unsettledSwaps.size }, 'Unsettled swaps awaiting remediation');
  }

  // API server
  const server = await createServer({ container, state, orchestrator, admin, apiKeys });
  await server.listen({ host: env.API_HOST, port: env.API_PORT });
  logger.info({ host: env.API_HOST, port: env.API_PORT }, 'API server listening');

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutdown signal received');

    await server.close();
    // Drain flows already queued, then write the final state.
    await state.executor.runExclusive(() => snapshots.persist(state));

    redis.disconnect();
    eventBus.removeAllListeners();

    logger.info('Gas reserve engine shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => { shutdown('SIGTERM').catch(() => process.exit(1)); });
  process.on('SIGINT', () => { shutdown('SIGINT').catch(() => process.exit(1)); });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught exception');
    process.exit(1);
  });

  logger.info(
    { custody: state.custody, destinations: state.destinations.list().length },
    'Gas reserve engine operational',
  );
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal startup error:', err);
  process.exit(1);
});
