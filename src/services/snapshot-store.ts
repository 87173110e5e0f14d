import type { Container } from '../infra/container.js';
import { SNAPSHOT_KEY } from '../config/constants.js';
import { EngineError, describeError } from './engine-error.js';
import type { EngineSettings, EngineState } from '../modules/engine-state/engine-state.service.js';
import { decodeSnapshot, encodeSnapshot, type EngineSnapshot } from '../modules/engine-state/engine-snapshot.js';

export class SnapshotStore {
  private readonly container: Container;
  private readonly key: string;

  constructor(container: Container, key: string = SNAPSHOT_KEY) {
    this.container = container;
    this.key = key;
  }

  /**
   * Restores the persisted state. Settings passed in through the environment
   * only seed a fresh engine: once a snapshot exists, its values win.
   */
  async load(state: EngineState): Promise<boolean> {
    const { redis, logger } = this.container;

    const raw = await redis.get(this.key);
    if (raw === null) {
      logger.info({ key: this.key }, 'No engine snapshot found, starting empty');
      return false;
    }

    const snapshot = decodeSnapshot(raw);
    const seeded: EngineSettings = { ...state.settings };
    state.restore(snapshot);

    for (const setting of ['operator', 'venuePair', 'bridgeAddress'] as const) {
      const configured = seeded[setting];
      const persisted = state.settings[setting];
      if (configured !== null && configured !== persisted) {
        logger.warn({ setting, configured, persisted }, 'Persisted setting overrides the configured value');
      }
    }

    logger.info(
      {
        positions: snapshot.ledger.positions.length,
        pendingDeliveries: snapshot.pendingDeliveries.length,
      },
      'Engine snapshot restored',
    );
    return true;
  }

  async persist(state: EngineState): Promise<void> {
    const { redis, logger } = this.container;

    await redis.set(this.key, encodeSnapshot(state.toSnapshot()));
    logger.debug({ key: this.key }, 'Engine snapshot persisted');
  }

  /**
   * Makes a ledger mutation durable before any funds move for it. If the write
   * fails, the in-memory state goes back to `before` and nothing is paid out.
   */
  async commit(state: EngineState, before: EngineSnapshot): Promise<void> {
    try {
      await this.persist(state);
    } catch (err) {
      state.restore(before);
      this.container.logger.error({ err, key: this.key }, 'Engine snapshot write failed, mutation reverted');
      throw new EngineError('PersistenceFailed', `Engine state could not be persisted: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  /** Persists after a flow whose outcome stands even if this write fails. */
  async checkpoint(state: EngineState): Promise<void> {
    try {
      await this.persist(state);
    } catch (err) {
      this.container.logger.error({ err, key: this.key }, 'Failed to persist engine snapshot');
    }
  }
}
