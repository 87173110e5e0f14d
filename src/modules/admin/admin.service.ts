import { randomUUID } from 'node:crypto';
import type { Container } from '../../infra/container.js';
import type { EventBus } from '../../services/event-bus.js';
import type { SnapshotStore } from '../../services/snapshot-store.js';
import { EngineError, describeError } from '../../services/engine-error.js';
import type { EngineState, EngineSettings } from '../engine-state/engine-state.service.js';
import type { AccessControl } from '../access-control/access-control.service.js';
import type { DeliveryGuard } from '../settlement-router/delivery-guard.service.js';
import type { Destination } from '../destination-registry/destination-registry.service.js';
import type { CustodyAsset } from '../../types/collaborators.js';
import type { DeliveryReceipt, PendingDelivery, UnsettledSwap } from '../../types/delivery.js';
import type { EngineSnapshot } from '../engine-state/engine-snapshot.js';

export interface AdminServiceDeps {
  state: EngineState;
  access: AccessControl;
  deliveries: DeliveryGuard;
  lockedAsset: CustodyAsset;
  eventBus: EventBus;
  snapshots?: SnapshotStore;
}

type SettingKey = keyof EngineSettings;

export class AdminService {
  private readonly container: Container;
  private readonly deps: AdminServiceDeps;

  constructor(container: Container, deps: AdminServiceDeps) {
    this.container = container;
    this.deps = deps;
  }

  setOperator(caller: string, operator: string): Promise<void> {
    return this.changeSetting(caller, 'operator', operator);
  }

  setVenue(caller: string, pair: string): Promise<void> {
    return this.changeSetting(caller, 'venuePair', pair);
  }

  setBridge(caller: string, address: string): Promise<void> {
    return this.changeSetting(caller, 'bridgeAddress', address);
  }

  registerDestination(caller: string, name: string, networkId: number): Promise<Destination> {
    return this.exclusive(caller, async () => {
      const before = this.deps.state.toSnapshot();
      const destination = this.deps.state.destinations.register(name, networkId);
      await this.commit(before);

      this.container.logger.info(destination, 'Destination registered');
      this.deps.eventBus.emit({
        id: randomUUID(),
        type: 'DESTINATION_REGISTERED',
        timestamp: this.container.clock(),
        name,
        networkId,
      });
      return destination;
    });
  }

  /**
   * Sends every accumulated fee to `recipient`. The zeroed accumulator is
   * persisted before the transfer and restored if the transfer fails.
   */
  sweepFees(caller: string, recipient: string): Promise<bigint> {
    return this.exclusive(caller, async () => {
      const { state } = this.deps;
      const amount = state.ledger.accumulatedFees;
      if (amount === 0n) {
        throw new EngineError('ZeroAmount', 'No fees to sweep');
      }

      const before = state.toSnapshot();
      state.ledger.sweepFees();
      await this.commit(before);

      try {
        await this.transferOut(amount, recipient, 'fee sweep');
      } catch (err) {
        state.ledger.recordFee(amount);
        throw err;
      }

      this.container.logger.info({ amount: amount.toString(), recipient }, 'Fees swept');
      this.deps.eventBus.emit({
        id: randomUUID(),
        type: 'FEES_SWEPT',
        timestamp: this.container.clock(),
        amount: amount.toString(),
        recipient,
      });
      return amount;
    });
  }

  /** Moves locked asset out of custody to settle stuck funds by hand. Ledger state is untouched. */
  emergencySweep(caller: string, amount: bigint, recipient: string): Promise<void> {
    return this.exclusive(caller, async () => {
      if (amount <= 0n) {
        throw new EngineError('ZeroAmount', 'Sweep amount must be positive');
      }
      await this.transferOut(amount, recipient, 'emergency sweep');

      this.container.logger.warn({ amount: amount.toString(), recipient }, 'Emergency sweep executed');
      this.deps.eventBus.emit({
        id: randomUUID(),
        type: 'EMERGENCY_SWEEP',
        timestamp: this.container.clock(),
        amount: amount.toString(),
        recipient,
      });
    });
  }

  listPendingDeliveries(caller: string): PendingDelivery[] {
    this.deps.access.require(caller, 'ADMIN');
    return this.deps.deliveries.list();
  }

  retryDelivery(caller: string, deliveryId: string): Promise<DeliveryReceipt> {
    return this.exclusive(caller, () => {
      const before = this.deps.state.toSnapshot();
      return this.deps.deliveries.retry(deliveryId, () => this.commit(before));
    });
  }

  resolveDelivery(caller: string, deliveryId: string): Promise<PendingDelivery> {
    return this.exclusive(caller, async () => {
      const before = this.deps.state.toSnapshot();
      const pending = this.deps.deliveries.resolve(deliveryId);
      await this.commit(before);
      return pending;
    });
  }

  listUnsettledSwaps(caller: string): UnsettledSwap[] {
    this.deps.access.require(caller, 'ADMIN');
    return Array.from(this.deps.state.unsettledSwaps.values()).sort((a, b) => a.createdAt - b.createdAt);
  }

  /** Drops an unsettled swap once its deposit has been accounted for out of band. */
  resolveUnsettledSwap(caller: string, swapId: string): Promise<UnsettledSwap> {
    return this.exclusive(caller, async () => {
      const { state } = this.deps;
      const swap = state.unsettledSwaps.get(swapId);
      if (!swap) {
        throw new EngineError('NotFound', `Unsettled swap ${swapId} not found`, { context: { swapId } });
      }

      const before = state.toSnapshot();
      state.unsettledSwaps.delete(swapId);
      await this.commit(before);

      this.container.logger.info({ swapId, buyer: swap.buyer, reference: swap.reference }, 'Unsettled swap resolved');
      this.deps.eventBus.emit({
        id: randomUUID(),
        type: 'SWAP_RESOLVED',
        timestamp: this.container.clock(),
        swapId,
        buyer: swap.buyer,
      });
      return swap;
    });
  }

  private changeSetting(caller: string, key: SettingKey, value: string): Promise<void> {
    return this.exclusive(caller, async () => {
      const { state } = this.deps;
      const previous = state.settings[key];
      const before = state.toSnapshot();
      state.settings[key] = value;
      await this.commit(before);

      this.container.logger.info({ setting: key, previous, value }, 'Engine setting changed');
      this.deps.eventBus.emit({
        id: randomUUID(),
        type: 'SETTINGS_CHANGED',
        timestamp: this.container.clock(),
        setting: key,
        value,
      });
    });
  }

  private async transferOut(amount: bigint, recipient: string, purpose: string): Promise<void> {
    try {
      await this.deps.lockedAsset.transfer(recipient, amount);
    } catch (err) {
      this.container.logger.error({ err, amount: amount.toString(), recipient }, `Transfer for ${purpose} failed`);
      throw new EngineError('TransferFailed', `Transfer for ${purpose} failed: ${describeError(err)}`, {
        context: { recipient, amount: amount.toString() },
        cause: err,
      });
    }
  }

  private async commit(before: EngineSnapshot): Promise<void> {
    await this.deps.snapshots?.commit(this.deps.state, before);
  }

  /** Admin check, then the task inside the engine's exclusive section, then a checkpoint. */
  private exclusive<T>(caller: string, task: () => Promise<T>): Promise<T> {
    const { state, access, snapshots } = this.deps;
    return state.executor.runExclusive(async () => {
      access.require(caller, 'ADMIN');
      try {
        return await task();
      } finally {
        await snapshots?.checkpoint(state);
      }
    });
  }
}
