import { randomUUID } from 'node:crypto';
import type { Container } from '../../infra/container.js';
import type { EventBus } from '../../services/event-bus.js';
import { EngineError, describeError, isEngineError } from '../../services/engine-error.js';
import type { EngineState } from '../engine-state/engine-state.service.js';
import type { SettlementRouter } from './settlement-router.service.js';
import type { PositionId } from '../../types/position.js';
import type {
  DeliveryKind,
  DeliveryReceipt,
  DeliveryRequest,
  PendingDelivery,
} from '../../types/delivery.js';

type Send = () => Promise<DeliveryReceipt>;

/**
 * Runs post-commit deliveries. A failed delivery is parked as a pending
 * delivery and re-raised with `committed = true`; the ledger debit stays.
 */
export class DeliveryGuard {
  private readonly container: Container;
  private readonly state: EngineState;
  private readonly router: SettlementRouter;
  private readonly eventBus: EventBus;

  constructor(container: Container, state: EngineState, router: SettlementRouter, eventBus: EventBus) {
    this.container = container;
    this.state = state;
    this.router = router;
    this.eventBus = eventBus;
  }

  async deliver(
    kind: DeliveryKind,
    positionId: PositionId,
    request: DeliveryRequest,
    send: Send = () => this.router.deliver(request),
  ): Promise<DeliveryReceipt> {
    try {
      return await send();
    } catch (err) {
      const failure = this.toDeliveryError(err, request.destination);
      const now = this.container.clock();
      const pending: PendingDelivery = {
        ...request,
        id: randomUUID(),
        kind,
        positionId,
        errorCode: failure.code === 'BridgeFailed' ? 'BridgeFailed' : 'TransferFailed',
        errorMessage: failure.message,
        attempts: 1,
        createdAt: now,
        lastAttemptAt: now,
      };
      this.state.pendingDeliveries.set(pending.id, pending);

      this.container.logger.error(
        { deliveryId: pending.id, positionId, kind, amount: request.amount.toString(), errorCode: pending.errorCode },
        'Delivery failed after ledger commit, parked for remediation',
      );
      this.eventBus.emit({
        id: randomUUID(),
        type: 'DELIVERY_STUCK',
        timestamp: now,
        deliveryId: pending.id,
        kind,
        positionId,
        amount: request.amount.toString(),
        errorCode: pending.errorCode,
      });

      throw failure.asCommitted({ deliveryId: pending.id, positionId });
    }
  }

  list(): PendingDelivery[] {
    return Array.from(this.state.pendingDeliveries.values()).sort((a, b) => a.createdAt - b.createdAt);
  }

  /**
   * Sends a parked delivery again. The record leaves state, and `beforeSend`
   * gets to persist that, before any funds move; a failed send puts it back.
   */
  async retry(deliveryId: string, beforeSend: () => Promise<void> = async () => undefined): Promise<DeliveryReceipt> {
    const pending = this.require(deliveryId);
    const now = this.container.clock();

    this.state.pendingDeliveries.delete(deliveryId);
    await beforeSend();

    let receipt: DeliveryReceipt;
    try {
      receipt = await this.router.deliver(pending);
    } catch (err) {
      const failure = this.toDeliveryError(err, pending.destination);
      pending.attempts += 1;
      pending.lastAttemptAt = now;
      pending.errorMessage = failure.message;
      this.state.pendingDeliveries.set(deliveryId, pending);
      this.container.logger.warn(
        { deliveryId, attempts: pending.attempts, errorCode: failure.code },
        'Delivery retry failed',
      );
      throw failure.asCommitted({ deliveryId, positionId: pending.positionId });
    }

    this.settled(pending, 'RETRIED', now);
    return receipt;
  }

  /** Drops a pending delivery settled out of band. */
  resolve(deliveryId: string): PendingDelivery {
    const pending = this.require(deliveryId);
    this.state.pendingDeliveries.delete(deliveryId);
    this.settled(pending, 'RESOLVED', this.container.clock());
    return pending;
  }

  private settled(pending: PendingDelivery, resolution: 'RETRIED' | 'RESOLVED', now: number): void {
    this.container.logger.info(
      { deliveryId: pending.id, positionId: pending.positionId, resolution },
      'Pending delivery settled',
    );
    this.eventBus.emit({
      id: randomUUID(),
      type: 'DELIVERY_SETTLED',
      timestamp: now,
      deliveryId: pending.id,
      positionId: pending.positionId,
      resolution,
    });
  }

  private require(deliveryId: string): PendingDelivery {
    const pending = this.state.pendingDeliveries.get(deliveryId);
    if (!pending) {
      throw new EngineError('NotFound', `Pending delivery ${deliveryId} not found`, {
        context: { deliveryId },
      });
    }
    return pending;
  }

  private toDeliveryError(err: unknown, destination: string): EngineError {
    if (isEngineError(err, 'TransferFailed') || isEngineError(err, 'BridgeFailed')) {
      return err;
    }
    const code = this.state.destinations.isLocal(destination) ? 'TransferFailed' : 'BridgeFailed';
    return new EngineError(code, `Delivery failed: ${describeError(err)}`, {
      context: { destination },
      cause: err,
    });
  }
}
