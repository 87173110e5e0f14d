import type { Container } from '../../infra/container.js';
import { EngineError, describeError, isEngineError } from '../../services/engine-error.js';
import type { DestinationRegistry } from '../destination-registry/destination-registry.service.js';
import type { EngineSettings } from '../engine-state/engine-state.service.js';
import type {
  BridgeReceipt,
  BridgeVenue,
  CustodyAsset,
  LocalTransferAgent,
} from '../../types/collaborators.js';
import type { DeliveryReceipt, DeliveryRequest } from '../../types/delivery.js';

export interface SettlementRouterDeps {
  destinations: DestinationRegistry;
  settings: Readonly<EngineSettings>;
  lockedAsset: CustodyAsset;
  localTransfer: LocalTransferAgent;
  bridge: BridgeVenue;
}

/**
 * Delivers locked asset to its destination. Callers commit the ledger debit
 * before calling; a failure here never rolls it back.
 */
export class SettlementRouter {
  private readonly container: Container;
  private readonly deps: SettlementRouterDeps;

  constructor(container: Container, deps: SettlementRouterDeps) {
    this.container = container;
    this.deps = deps;
  }

  isLocal(destination: string): boolean {
    return this.deps.destinations.isLocal(destination);
  }

  /**
   * Checks a delivery against its route without side effects, so a request
   * that could never be delivered is refused before the ledger is debited.
   */
  validate(request: DeliveryRequest): void {
    const { destinations, localTransfer, bridge, settings } = this.deps;
    const networkId = destinations.resolve(request.destination);
    const context = { destination: request.destination, recipient: request.recipient };

    try {
      if (destinations.isLocal(request.destination)) {
        localTransfer.validateRecipient(request.recipient);
        return;
      }
      if (settings.bridgeAddress === null) {
        throw new EngineError('BridgeNotConfigured', 'No bridge address is configured', { context });
      }
      bridge.validate(settings.bridgeAddress, {
        networkId,
        amount: request.amount,
        recipient: request.recipient,
        routeData: request.routeData,
      });
    } catch (err) {
      if (isEngineError(err)) throw err;
      throw new EngineError('InvalidRecipient', `Undeliverable request: ${describeError(err)}`, {
        context,
        cause: err,
      });
    }
  }

  async deliver(request: DeliveryRequest): Promise<DeliveryReceipt> {
    const networkId = this.deps.destinations.resolve(request.destination);

    if (this.deps.destinations.isLocal(request.destination)) {
      await this.deliverLocal(request);
      return { path: 'LOCAL', networkId, reference: null };
    }

    const reference = await this.deliverBridge(request, networkId);
    return { path: 'BRIDGE', networkId, reference };
  }

  private async deliverLocal(request: DeliveryRequest): Promise<void> {
    const { logger } = this.container;
    const { lockedAsset, localTransfer } = this.deps;

    try {
      await lockedAsset.approve(localTransfer.address, request.amount);
      await localTransfer.deliver(request.amount, request.recipient);
    } catch (err) {
      logger.error(
        { err, recipient: request.recipient, amount: request.amount.toString() },
        'Local delivery failed',
      );
      await this.revokeAllowance(localTransfer.address);
      throw new EngineError('TransferFailed', `Local transfer failed: ${describeError(err)}`, {
        context: { recipient: request.recipient, amount: request.amount.toString() },
        cause: err,
      });
    }

    logger.info(
      { recipient: request.recipient, amount: request.amount.toString() },
      'Delivered on local network',
    );
  }

  private async deliverBridge(request: DeliveryRequest, networkId: number): Promise<string | null> {
    const { logger } = this.container;
    const { lockedAsset, bridge, settings } = this.deps;

    const target = settings.bridgeAddress;
    if (target === null) {
      throw new EngineError('BridgeNotConfigured', 'No bridge address is configured', {
        context: { destination: request.destination },
      });
    }

    const context = {
      networkId,
      recipient: request.recipient,
      amount: request.amount.toString(),
    };

    const spender = bridge.spenderFor(target);
    let receipt: BridgeReceipt;
    try {
      await lockedAsset.approve(spender, request.amount);
      receipt = await bridge.dispatch(target, {
        networkId,
        amount: request.amount,
        recipient: request.recipient,
        routeData: request.routeData,
      });
    } catch (err) {
      logger.error({ err, ...context }, 'Bridge dispatch failed');
      await this.revokeAllowance(spender);
      throw new EngineError('BridgeFailed', `Bridge dispatch failed: ${describeError(err)}`, {
        context,
        cause: err,
      });
    }

    if (!receipt.accepted) {
      logger.error({ ...context, reason: receipt.reason }, 'Bridge rejected delivery');
      await this.revokeAllowance(spender);
      throw new EngineError('BridgeFailed', `Bridge rejected delivery: ${receipt.reason ?? 'no reason given'}`, {
        context,
      });
    }

    logger.info({ ...context, reference: receipt.reference }, 'Delivered through bridge');
    return receipt.reference;
  }

  /** Withdraws an allowance a failed delivery left unspent. The delivery error is what the caller sees. */
  private async revokeAllowance(spender: string): Promise<void> {
    try {
      await this.deps.lockedAsset.approve(spender, 0n);
    } catch (err) {
      this.container.logger.error({ err, spender }, 'Failed to revoke delivery allowance');
    }
  }
}
