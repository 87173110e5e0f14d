import { randomUUID } from 'node:crypto';
import type { Container } from '../../infra/container.js';
import type { EventBus } from '../../services/event-bus.js';
import type { SnapshotStore } from '../../services/snapshot-store.js';
import { UnitOfWork } from '../../services/unit-of-work.js';
import { EngineError, describeError, isEngineError } from '../../services/engine-error.js';
import type { EngineState } from '../engine-state/engine-state.service.js';
import type { AccessControl } from '../access-control/access-control.service.js';
import type { PriceExecutionAdapter } from '../price-execution/price-execution.service.js';
import type { SettlementRouter } from '../settlement-router/settlement-router.service.js';
import type { DeliveryGuard } from '../settlement-router/delivery-guard.service.js';
import { expiryRefundFee, protocolFee } from '../position-ledger/index.js';
import type { CustodyAsset } from '../../types/collaborators.js';
import type { DeliveryReceipt, DeliveryRequest, UnsettledSwap } from '../../types/delivery.js';
import type { EngineSnapshot } from '../engine-state/engine-snapshot.js';
import type { PositionId, PositionView } from '../../types/position.js';

export interface OrchestratorDeps {
  state: EngineState;
  access: AccessControl;
  priceExecution: PriceExecutionAdapter;
  router: SettlementRouter;
  deliveries: DeliveryGuard;
  depositAsset: CustodyAsset;
  lockedAsset: CustodyAsset;
  eventBus: EventBus;
  snapshots?: SnapshotStore;
}

export interface PurchaseRequest {
  buyer: string;
  depositAmount: bigint;
  // null derives one from a venue quote and the max-slippage constant
  minOutputAmount: bigint | null;
  unitPrice: bigint;
  destination: string;
  expiresAt: number;
}

export interface PurchaseReceipt {
  positionId: PositionId;
  buyer: string;
  depositAmount: bigint;
  grossLockedAmount: bigint;
  netLockedAmount: bigint;
  protocolFee: bigint;
  expiresAt: number;
}

export interface RedeemRequest {
  positionId: PositionId;
  amount: bigint;
  recipient: string;
  routeData: string;
}

export interface RedeemReceipt {
  positionId: PositionId;
  amount: bigint;
  remainingAmount: bigint;
  closed: boolean;
  partial: boolean;
  delivery: DeliveryReceipt;
}

export interface ClaimReceipt {
  positionId: PositionId;
  holder: string;
  refund: bigint;
  fee: bigint;
}

/**
 * Public entry points of the engine. Each flow runs alone inside the state's
 * executor; steps before the ledger mutation are all-or-nothing, the mutation
 * is persisted before any payout, and delivery after it is not reversed.
 */
export class Orchestrator {
  private readonly container: Container;
  private readonly deps: OrchestratorDeps;

  constructor(container: Container, deps: OrchestratorDeps) {
    this.container = container;
    this.deps = deps;
  }

  purchase(caller: string, request: PurchaseRequest): Promise<PurchaseReceipt> {
    return this.deps.state.executor.runExclusive(() => this.runPurchase(caller, request));
  }

  redeem(caller: string, request: RedeemRequest): Promise<RedeemReceipt> {
    return this.deps.state.executor.runExclusive(() => this.runRedeem(caller, request));
  }

  claimExpired(caller: string, positionId: PositionId): Promise<ClaimReceipt> {
    return this.deps.state.executor.runExclusive(() => this.runClaimExpired(caller, positionId));
  }

  transferPosition(caller: string, positionId: PositionId, to: string): Promise<void> {
    return this.deps.state.executor.runExclusive(async () => {
      const { state, access, eventBus } = this.deps;

      this.requireHeld(positionId);
      access.require(caller, 'HOLDER', positionId);
      const before = state.toSnapshot();
      state.tokens.transfer(positionId, caller, to);
      await this.commit(before);

      this.container.logger.info({ positionId, from: caller, to }, 'Position transferred');
      eventBus.emit({
        id: randomUUID(),
        type: 'POSITION_TRANSFERRED',
        timestamp: this.container.clock(),
        positionId,
        from: caller,
        to,
      });
    });
  }

  getPosition(positionId: PositionId): PositionView {
    const { ledger, tokens } = this.deps.state;
    const position = ledger.get(positionId);
    if (!position) {
      throw new EngineError('NotFound', `Position ${positionId} not found`, { context: { positionId } });
    }
    return {
      ...position,
      holder: tokens.ownerOf(positionId),
      closed: position.remainingAmount === 0n,
      availableUnits: ledger.availableUnits(positionId),
    };
  }

  listHoldings(holder: string): PositionView[] {
    return this.deps.state.tokens.holdingsOf(holder).map((id) => this.getPosition(id));
  }

  // --- Purchase ---

  private async runPurchase(caller: string, request: PurchaseRequest): Promise<PurchaseReceipt> {
    const { logger, clock } = this.container;
    const { state, access, priceExecution, depositAsset, eventBus } = this.deps;
    const { ledger, tokens, settings, custody } = state;

    access.require(caller, 'OPERATOR');
    if (request.depositAmount <= 0n) {
      throw new EngineError('ZeroAmount', 'Deposit amount must be positive');
    }
    const now = clock();
    ledger.assertCreatable(request.destination, request.expiresAt, now);

    const pair = settings.venuePair;
    if (pair === null) {
      throw new EngineError('VenueNotConfigured', 'No execution venue is configured');
    }

    const amount = request.depositAmount;
    const minOutput =
      request.minOutputAmount ??
      priceExecution.defaultMinOutput(await priceExecution.quoteExactInput(pair, amount));
    const spender = priceExecution.spenderFor(pair);

    const swap = () =>
      new UnitOfWork(logger).run(async (work) => {
        await work.step(
          'pull deposit',
          () => custodyCall('pull deposit', () => depositAsset.transferFrom(request.buyer, custody, amount)),
          () => depositAsset.transfer(request.buyer, amount),
        );
        await work.step(
          'approve venue',
          () => custodyCall('approve venue', () => depositAsset.approve(spender, amount)),
          () => depositAsset.approve(spender, 0n),
        );
        return work.step('swap', () => priceExecution.swapExactInput(pair, amount, minOutput));
      });
    const grossOutput = await this.withUnsettledSwaps(request.buyer, amount, pair, swap);

    const split = protocolFee(grossOutput);
    ledger.recordFee(split.fee);
    const positionId = ledger.create(
      {
        initialLockedAmount: split.net,
        unitPrice: request.unitPrice,
        destination: request.destination,
        expiresAt: request.expiresAt,
      },
      now,
    );
    tokens.mint(positionId, request.buyer);

    logger.info(
      {
        positionId,
        buyer: request.buyer,
        depositAmount: amount.toString(),
        netLockedAmount: split.net.toString(),
        protocolFee: split.fee.toString(),
      },
      'Position purchased',
    );
    eventBus.emit({
      id: randomUUID(),
      type: 'POSITION_PURCHASED',
      timestamp: now,
      positionId,
      buyer: request.buyer,
      depositAmount: amount.toString(),
      grossLockedAmount: grossOutput.toString(),
      netLockedAmount: split.net.toString(),
      protocolFee: split.fee.toString(),
      unitPrice: request.unitPrice.toString(),
      destination: request.destination,
      expiresAt: request.expiresAt,
    });
    await this.checkpoint();

    return {
      positionId,
      buyer: request.buyer,
      depositAmount: amount,
      grossLockedAmount: grossOutput,
      netLockedAmount: split.net,
      protocolFee: split.fee,
      expiresAt: request.expiresAt,
    };
  }

  // --- Redeem ---

  private async runRedeem(caller: string, request: RedeemRequest): Promise<RedeemReceipt> {
    const { logger, clock } = this.container;
    const { state, access, router, deliveries, eventBus } = this.deps;
    const { ledger, tokens } = state;
    const { positionId, amount } = request;

    access.require(caller, 'OPERATOR');
    const holder = this.requireHeld(positionId);
    const now = clock();

    ledger.assertDecrementable(positionId, amount, now);
    const position = this.getPosition(positionId);
    const order: DeliveryRequest = {
      amount,
      destination: position.destination,
      routeData: request.routeData,
      recipient: request.recipient,
    };
    router.validate(order);

    const before = state.toSnapshot();
    const closed = ledger.decrement(positionId, amount, now);
    if (closed) {
      tokens.burn(positionId);
    }
    await this.commit(before);
    const remainingAmount = position.remainingAmount - amount;
    const partial = !closed;

    let delivery: DeliveryReceipt;
    try {
      delivery = await deliveries.deliver('REDEMPTION', positionId, order);
    } finally {
      await this.checkpoint();
    }

    logger.info(
      { positionId, amount: amount.toString(), remainingAmount: remainingAmount.toString(), path: delivery.path },
      partial ? 'Position partially redeemed' : 'Position fully redeemed',
    );
    eventBus.emit({
      id: randomUUID(),
      type: 'POSITION_REDEEMED',
      timestamp: now,
      positionId,
      holder,
      recipient: request.recipient,
      amount: amount.toString(),
      remainingAmount: remainingAmount.toString(),
      partial,
      path: delivery.path,
      reference: delivery.reference,
    });

    return { positionId, amount, remainingAmount, closed, partial, delivery };
  }

  // --- Claim expired ---

  private async runClaimExpired(caller: string, positionId: PositionId): Promise<ClaimReceipt> {
    const { logger, clock } = this.container;
    const { state, access, router, deliveries, lockedAsset, eventBus } = this.deps;
    const { ledger, tokens, destinations } = state;
    const { local } = destinations;

    this.requireHeld(positionId);
    access.require(caller, 'HOLDER', positionId);
    const now = clock();
    router.validate({ amount: 0n, destination: local.name, routeData: '', recipient: caller });

    const before = state.toSnapshot();
    const remaining = ledger.closeForExpiry(positionId, now);
    const { fee, net: refund } = expiryRefundFee(remaining);
    ledger.recordFee(fee);
    tokens.burn(positionId);
    await this.commit(before);

    try {
      await deliveries.deliver(
        'EXPIRY_REFUND',
        positionId,
        { amount: refund, destination: local.name, routeData: '', recipient: caller },
        async () => {
          await lockedAsset.transfer(caller, refund);
          return { path: 'LOCAL', networkId: local.networkId, reference: null };
        },
      );
    } finally {
      await this.checkpoint();
    }

    logger.info(
      { positionId, holder: caller, refund: refund.toString(), fee: fee.toString() },
      'Expired position claimed back',
    );
    eventBus.emit({
      id: randomUUID(),
      type: 'EXPIRY_CLAIMED',
      timestamp: now,
      positionId,
      holder: caller,
      refund: refund.toString(),
      fee: fee.toString(),
    });

    return { positionId, holder: caller, refund, fee };
  }

  // --- Helpers ---

  private requireHeld(positionId: PositionId): string {
    const holder = this.deps.state.tokens.ownerOf(positionId);
    if (holder === null) {
      throw new EngineError('NotFound', `Position ${positionId} not found or closed`, {
        context: { positionId },
      });
    }
    return holder;
  }

  /**
   * A swap that may have consumed the deposit is recorded for the operator
   * instead of being unwound.
   */
  private async withUnsettledSwaps(
    buyer: string,
    depositAmount: bigint,
    pair: string,
    swap: () => Promise<bigint>,
  ): Promise<bigint> {
    try {
      return await swap();
    } catch (err) {
      if (!isEngineError(err, 'SwapUnsettled')) throw err;

      const reference = typeof err.context.reference === 'string' ? err.context.reference : null;
      const unsettled: UnsettledSwap = {
        id: randomUUID(),
        buyer,
        depositAmount,
        pair,
        reference,
        errorMessage: err.message,
        createdAt: this.container.clock(),
      };
      this.deps.state.unsettledSwaps.set(unsettled.id, unsettled);

      this.container.logger.error(
        { swapId: unsettled.id, buyer, depositAmount: depositAmount.toString(), pair, reference },
        'Swap outcome unknown, deposit held for operator settlement',
      );
      this.deps.eventBus.emit({
        id: randomUUID(),
        type: 'SWAP_UNSETTLED',
        timestamp: unsettled.createdAt,
        swapId: unsettled.id,
        buyer,
        depositAmount: depositAmount.toString(),
        pair,
        reference,
      });
      await this.checkpoint();

      throw err.asCommitted({ swapId: unsettled.id });
    }
  }

  private async commit(before: EngineSnapshot): Promise<void> {
    await this.deps.snapshots?.commit(this.deps.state, before);
  }

  private async checkpoint(): Promise<void> {
    await this.deps.snapshots?.checkpoint(this.deps.state);
  }
}

async function custodyCall(step: string, call: () => Promise<void>): Promise<void> {
  try {
    await call();
  } catch (err) {
    if (isEngineError(err)) throw err;
    throw new EngineError('TransferFailed', `Custody step "${step}" failed: ${describeError(err)}`, {
      context: { step },
      cause: err,
    });
  }
}
