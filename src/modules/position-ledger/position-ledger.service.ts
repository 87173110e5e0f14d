import { EngineError } from '../../services/engine-error.js';
import type { DestinationRegistry } from '../destination-registry/destination-registry.service.js';
import type {
  CreatePositionInput,
  LedgerTotals,
  Position,
  PositionId,
} from '../../types/position.js';

export interface LedgerSnapshot {
  nextId: number;
  accumulatedFees: bigint;
  positions: Position[];
}

/**
 * Owns every position record and the protocol fee accumulator.
 *
 * Closed positions (remaining 0) stay readable but reject every mutation
 * with `NotFound`.
 */
export class PositionLedger {
  private readonly destinations: DestinationRegistry;
  private readonly positions: Map<PositionId, Position> = new Map();
  private nextId = 1;
  private fees = 0n;

  constructor(destinations: DestinationRegistry) {
    this.destinations = destinations;
  }

  assertCreatable(destination: string, expiresAt: number, now: number): void {
    if (!this.destinations.has(destination)) {
      throw new EngineError('InvalidDestination', `Destination ${destination} is not registered`, {
        context: { destination },
      });
    }
    if (expiresAt <= now) {
      throw new EngineError('InvalidExpiry', 'Expiry must lie in the future', {
        context: { expiresAt, now },
      });
    }
  }

  create(input: CreatePositionInput, now: number): PositionId {
    this.assertCreatable(input.destination, input.expiresAt, now);
    if (input.initialLockedAmount <= 0n) {
      throw new EngineError('ZeroAmount', 'Locked amount must be positive');
    }

    const id = this.nextId;
    this.nextId += 1;

    this.positions.set(id, {
      id,
      initialLockedAmount: input.initialLockedAmount,
      remainingAmount: input.initialLockedAmount,
      unitPrice: input.unitPrice,
      createdAt: now,
      expiresAt: input.expiresAt,
      destination: input.destination,
    });

    return id;
  }

  /** Runs every check `decrement` applies, without mutating. */
  assertDecrementable(id: PositionId, amount: bigint, now: number): void {
    this.checkDecrement(id, amount, now);
  }

  /** Returns true when the decrement closed the position. */
  decrement(id: PositionId, amount: bigint, now: number): boolean {
    const position = this.checkDecrement(id, amount, now);
    position.remainingAmount -= amount;
    return position.remainingAmount === 0n;
  }

  private checkDecrement(id: PositionId, amount: bigint, now: number): Position {
    const position = this.requireOpen(id);

    if (now >= position.expiresAt) {
      throw new EngineError('Expired', `Position ${id} expired`, {
        context: { positionId: id, expiresAt: position.expiresAt, now },
      });
    }
    if (amount <= 0n) {
      throw new EngineError('ZeroAmount', 'Redemption amount must be positive', {
        context: { positionId: id },
      });
    }
    if (amount > position.remainingAmount) {
      throw new EngineError('InsufficientRemaining', `Position ${id} holds less than requested`, {
        context: {
          positionId: id,
          requested: amount.toString(),
          remaining: position.remainingAmount.toString(),
        },
      });
    }
    return position;
  }

  closeForExpiry(id: PositionId, now: number): bigint {
    const position = this.positions.get(id);
    if (!position) {
      throw new EngineError('NotFound', `Position ${id} not found`, { context: { positionId: id } });
    }
    if (now < position.expiresAt) {
      throw new EngineError('NotYetExpired', `Position ${id} has not expired`, {
        context: { positionId: id, expiresAt: position.expiresAt, now },
      });
    }
    if (position.remainingAmount === 0n) {
      throw new EngineError('ZeroAmount', `Position ${id} has nothing left to claim`, {
        context: { positionId: id },
      });
    }

    const remaining = position.remainingAmount;
    position.remainingAmount = 0n;
    return remaining;
  }

  get(id: PositionId): Readonly<Position> | undefined {
    return this.positions.get(id);
  }

  isOpen(id: PositionId): boolean {
    const position = this.positions.get(id);
    return position !== undefined && position.remainingAmount > 0n;
  }

  availableUnits(id: PositionId): bigint {
    const position = this.positions.get(id);
    if (!position || position.unitPrice === 0n) return 0n;
    return position.remainingAmount / position.unitPrice;
  }

  // --- Fee accumulator ---

  get accumulatedFees(): bigint {
    return this.fees;
  }

  recordFee(amount: bigint): void {
    if (amount < 0n) {
      throw new Error(`Fee amount must not be negative: ${amount}`);
    }
    this.fees += amount;
  }

  /** Zeroes the accumulator and returns what it held. */
  sweepFees(): bigint {
    const swept = this.fees;
    this.fees = 0n;
    return swept;
  }

  totals(): LedgerTotals {
    let totalInitial = 0n;
    let totalRemaining = 0n;
    let openPositions = 0;

    for (const position of this.positions.values()) {
      totalInitial += position.initialLockedAmount;
      totalRemaining += position.remainingAmount;
      if (position.remainingAmount > 0n) openPositions += 1;
    }

    return {
      totalInitial,
      totalRemaining,
      openPositions,
      closedPositions: this.positions.size - openPositions,
    };
  }

  snapshot(): LedgerSnapshot {
    return {
      nextId: this.nextId,
      accumulatedFees: this.fees,
      positions: Array.from(this.positions.values()).map((p) => ({ ...p })),
    };
  }

  restore(snapshot: LedgerSnapshot): void {
    this.positions.clear();
    for (const position of snapshot.positions) {
      if (position.remainingAmount < 0n || position.remainingAmount > position.initialLockedAmount) {
        throw new Error(`Snapshot position ${position.id} violates 0 <= remaining <= initial`);
      }
      if (position.id >= snapshot.nextId) {
        throw new Error(`Snapshot position ${position.id} is not below next id ${snapshot.nextId}`);
      }
      this.positions.set(position.id, { ...position });
    }
    this.nextId = snapshot.nextId;
    this.fees = snapshot.accumulatedFees;
  }

  private requireOpen(id: PositionId): Position {
    const position = this.positions.get(id);
    if (!position || position.remainingAmount === 0n) {
      throw new EngineError('NotFound', `Position ${id} not found or closed`, {
        context: { positionId: id },
      });
    }
    return position;
  }
}
