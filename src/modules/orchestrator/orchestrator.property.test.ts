import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { isEngineError } from '../../services/engine-error.js';
import { ADMIN, CUSTODY, OPERATOR, createTestEngine } from '../../testing/fakes.js';
import type { TestEngine } from '../../testing/fakes.js';
import type { PositionId } from '../../types/position.js';

const HOUR = 3_600_000;
const DESTINATIONS = ['solana', 'arbitrum'] as const;
const RECIPIENTS = { solana: 'alice-wallet', arbitrum: '0xrecipient' } as const;

type Command =
  | { kind: 'purchase'; deposit: bigint; destination: 0 | 1; ttlHours: number }
  | { kind: 'redeem'; pick: number; percent: number }
  | { kind: 'advance'; hours: number }
  | { kind: 'claim'; pick: number }
  | { kind: 'sweep' }
  | { kind: 'bridge'; accept: boolean }
  | { kind: 'retry'; pick: number };

const command: fc.Arbitrary<Command> = fc.oneof(
  fc.record({
    kind: fc.constant('purchase' as const),
    deposit: fc.bigInt({ min: 1n, max: 1_000n }),
    destination: fc.constantFrom(0 as const, 1 as const),
    ttlHours: fc.integer({ min: 1, max: 72 }),
  }),
  fc.record({
    kind: fc.constant('redeem' as const),
    pick: fc.nat(),
    percent: fc.integer({ min: 1, max: 100 }),
  }),
  fc.record({ kind: fc.constant('advance' as const), hours: fc.integer({ min: 1, max: 48 }) }),
  fc.record({ kind: fc.constant('claim' as const), pick: fc.nat() }),
  fc.record({ kind: fc.constant('sweep' as const) }),
  fc.record({ kind: fc.constant('bridge' as const), accept: fc.boolean() }),
  fc.record({ kind: fc.constant('retry' as const), pick: fc.nat() }),
);

interface Books {
  initial: Map<PositionId, bigint>;
  redeemed: Map<PositionId, bigint>;
  claimed: Map<PositionId, bigint>;
  protocolFees: bigint;
  expiryFees: bigint;
  swept: bigint;
}

function add(map: Map<PositionId, bigint>, id: PositionId, amount: bigint): void {
  map.set(id, (map.get(id) ?? 0n) + amount);
}

function openPositions(engine: TestEngine, books: Books): PositionId[] {
  return Array.from(books.initial.keys()).filter((id) => engine.state.tokens.ownerOf(id) !== null);
}

/** Engine errors raised before any mutation are expected; anything else fails the run. */
async function attempt<T>(run: () => Promise<T>): Promise<T | undefined> {
  try {
    return await run();
  } catch (err) {
    if (isEngineError(err) && !err.committed) return undefined;
    throw err;
  }
}

async function apply(engine: TestEngine, books: Books, step: Command): Promise<void> {
  const { orchestrator, admin, clock } = engine;

  switch (step.kind) {
    case 'purchase': {
      const receipt = await attempt(() =>
        orchestrator.purchase(OPERATOR, {
          buyer: 'alice',
          depositAmount: step.deposit,
          minOutputAmount: null,
          unitPrice: 1n,
          destination: DESTINATIONS[step.destination],
          expiresAt: clock.now + step.ttlHours * HOUR,
        }),
      );
      if (receipt) {
        books.initial.set(receipt.positionId, receipt.netLockedAmount);
        books.protocolFees += receipt.protocolFee;
      }
      return;
    }
    case 'redeem': {
      const open = openPositions(engine, books);
      const id = open[step.pick % open.length];
      if (id === undefined) return;
      const position = orchestrator.getPosition(id);
      const share = (position.remainingAmount * BigInt(step.percent)) / 100n;
      const amount = share > 0n ? share : position.remainingAmount;
      const destination = position.destination === 'arbitrum' ? 'arbitrum' : 'solana';

      try {
        await orchestrator.redeem(OPERATOR, {
          positionId: id,
          amount,
          recipient: RECIPIENTS[destination],
          routeData: '',
        });
        add(books.redeemed, id, amount);
      } catch (err) {
        if (!isEngineError(err)) throw err;
        // A committed failure keeps the debit and parks the delivery.
        if (err.committed) add(books.redeemed, id, amount);
      }
      return;
    }
    case 'advance':
      clock.advance(step.hours * HOUR);
      return;
    case 'claim': {
      const open = openPositions(engine, books);
      const id = open[step.pick % open.length];
      if (id === undefined) return;
      const receipt = await attempt(() => orchestrator.claimExpired('alice', id));
      if (receipt) {
        add(books.claimed, id, receipt.refund + receipt.fee);
        books.expiryFees += receipt.fee;
      }
      return;
    }
    case 'sweep': {
      const amount = await attempt(() => admin.sweepFees(ADMIN, 'treasury'));
      if (amount !== undefined) books.swept += amount;
      return;
    }
    case 'bridge':
      engine.bridge.accept = step.accept;
      return;
    case 'retry': {
      const pending = admin.listPendingDeliveries(ADMIN);
      const delivery = pending[step.pick % Math.max(pending.length, 1)];
      if (!delivery) return;
      await admin.retryDelivery(ADMIN, delivery.id).catch((err: unknown) => {
        if (!isEngineError(err, 'BridgeFailed')) throw err;
      });
      return;
    }
  }
}

function assertConserved(engine: TestEngine, books: Books): void {
  const { ledger } = engine.state;
  let remaining = 0n;

  for (const [id, initial] of books.initial) {
    const left = ledger.get(id)?.remainingAmount ?? 0n;
    remaining += left;
    expect((books.redeemed.get(id) ?? 0n) + (books.claimed.get(id) ?? 0n) + left).toBe(initial);
  }

  expect(ledger.accumulatedFees).toBe(books.protocolFees + books.expiryFees - books.swept);

  const parked = engine.deliveries.list().reduce((sum, d) => sum + d.amount, 0n);
  expect(engine.lockedAsset.balance(CUSTODY)).toBe(remaining + ledger.accumulatedFees + parked);
}

describe('Orchestrator conservation properties', () => {
  it('accounts for every locked unit across random operation sequences', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.bigInt({ min: 1n, max: 10_000_000n }),
        fc.array(command, { minLength: 1, maxLength: 40 }),
        async (rate, commands) => {
          const engine = createTestEngine({ rate });
          engine.depositAsset.fund('alice', 1_000_000n);
          engine.state.destinations.register('arbitrum', 42161);
          const books: Books = {
            initial: new Map(),
            redeemed: new Map(),
            claimed: new Map(),
            protocolFees: 0n,
            expiryFees: 0n,
            swept: 0n,
          };

          for (const step of commands) {
            await apply(engine, books, step);
            assertConserved(engine, books);
          }
        },
      ),
      { numRuns: 150, seed: 20_261_019 },
    );
  });

  it('never lets a position be paid out beyond its initial amount', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(fc.integer({ min: 1, max: 100 }), { minLength: 1, maxLength: 20 }), async (percents) => {
        const engine = createTestEngine();
        engine.depositAsset.fund('alice', 1_000n);
        const receipt = await engine.orchestrator.purchase(OPERATOR, {
          buyer: 'alice',
          depositAmount: 7n,
          minOutputAmount: null,
          unitPrice: 1n,
          destination: 'solana',
          expiresAt: engine.clock.now + HOUR,
        });

        for (const percent of percents) {
          const requested = (receipt.netLockedAmount * BigInt(percent)) / 100n;
          await attempt(() =>
            engine.orchestrator.redeem(OPERATOR, {
              positionId: receipt.positionId,
              amount: requested,
              recipient: 'alice-wallet',
              routeData: '',
            }),
          );
        }

        expect(engine.lockedAsset.balance('alice-wallet')).toBeLessThanOrEqual(receipt.netLockedAmount);
        expect(engine.lockedAsset.balance('alice-wallet') + (engine.state.ledger.get(1)?.remainingAmount ?? 0n)).toBe(
          receipt.netLockedAmount,
        );
      }),
      { numRuns: 100, seed: 7 },
    );
  });
});
