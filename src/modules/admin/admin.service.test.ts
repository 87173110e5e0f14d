import { describe, it, expect, beforeEach } from 'vitest';
import { ADMIN, CUSTODY, OPERATOR, POOL, T0, createTestEngine } from '../../testing/fakes.js';
import { SNAPSHOT_KEY } from '../../config/constants.js';
import type { TestEngine } from '../../testing/fakes.js';

describe('AdminService', () => {
  let engine: TestEngine;

  async function purchase(destination = 'solana'): Promise<void> {
    await engine.orchestrator.purchase(OPERATOR, {
      buyer: 'alice',
      depositAmount: 100n,
      minOutputAmount: null,
      unitPrice: 1_000_000n,
      destination,
      expiresAt: T0 + 60_000,
    });
  }

  beforeEach(() => {
    engine = createTestEngine();
    engine.depositAsset.fund('alice', 1_000n);
  });

  it('rejects every entry point for non-admin callers', async () => {
    await expect(engine.admin.setOperator(OPERATOR, 'x')).rejects.toMatchObject({ code: 'AccessDenied' });
    await expect(engine.admin.setVenue(OPERATOR, 'x')).rejects.toMatchObject({ code: 'AccessDenied' });
    await expect(engine.admin.setBridge(OPERATOR, 'x')).rejects.toMatchObject({ code: 'AccessDenied' });
    await expect(engine.admin.registerDestination(OPERATOR, 'base', 8453)).rejects.toMatchObject({
      code: 'AccessDenied',
    });
    await expect(engine.admin.sweepFees(OPERATOR, 'treasury')).rejects.toMatchObject({ code: 'AccessDenied' });
    await expect(engine.admin.emergencySweep(OPERATOR, 1n, 'x')).rejects.toMatchObject({ code: 'AccessDenied' });
    expect(() => engine.admin.listPendingDeliveries(OPERATOR)).toThrow(
      expect.objectContaining({ code: 'AccessDenied' }),
    );
  });

  it('replaces the operator', async () => {
    await engine.admin.setOperator(ADMIN, 'operator-2');

    expect(engine.access.check(OPERATOR, 'OPERATOR').granted).toBe(false);
    expect(engine.access.check('operator-2', 'OPERATOR').granted).toBe(true);
    expect(engine.events.at(-1)).toMatchObject({ type: 'SETTINGS_CHANGED', setting: 'operator', value: 'operator-2' });
  });

  it('updates venue and bridge settings', async () => {
    await engine.admin.setVenue(ADMIN, 'pool-2');
    await engine.admin.setBridge(ADMIN, 'bridge-2');

    expect(engine.state.settings).toMatchObject({ venuePair: 'pool-2', bridgeAddress: 'bridge-2' });
  });

  it('registers destinations once', async () => {
    await expect(engine.admin.registerDestination(ADMIN, 'base', 8453)).resolves.toEqual({
      name: 'base',
      networkId: 8453,
    });
    await expect(engine.admin.registerDestination(ADMIN, 'base', 8453)).rejects.toMatchObject({
      code: 'DuplicateDestination',
    });
  });

  it('sweeps accumulated fees and zeroes the accumulator', async () => {
    await purchase();

    await expect(engine.admin.sweepFees(ADMIN, 'treasury')).resolves.toBe(5_000_000n);

    expect(engine.lockedAsset.balance('treasury')).toBe(5_000_000n);
    expect(engine.state.ledger.accumulatedFees).toBe(0n);
    expect(engine.lockedAsset.balance(CUSTODY)).toBe(995_000_000n);
    expect(engine.events.at(-1)).toEqual({
      id: expect.any(String),
      type: 'FEES_SWEPT',
      timestamp: T0,
      amount: '5000000',
      recipient: 'treasury',
    });
  });

  it('keeps fees when the sweep transfer fails', async () => {
    await purchase();
    engine.lockedAsset.failOn('transfer');

    await expect(engine.admin.sweepFees(ADMIN, 'treasury')).rejects.toMatchObject({ code: 'TransferFailed' });
    expect(engine.state.ledger.accumulatedFees).toBe(5_000_000n);
  });

  it('refuses to sweep nothing', async () => {
    await expect(engine.admin.sweepFees(ADMIN, 'treasury')).rejects.toMatchObject({ code: 'ZeroAmount' });
  });

  it('emergency sweep moves funds without touching the ledger', async () => {
    await purchase();

    await engine.admin.emergencySweep(ADMIN, 1_000n, 'rescue');

    expect(engine.lockedAsset.balance('rescue')).toBe(1_000n);
    expect(engine.state.ledger.get(1)?.remainingAmount).toBe(995_000_000n);
    expect(engine.events.at(-1)).toEqual({
      id: expect.any(String),
      type: 'EMERGENCY_SWEEP',
      timestamp: T0,
      amount: '1000',
      recipient: 'rescue',
    });
    expect(engine.events.some((e) => e.type === 'FEES_SWEPT')).toBe(false);
  });

  it('lists, retries and resolves stuck deliveries', async () => {
    await engine.admin.registerDestination(ADMIN, 'arbitrum', 42161);
    await purchase('arbitrum');
    engine.bridge.accept = false;
    await expect(
      engine.orchestrator.redeem(OPERATOR, { positionId: 1, amount: 400_000_000n, recipient: '0xr', routeData: '' }),
    ).rejects.toMatchObject({ committed: true });
    await expect(
      engine.orchestrator.redeem(OPERATOR, { positionId: 1, amount: 100_000_000n, recipient: '0xr', routeData: '' }),
    ).rejects.toMatchObject({ committed: true });

    const [first, second] = engine.admin.listPendingDeliveries(ADMIN);
    expect(first?.amount).toBe(400_000_000n);
    expect(second?.amount).toBe(100_000_000n);

    engine.bridge.accept = true;
    await expect(engine.admin.retryDelivery(ADMIN, first?.id ?? '')).resolves.toMatchObject({ path: 'BRIDGE' });
    await expect(engine.admin.resolveDelivery(ADMIN, second?.id ?? '')).resolves.toMatchObject({
      amount: 100_000_000n,
    });

    expect(engine.admin.listPendingDeliveries(ADMIN)).toEqual([]);
    expect(engine.bridge.orders.map((o) => o.amount)).toEqual([400_000_000n]);
  });

  it('lists and resolves swaps left unsettled', async () => {
    engine.venue.loseOutcome = true;
    await expect(purchase()).rejects.toMatchObject({ code: 'SwapUnsettled' });

    const [swap] = engine.admin.listUnsettledSwaps(ADMIN);
    expect(swap).toMatchObject({ buyer: 'alice', depositAmount: 100n, pair: POOL, reference: 'swap-tx-1' });

    await expect(engine.admin.resolveUnsettledSwap(ADMIN, swap?.id ?? '')).resolves.toEqual(swap);
    expect(engine.admin.listUnsettledSwaps(ADMIN)).toEqual([]);
    expect(engine.events.at(-1)).toMatchObject({ type: 'SWAP_RESOLVED', swapId: swap?.id, buyer: 'alice' });
    await expect(engine.admin.resolveUnsettledSwap(ADMIN, swap?.id ?? '')).rejects.toMatchObject({ code: 'NotFound' });
    expect(() => engine.admin.listUnsettledSwaps(OPERATOR)).toThrow(expect.objectContaining({ code: 'AccessDenied' }));
  });

  describe('with persistence', () => {
    beforeEach(() => {
      engine = createTestEngine({ withSnapshots: true });
      engine.depositAsset.fund('alice', 1_000n);
    });

    it('persists the zeroed fees before paying them out', async () => {
      await purchase();
      let persistedAtTransfer: string | undefined;
      const transfer = engine.lockedAsset.transfer.bind(engine.lockedAsset);
      engine.lockedAsset.transfer = async (to, amount) => {
        persistedAtTransfer = engine.redis.store.get(SNAPSHOT_KEY);
        await transfer(to, amount);
      };

      await engine.admin.sweepFees(ADMIN, 'treasury');

      expect(persistedAtTransfer).toContain('"accumulatedFees":"0"');
    });

    it('pays no fees when the zeroed accumulator cannot be persisted', async () => {
      await purchase();
      engine.redis.failWrites = true;

      await expect(engine.admin.sweepFees(ADMIN, 'treasury')).rejects.toMatchObject({ code: 'PersistenceFailed' });
      expect(engine.lockedAsset.balance('treasury')).toBe(0n);
      expect(engine.state.ledger.accumulatedFees).toBe(5_000_000n);
    });

    it('retries nothing when the settled delivery cannot be persisted', async () => {
      await engine.admin.registerDestination(ADMIN, 'arbitrum', 42161);
      await purchase('arbitrum');
      engine.bridge.accept = false;
      await expect(
        engine.orchestrator.redeem(OPERATOR, { positionId: 1, amount: 400_000_000n, recipient: '0xr', routeData: '' }),
      ).rejects.toMatchObject({ committed: true });
      const [pending] = engine.admin.listPendingDeliveries(ADMIN);
      engine.bridge.accept = true;
      engine.redis.failWrites = true;

      await expect(engine.admin.retryDelivery(ADMIN, pending?.id ?? '')).rejects.toMatchObject({
        code: 'PersistenceFailed',
      });
      expect(engine.bridge.orders).toEqual([]);
      expect(engine.admin.listPendingDeliveries(ADMIN)).toEqual([pending]);
    });

    it('keeps the previous setting when the change cannot be persisted', async () => {
      engine.redis.failWrites = true;

      await expect(engine.admin.setVenue(ADMIN, 'pool-2')).rejects.toMatchObject({ code: 'PersistenceFailed' });
      expect(engine.state.settings.venuePair).toBe(POOL);
    });
  });
});
