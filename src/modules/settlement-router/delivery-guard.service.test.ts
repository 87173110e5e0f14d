import { describe, it, expect, beforeEach } from 'vitest';
import { CUSTODY, createTestEngine } from '../../testing/fakes.js';
import type { TestEngine } from '../../testing/fakes.js';
import type { DeliveryRequest } from '../../types/delivery.js';

describe('DeliveryGuard', () => {
  let engine: TestEngine;
  const request: DeliveryRequest = {
    amount: 400_000_000n,
    destination: 'arbitrum',
    routeData: '0x01',
    recipient: '0xrecipient',
  };

  beforeEach(() => {
    engine = createTestEngine();
    engine.state.destinations.register('arbitrum', 42161);
    engine.lockedAsset.fund(CUSTODY, 1_000_000_000n);
  });

  it('passes a successful delivery straight through', async () => {
    const receipt = await engine.deliveries.deliver('REDEMPTION', 1, request);

    expect(receipt.path).toBe('BRIDGE');
    expect(engine.deliveries.list()).toEqual([]);
  });

  it('parks a failed delivery and raises a committed error', async () => {
    engine.bridge.accept = false;

    const err: unknown = await engine.deliveries.deliver('REDEMPTION', 1, request).catch((e: unknown) => e);

    expect(err).toMatchObject({ code: 'BridgeFailed', committed: true });
    const [pending] = engine.deliveries.list();
    expect(pending).toMatchObject({
      kind: 'REDEMPTION',
      positionId: 1,
      amount: 400_000_000n,
      recipient: '0xrecipient',
      errorCode: 'BridgeFailed',
      attempts: 1,
    });
    expect(err).toMatchObject({ context: expect.objectContaining({ deliveryId: pending?.id }) });
    expect(engine.events.map((e) => e.type)).toEqual(['DELIVERY_STUCK']);
  });

  it('classifies unknown failures by destination', async () => {
    const err: unknown = await engine.deliveries
      .deliver('EXPIRY_REFUND', 2, { ...request, destination: 'solana' }, async () => {
        throw new Error('account frozen');
      })
      .catch((e: unknown) => e);

    expect(err).toMatchObject({ code: 'TransferFailed', message: 'Delivery failed: account frozen' });
  });

  it('retry settles the delivery once the path recovers', async () => {
    engine.bridge.accept = false;
    await engine.deliveries.deliver('REDEMPTION', 1, request).catch(() => undefined);
    const [pending] = engine.deliveries.list();
    const id = pending?.id ?? '';

    await expect(engine.deliveries.retry(id)).rejects.toMatchObject({ code: 'BridgeFailed', committed: true });
    expect(engine.deliveries.list()[0]?.attempts).toBe(2);

    engine.bridge.accept = true;
    await expect(engine.deliveries.retry(id)).resolves.toEqual({
      path: 'BRIDGE',
      networkId: 42161,
      reference: 'bridge-tx-1',
    });
    expect(engine.deliveries.list()).toEqual([]);
    expect(engine.events.at(-1)).toMatchObject({ type: 'DELIVERY_SETTLED', resolution: 'RETRIED' });
  });

  it('retry takes the record out of state before sending and restores it on failure', async () => {
    engine.bridge.accept = false;
    await engine.deliveries.deliver('REDEMPTION', 1, request).catch(() => undefined);
    const id = engine.deliveries.list()[0]?.id ?? '';
    const seen: number[] = [];

    await expect(
      engine.deliveries.retry(id, async () => {
        seen.push(engine.deliveries.list().length);
      }),
    ).rejects.toMatchObject({ code: 'BridgeFailed' });

    expect(seen).toEqual([0]);
    expect(engine.deliveries.list()).toMatchObject([{ id, attempts: 2 }]);
  });

  it('retry moves nothing when the pre-send hook fails', async () => {
    engine.bridge.accept = false;
    await engine.deliveries.deliver('REDEMPTION', 1, request).catch(() => undefined);
    const id = engine.deliveries.list()[0]?.id ?? '';
    engine.bridge.accept = true;

    await expect(
      engine.deliveries.retry(id, async () => {
        throw new Error('store unavailable');
      }),
    ).rejects.toThrow('store unavailable');
    expect(engine.bridge.orders).toEqual([]);
  });

  it('resolve drops the record without delivering', async () => {
    engine.bridge.accept = false;
    await engine.deliveries.deliver('REDEMPTION', 1, request).catch(() => undefined);
    const id = engine.deliveries.list()[0]?.id ?? '';

    expect(engine.deliveries.resolve(id).positionId).toBe(1);
    expect(engine.deliveries.list()).toEqual([]);
    expect(engine.bridge.orders).toEqual([]);
  });

  it('reports unknown delivery ids', async () => {
    await expect(engine.deliveries.retry('missing')).rejects.toMatchObject({ code: 'NotFound' });
    expect(() => engine.deliveries.resolve('missing')).toThrow(expect.objectContaining({ code: 'NotFound' }));
  });
});
