import { describe, it, expect } from 'vitest';
import { expiryRefundFee, protocolFee, splitFee } from './fee-policy.js';

describe('fee policy', () => {
  it('takes 0.5% of the gross swap output', () => {
    expect(protocolFee(1_000_000_000n)).toEqual({ fee: 5_000_000n, net: 995_000_000n });
  });

  it('takes 2% of the remaining balance on expiry', () => {
    expect(expiryRefundFee(1_000_000_000n)).toEqual({ fee: 20_000_000n, net: 980_000_000n });
  });

  it('rounds the fee down', () => {
    expect(protocolFee(199n)).toEqual({ fee: 0n, net: 199n });
    expect(protocolFee(201n)).toEqual({ fee: 1n, net: 200n });
  });

  it('always conserves the amount', () => {
    for (const amount of [0n, 1n, 333n, 10_001n, 987_654_321n]) {
      const { fee, net } = splitFee(amount, 137n);
      expect(fee + net).toBe(amount);
    }
  });
});
