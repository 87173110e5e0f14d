import { BPS_DENOMINATOR, EXPIRY_REFUND_FEE_BPS, PROTOCOL_FEE_BPS } from '../../config/constants.js';

export interface FeeSplit {
  fee: bigint;
  net: bigint;
}

export function splitFee(amount: bigint, feeBps: bigint): FeeSplit {
  const fee = (amount * feeBps) / BPS_DENOMINATOR;
  return { fee, net: amount - fee };
}

export function protocolFee(grossOutput: bigint): FeeSplit {
  return splitFee(grossOutput, PROTOCOL_FEE_BPS);
}

export function expiryRefundFee(remaining: bigint): FeeSplit {
  return splitFee(remaining, EXPIRY_REFUND_FEE_BPS);
}
