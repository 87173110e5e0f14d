export const BPS_DENOMINATOR = 10_000n;

// Deducted from the gross swap output at purchase.
export const PROTOCOL_FEE_BPS = 50n;

// Deducted from the remaining balance when an expired position is claimed back.
export const EXPIRY_REFUND_FEE_BPS = 200n;

// Ceiling used to derive a minimum output when the operator supplies none.
export const MAX_SLIPPAGE_BPS = 300n;

export const SNAPSHOT_KEY = 'gas-reserve:engine:snapshot';
