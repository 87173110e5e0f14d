export { PositionLedger } from './position-ledger.service.js';
export type { LedgerSnapshot } from './position-ledger.service.js';
export { splitFee, protocolFee, expiryRefundFee } from './fee-policy.js';
export type { FeeSplit } from './fee-policy.js';
