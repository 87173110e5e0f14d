export { Orchestrator } from './orchestrator.service.js';
export type {
  OrchestratorDeps,
  PurchaseRequest,
  PurchaseReceipt,
  RedeemRequest,
  RedeemReceipt,
  ClaimReceipt,
} from './orchestrator.service.js';
