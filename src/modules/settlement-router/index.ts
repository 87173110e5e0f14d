export { SettlementRouter } from './settlement-router.service.js';
export type { SettlementRouterDeps } from './settlement-router.service.js';
export { DeliveryGuard } from './delivery-guard.service.js';
