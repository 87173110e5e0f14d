export { PositionRegistry } from './position-registry.service.js';
export type { HoldingEntry } from './position-registry.service.js';
