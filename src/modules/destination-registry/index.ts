export { DestinationRegistry } from './destination-registry.service.js';
export type { Destination } from './destination-registry.service.js';
