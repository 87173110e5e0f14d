export { AccessControl } from './access-control.service.js';
export type { Role, AccessCheckResult, RoleSource } from './access-control.service.js';
