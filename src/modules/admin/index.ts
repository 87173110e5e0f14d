export { AdminService } from './admin.service.js';
export type { AdminServiceDeps } from './admin.service.js';
