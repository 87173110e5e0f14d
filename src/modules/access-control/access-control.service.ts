import { EngineError } from '../../services/engine-error.js';
import type { PositionRegistry } from '../position-registry/position-registry.service.js';
import type { PositionId } from '../../types/position.js';

export type Role = 'ADMIN' | 'OPERATOR' | 'HOLDER';

export interface AccessCheckResult {
  granted: boolean;
  reason: string;
}

export interface RoleSource {
  readonly admin: string;
  operator(): string | null;
}

export class AccessControl {
  private readonly roles: RoleSource;
  private readonly registry: PositionRegistry;

  constructor(roles: RoleSource, registry: PositionRegistry) {
    this.roles = roles;
    this.registry = registry;
  }

  check(caller: string, role: Role, positionId?: PositionId): AccessCheckResult {
    switch (role) {
      case 'ADMIN':
        return caller === this.roles.admin
          ? { granted: true, reason: 'administrator' }
          : { granted: false, reason: 'caller is not the administrator' };
      case 'OPERATOR': {
        const operator = this.roles.operator();
        if (operator === null) {
          return { granted: false, reason: 'no operator is authorized' };
        }
        return caller === operator
          ? { granted: true, reason: 'authorized operator' }
          : { granted: false, reason: 'caller is not the authorized operator' };
      }
      case 'HOLDER': {
        if (positionId === undefined) {
          return { granted: false, reason: 'holder check needs a position id' };
        }
        const holder = this.registry.ownerOf(positionId);
        if (holder === null) {
          return { granted: false, reason: `position ${positionId} has no holder` };
        }
        return caller === holder
          ? { granted: true, reason: 'current holder' }
          : { granted: false, reason: `caller does not hold position ${positionId}` };
      }
      default:
        return { granted: false, reason: 'unknown role' };
    }
  }

  require(caller: string, role: Role, positionId?: PositionId): void {
    const result = this.check(caller, role, positionId);
    if (!result.granted) {
      throw new EngineError('AccessDenied', `Access denied: ${result.reason}`, {
        context: { caller, role, ...(positionId !== undefined && { positionId }) },
      });
    }
  }
}
