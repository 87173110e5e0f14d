import { EngineError } from '../../services/engine-error.js';
import type { PositionId } from '../../types/position.js';

export interface HoldingEntry {
  positionId: PositionId;
  holder: string;
}

/**
 * Position identity tokens: exactly one holder per open position, none once
 * retired. Retired ids are never minted again.
 */
export class PositionRegistry {
  private readonly owners: Map<PositionId, string> = new Map();
  private readonly retired: Set<PositionId> = new Set();

  mint(positionId: PositionId, holder: string): void {
    if (this.owners.has(positionId) || this.retired.has(positionId)) {
      throw new Error(`Position token ${positionId} already minted`);
    }
    this.owners.set(positionId, holder);
  }

  burn(positionId: PositionId): string {
    const holder = this.requireHolder(positionId);
    this.owners.delete(positionId);
    this.retired.add(positionId);
    return holder;
  }

  ownerOf(positionId: PositionId): string | null {
    return this.owners.get(positionId) ?? null;
  }

  transfer(positionId: PositionId, from: string, to: string): void {
    const holder = this.requireHolder(positionId);
    if (holder !== from) {
      throw new EngineError('AccessDenied', `Caller does not hold position ${positionId}`, {
        context: { positionId },
      });
    }
    this.owners.set(positionId, to);
  }

  holdingsOf(holder: string): PositionId[] {
    const ids: PositionId[] = [];
    for (const [positionId, owner] of this.owners) {
      if (owner === holder) ids.push(positionId);
    }
    return ids.sort((a, b) => a - b);
  }

  snapshot(): { holdings: HoldingEntry[]; retired: PositionId[] } {
    return {
      holdings: Array.from(this.owners.entries()).map(([positionId, holder]) => ({ positionId, holder })),
      retired: Array.from(this.retired),
    };
  }

  restore(snapshot: { holdings: HoldingEntry[]; retired: PositionId[] }): void {
    this.owners.clear();
    this.retired.clear();
    for (const id of snapshot.retired) this.retired.add(id);
    for (const { positionId, holder } of snapshot.holdings) {
      if (this.retired.has(positionId)) {
        throw new Error(`Snapshot lists retired position ${positionId} as held`);
      }
      this.owners.set(positionId, holder);
    }
  }

  private requireHolder(positionId: PositionId): string {
    const holder = this.owners.get(positionId);
    if (holder === undefined) {
      throw new EngineError('NotFound', `Position token ${positionId} has no holder`, {
        context: { positionId },
      });
    }
    return holder;
  }
}
