import { SerialExecutor } from '../../services/serial-executor.js';
import { DestinationRegistry, type Destination } from '../destination-registry/index.js';
import { PositionLedger } from '../position-ledger/index.js';
import { PositionRegistry } from '../position-registry/index.js';
import type { RoleSource } from '../access-control/access-control.service.js';
import type { PendingDelivery, UnsettledSwap } from '../../types/delivery.js';
import type { EngineSnapshot } from './engine-snapshot.js';

export interface EngineSettings {
  operator: string | null;
  venuePair: string | null;
  bridgeAddress: string | null;
}

export interface EngineStateOptions {
  admin: string;
  custody: string;
  local: Destination;
  settings?: Partial<EngineSettings>;
}

/**
 * The single owner of every piece of mutable engine state. Constructed once at
 * startup; flows reach the state only through the executor's exclusive section.
 */
export class EngineState implements RoleSource {
  readonly admin: string;
  readonly custody: string;
  readonly destinations: DestinationRegistry;
  readonly ledger: PositionLedger;
  readonly tokens: PositionRegistry;
  readonly executor: SerialExecutor;
  readonly settings: EngineSettings;
  readonly pendingDeliveries: Map<string, PendingDelivery> = new Map();
  readonly unsettledSwaps: Map<string, UnsettledSwap> = new Map();

  constructor(options: EngineStateOptions) {
    this.admin = options.admin;
    this.custody = options.custody;
    this.destinations = new DestinationRegistry(options.local);
    this.ledger = new PositionLedger(this.destinations);
    this.tokens = new PositionRegistry();
    this.executor = new SerialExecutor();
    this.settings = {
      operator: options.settings?.operator ?? null,
      venuePair: options.settings?.venuePair ?? null,
      bridgeAddress: options.settings?.bridgeAddress ?? null,
    };
  }

  operator(): string | null {
    return this.settings.operator;
  }

  toSnapshot(): EngineSnapshot {
    return {
      version: 1,
      ledger: this.ledger.snapshot(),
      tokens: this.tokens.snapshot(),
      destinations: this.destinations.list(),
      settings: { ...this.settings },
      pendingDeliveries: Array.from(this.pendingDeliveries.values()).map((d) => ({ ...d })),
      unsettledSwaps: Array.from(this.unsettledSwaps.values()).map((s) => ({ ...s })),
    };
  }

  restore(snapshot: EngineSnapshot): void {
    this.destinations.restore(snapshot.destinations);
    this.ledger.restore(snapshot.ledger);
    this.tokens.restore(snapshot.tokens);
    Object.assign(this.settings, snapshot.settings);
    this.pendingDeliveries.clear();
    for (const delivery of snapshot.pendingDeliveries) {
      this.pendingDeliveries.set(delivery.id, { ...delivery });
    }
    this.unsettledSwaps.clear();
    for (const swap of snapshot.unsettledSwaps) {
      this.unsettledSwaps.set(swap.id, { ...swap });
    }
  }
}
