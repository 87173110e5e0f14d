import { EngineError } from '../../services/engine-error.js';

export interface Destination {
  name: string;
  networkId: number;
}

/** Append-only map of destination name to numeric network id. */
export class DestinationRegistry {
  private readonly destinations: Map<string, number> = new Map();
  readonly local: Readonly<Destination>;

  constructor(local: Destination) {
    this.local = { ...local };
    this.destinations.set(local.name, local.networkId);
  }

  register(name: string, networkId: number): Destination {
    if (name.length === 0) {
      throw new EngineError('InvalidDestination', 'Destination name must not be empty');
    }
    if (!Number.isSafeInteger(networkId) || networkId < 0) {
      throw new EngineError('InvalidDestination', `Network id ${networkId} is not a non-negative integer`, {
        context: { name, networkId },
      });
    }
    const existing = this.destinations.get(name);
    if (existing !== undefined) {
      throw new EngineError('DuplicateDestination', `Destination ${name} is already registered`, {
        context: { name, networkId: existing },
      });
    }

    this.destinations.set(name, networkId);
    return { name, networkId };
  }

  has(name: string): boolean {
    return this.destinations.has(name);
  }

  resolve(name: string): number {
    const networkId = this.destinations.get(name);
    if (networkId === undefined) {
      throw new EngineError('InvalidDestination', `Destination ${name} is not registered`, {
        context: { destination: name },
      });
    }
    return networkId;
  }

  isLocal(name: string): boolean {
    return this.resolve(name) === this.local.networkId;
  }

  list(): Destination[] {
    return Array.from(this.destinations.entries()).map(([name, networkId]) => ({ name, networkId }));
  }

  restore(entries: Destination[]): void {
    for (const entry of entries) {
      const existing = this.destinations.get(entry.name);
      if (existing !== undefined && existing !== entry.networkId) {
        throw new Error(
          `Snapshot maps destination ${entry.name} to ${entry.networkId}, configured as ${existing}`,
        );
      }
      this.destinations.set(entry.name, entry.networkId);
    }
  }
}
