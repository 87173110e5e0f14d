import { z } from 'zod';
import type { LedgerSnapshot } from '../position-ledger/position-ledger.service.js';
import type { HoldingEntry } from '../position-registry/position-registry.service.js';
import type { Destination } from '../destination-registry/destination-registry.service.js';
import type { PendingDelivery, UnsettledSwap } from '../../types/delivery.js';
import type { EngineSettings } from './engine-state.service.js';

export interface EngineSnapshot {
  version: 1;
  ledger: LedgerSnapshot;
  tokens: { holdings: HoldingEntry[]; retired: number[] };
  destinations: Destination[];
  settings: EngineSettings;
  pendingDeliveries: PendingDelivery[];
  unsettledSwaps: UnsettledSwap[];
}

const amount = z
  .string()
  .regex(/^\d+$/, 'Expected an unsigned integer string')
  .transform((v) => BigInt(v));

const positionId = z.number().int().positive();

const positionSchema = z.object({
  id: positionId,
  initialLockedAmount: amount,
  remainingAmount: amount,
  unitPrice: amount,
  createdAt: z.number().int(),
  expiresAt: z.number().int(),
  destination: z.string(),
});

const pendingDeliverySchema = z.object({
  id: z.string().uuid(),
  kind: z.enum(['REDEMPTION', 'EXPIRY_REFUND']),
  positionId,
  amount,
  destination: z.string(),
  routeData: z.string(),
  recipient: z.string(),
  errorCode: z.enum(['TransferFailed', 'BridgeFailed']),
  errorMessage: z.string(),
  attempts: z.number().int().min(1),
  createdAt: z.number().int(),
  lastAttemptAt: z.number().int(),
});

const unsettledSwapSchema = z.object({
  id: z.string().uuid(),
  buyer: z.string(),
  depositAmount: amount,
  pair: z.string(),
  reference: z.string().nullable(),
  errorMessage: z.string(),
  createdAt: z.number().int(),
});

const snapshotSchema = z.object({
  version: z.literal(1),
  ledger: z.object({
    nextId: positionId,
    accumulatedFees: amount,
    positions: z.array(positionSchema),
  }),
  tokens: z.object({
    holdings: z.array(z.object({ positionId, holder: z.string() })),
    retired: z.array(positionId),
  }),
  destinations: z.array(z.object({ name: z.string().min(1), networkId: z.number().int().min(0) })),
  settings: z.object({
    operator: z.string().nullable(),
    venuePair: z.string().nullable(),
    bridgeAddress: z.string().nullable(),
  }),
  pendingDeliveries: z.array(pendingDeliverySchema),
  // Absent from snapshots written before swaps could be left unsettled.
  unsettledSwaps: z.array(unsettledSwapSchema).default([]),
});

export function encodeSnapshot(snapshot: EngineSnapshot): string {
  return JSON.stringify(snapshot, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  );
}

export function decodeSnapshot(raw: string): EngineSnapshot {
  const parsed = snapshotSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Engine snapshot is invalid: ${issues}`);
  }
  return parsed.data;
}
