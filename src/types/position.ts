export type PositionId = number;

export interface Position {
  id: PositionId;
  initialLockedAmount: bigint;
  remainingAmount: bigint;
  unitPrice: bigint;
  createdAt: number;
  expiresAt: number;
  destination: string;
}

export interface PositionView extends Position {
  holder: string | null;
  closed: boolean;
  availableUnits: bigint;
}

export interface CreatePositionInput {
  initialLockedAmount: bigint;
  unitPrice: bigint;
  destination: string;
  expiresAt: number;
}

export interface LedgerTotals {
  totalInitial: bigint;
  totalRemaining: bigint;
  openPositions: number;
  closedPositions: number;
}
