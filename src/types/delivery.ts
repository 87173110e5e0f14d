import type { PositionId } from './position.js';

export type DeliveryKind = 'REDEMPTION' | 'EXPIRY_REFUND';

export type DeliveryPath = 'LOCAL' | 'BRIDGE';

export interface DeliveryRequest {
  amount: bigint;
  destination: string;
  routeData: string;
  recipient: string;
}

export interface DeliveryReceipt {
  path: DeliveryPath;
  networkId: number;
  reference: string | null;
}

export interface PendingDelivery extends DeliveryRequest {
  id: string;
  kind: DeliveryKind;
  positionId: PositionId;
  errorCode: 'TransferFailed' | 'BridgeFailed';
  errorMessage: string;
  attempts: number;
  createdAt: number;
  lastAttemptAt: number;
}

/**
 * A purchase whose swap may have executed at the venue but whose output could
 * not be measured. The deposit stays with the venue until an operator settles it.
 */
export interface UnsettledSwap {
  id: string;
  buyer: string;
  depositAmount: bigint;
  pair: string;
  reference: string | null;
  errorMessage: string;
  createdAt: number;
}
