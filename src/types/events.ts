import type { PositionId } from './position.js';
import type { DeliveryKind, DeliveryPath } from './delivery.js';

export type EngineEventType =
  | 'POSITION_PURCHASED'
  | 'POSITION_REDEEMED'
  | 'EXPIRY_CLAIMED'
  | 'POSITION_TRANSFERRED'
  | 'DELIVERY_STUCK'
  | 'DELIVERY_SETTLED'
  | 'FEES_SWEPT'
  | 'EMERGENCY_SWEEP'
  | 'SWAP_UNSETTLED'
  | 'SWAP_RESOLVED'
  | 'SETTINGS_CHANGED'
  | 'DESTINATION_REGISTERED';

export interface BaseEvent {
  id: string;
  type: EngineEventType;
  timestamp: number;
}

export interface PositionPurchasedEvent extends BaseEvent {
  type: 'POSITION_PURCHASED';
  positionId: PositionId;
  buyer: string;
  depositAmount: string;
  grossLockedAmount: string;
  netLockedAmount: string;
  protocolFee: string;
  unitPrice: string;
  destination: string;
  expiresAt: number;
}

export interface PositionRedeemedEvent extends BaseEvent {
  type: 'POSITION_REDEEMED';
  positionId: PositionId;
  holder: string;
  recipient: string;
  amount: string;
  remainingAmount: string;
  partial: boolean;
  path: DeliveryPath;
  reference: string | null;
}

export interface ExpiryClaimedEvent extends BaseEvent {
  type: 'EXPIRY_CLAIMED';
  positionId: PositionId;
  holder: string;
  refund: string;
  fee: string;
}

export interface PositionTransferredEvent extends BaseEvent {
  type: 'POSITION_TRANSFERRED';
  positionId: PositionId;
  from: string;
  to: string;
}

export interface DeliveryStuckEvent extends BaseEvent {
  type: 'DELIVERY_STUCK';
  deliveryId: string;
  kind: DeliveryKind;
  positionId: PositionId;
  amount: string;
  errorCode: string;
}

export interface DeliverySettledEvent extends BaseEvent {
  type: 'DELIVERY_SETTLED';
  deliveryId: string;
  positionId: PositionId;
  resolution: 'RETRIED' | 'RESOLVED';
}

export interface FeesSweptEvent extends BaseEvent {
  type: 'FEES_SWEPT';
  amount: string;
  recipient: string;
}

/** Locked asset moved out of custody by hand; the ledger is untouched. */
export interface EmergencySweepEvent extends BaseEvent {
  type: 'EMERGENCY_SWEEP';
  amount: string;
  recipient: string;
}

export interface SwapUnsettledEvent extends BaseEvent {
  type: 'SWAP_UNSETTLED';
  swapId: string;
  buyer: string;
  depositAmount: string;
  pair: string;
  reference: string | null;
}

export interface SwapResolvedEvent extends BaseEvent {
  type: 'SWAP_RESOLVED';
  swapId: string;
  buyer: string;
}

export interface SettingsChangedEvent extends BaseEvent {
  type: 'SETTINGS_CHANGED';
  setting: 'operator' | 'venuePair' | 'bridgeAddress';
  value: string;
}

export interface DestinationRegisteredEvent extends BaseEvent {
  type: 'DESTINATION_REGISTERED';
  name: string;
  networkId: number;
}

export type EngineEvent =
  | PositionPurchasedEvent
  | PositionRedeemedEvent
  | ExpiryClaimedEvent
  | PositionTransferredEvent
  | DeliveryStuckEvent
  | DeliverySettledEvent
  | FeesSweptEvent
  | EmergencySweepEvent
  | SwapUnsettledEvent
  | SwapResolvedEvent
  | SettingsChangedEvent
  | DestinationRegisteredEvent;
