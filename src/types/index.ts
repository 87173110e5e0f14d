export type { PositionId, Position, PositionView, CreatePositionInput, LedgerTotals } from './position.js';
export type { EngineEventType, BaseEvent, EngineEvent, PositionPurchasedEvent, PositionRedeemedEvent, ExpiryClaimedEvent, PositionTransferredEvent, DeliveryStuckEvent, DeliverySettledEvent, FeesSweptEvent, EmergencySweepEvent, SwapUnsettledEvent, SwapResolvedEvent, SettingsChangedEvent, DestinationRegisteredEvent } from './events.js';
export type { CustodyAsset, SwapOrder, BalanceDelta, SettleCallback, ExecutionVenue, BridgeOrder, BridgeReceipt, BridgeVenue, LocalTransferAgent } from './collaborators.js';
export type { DeliveryKind, DeliveryPath, DeliveryRequest, DeliveryReceipt, PendingDelivery, UnsettledSwap } from './delivery.js';
