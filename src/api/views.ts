import type { PendingDelivery, PositionView, UnsettledSwap } from '../types/index.js';
import type {
  ClaimReceipt,
  PurchaseReceipt,
  RedeemReceipt,
} from '../modules/orchestrator/orchestrator.service.js';

// Amounts leave the API as decimal strings of base units.

export function positionView(position: PositionView) {
  return {
    id: position.id,
    holder: position.holder,
    initialLockedAmount: position.initialLockedAmount.toString(),
    remainingAmount: position.remainingAmount.toString(),
    unitPrice: position.unitPrice.toString(),
    availableUnits: position.availableUnits.toString(),
    destination: position.destination,
    createdAt: position.createdAt,
    expiresAt: position.expiresAt,
    closed: position.closed,
  };
}

export function purchaseView(receipt: PurchaseReceipt) {
  return {
    positionId: receipt.positionId,
    buyer: receipt.buyer,
    depositAmount: receipt.depositAmount.toString(),
    grossLockedAmount: receipt.grossLockedAmount.toString(),
    netLockedAmount: receipt.netLockedAmount.toString(),
    protocolFee: receipt.protocolFee.toString(),
    expiresAt: receipt.expiresAt,
  };
}

export function redeemView(receipt: RedeemReceipt) {
  return {
    positionId: receipt.positionId,
    amount: receipt.amount.toString(),
    remainingAmount: receipt.remainingAmount.toString(),
    closed: receipt.closed,
    partial: receipt.partial,
    delivery: receipt.delivery,
  };
}

export function claimView(receipt: ClaimReceipt) {
  return {
    positionId: receipt.positionId,
    holder: receipt.holder,
    refund: receipt.refund.toString(),
    fee: receipt.fee.toString(),
  };
}

export function pendingDeliveryView(delivery: PendingDelivery) {
  return { ...delivery, amount: delivery.amount.toString() };
}

export function unsettledSwapView(swap: UnsettledSwap) {
  return { ...swap, depositAmount: swap.depositAmount.toString() };
}
