/**
 * Contracts of the external systems the engine drives. Production wiring binds
 * them to Solana programs; tests bind them to in-memory fakes.
 */

/** Fungible asset held in custody. Every failure is raised, never returned. */
export interface CustodyAsset {
  readonly mint: string;
  transferFrom(owner: string, to: string, amount: bigint): Promise<void>;
  transfer(to: string, amount: bigint): Promise<void>;
  approve(spender: string, amount: bigint): Promise<void>;
  balanceOf(holder: string): Promise<bigint>;
}

export interface SwapOrder {
  pair: string;
  amountIn: bigint;
  minAmountOut: bigint;
  // 0 accepts the venue's current price; protection comes from minAmountOut.
  priceLimit: bigint;
}

/** Signed deltas from the custody's point of view: negative is paid, positive received. */
export interface BalanceDelta {
  deposit: bigint;
  locked: bigint;
}

/**
 * Called by the venue with the deltas it is about to apply. Throwing makes the
 * venue abandon the swap without moving funds.
 */
export type SettleCallback = (delta: BalanceDelta) => void;

export interface ExecutionVenue {
  spenderFor(pair: string): string;
  quoteExactInput(pair: string, amountIn: bigint): Promise<bigint>;
  /**
   * Throws `SwapSettlementUnknown` once the swap may have reached the venue
   * but its outcome cannot be established.
   */
  swapExactInput(order: SwapOrder, settle: SettleCallback): Promise<BalanceDelta>;
}

export interface BridgeOrder {
  networkId: number;
  amount: bigint;
  recipient: string;
  routeData: string;
}

export interface BridgeReceipt {
  accepted: boolean;
  reference: string | null;
  reason?: string;
}

export interface BridgeVenue {
  /** Identity that must be allowed to spend the locked asset before `dispatch`. */
  spenderFor(target: string): string;
  /** Throws when `dispatch` could never accept this order. Touches nothing. */
  validate(target: string, order: BridgeOrder): void;
  dispatch(target: string, order: BridgeOrder): Promise<BridgeReceipt>;
}

export interface LocalTransferAgent {
  readonly address: string;
  /** Throws when `recipient` cannot receive on the local network. Touches nothing. */
  validateRecipient(recipient: string): void;
  deliver(amount: bigint, recipient: string): Promise<void>;
}
