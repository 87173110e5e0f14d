/**
 * Engine error taxonomy.
 *
 * Validation failures are raised before any external call or state change.
 * Delivery failures (`TransferFailed`, `BridgeFailed`) raised after the ledger
 * mutation carry `committed = true`: the debit stands and the funds remain in
 * custody awaiting remediation. `SwapUnsettled` is always committed: the swap
 * was sent and its deposit must not be handed back.
 */
export const EngineErrorCode = {
  AccessDenied: 'AccessDenied',
  NotFound: 'NotFound',
  ZeroAmount: 'ZeroAmount',
  InvalidDestination: 'InvalidDestination',
  InvalidRecipient: 'InvalidRecipient',
  DuplicateDestination: 'DuplicateDestination',
  InvalidExpiry: 'InvalidExpiry',
  SlippageExceeded: 'SlippageExceeded',
  SwapFailed: 'SwapFailed',
  SwapUnsettled: 'SwapUnsettled',
  InsufficientRemaining: 'InsufficientRemaining',
  Expired: 'Expired',
  NotYetExpired: 'NotYetExpired',
  TransferFailed: 'TransferFailed',
  BridgeFailed: 'BridgeFailed',
  BridgeNotConfigured: 'BridgeNotConfigured',
  VenueNotConfigured: 'VenueNotConfigured',
  PersistenceFailed: 'PersistenceFailed',
} as const;

export type EngineErrorCode = (typeof EngineErrorCode)[keyof typeof EngineErrorCode];

interface EngineErrorOptions {
  readonly context?: Record<string, unknown>;
  readonly committed?: boolean;
  readonly cause?: unknown;
}

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly context: Record<string, unknown>;
  readonly committed: boolean;

  constructor(code: EngineErrorCode, message: string, options: EngineErrorOptions = {}) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = options.context ?? {};
    this.committed = options.committed ?? false;
    if (options.cause !== undefined) this.cause = options.cause;
  }

  /** Same error, flagged as raised after the ledger mutation committed. */
  asCommitted(context: Record<string, unknown> = {}): EngineError {
    return new EngineError(this.code, this.message, {
      context: { ...this.context, ...context },
      committed: true,
      cause: this.cause,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      committed: this.committed,
      context: this.context,
    };
  }
}

export function isEngineError(err: unknown, code?: EngineErrorCode): err is EngineError {
  return err instanceof EngineError && (code === undefined || err.code === code);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Raised by an execution venue once a swap may have executed but its outcome
 * cannot be measured. Funds it was given must be treated as spent.
 */
export class SwapSettlementUnknown extends Error {
  readonly reference: string | null;

  constructor(message: string, reference: string | null, cause?: unknown) {
    super(message);
    this.name = 'SwapSettlementUnknown';
    this.reference = reference;
    if (cause !== undefined) this.cause = cause;
  }
}
