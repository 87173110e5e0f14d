import {
  ComputeBudgetProgram,
  Transaction,
  type SendOptions,
  type SignatureStatus,
  type TransactionInstruction,
} from '@solana/web3.js';
import bs58 from 'bs58';
import type { Container } from '../infra/container.js';
import { describeError } from './engine-error.js';

const MAX_RETRIES = 3;
const BASE_RETRY_DELAY_MS = 1000;
const COMPUTE_UNIT_LIMIT = 200_000;

export interface SendResult {
  signature: string;
  unitsConsumed: number;
}

export interface TransactionSenderOptions {
  priorityFeeMicroLamports?: number;
  retries?: number;
  sleep?: (ms: number) => Promise<void>;
}

type Lookup = 'landed' | 'dropped' | 'unknown';

/**
 * Signs with the custody keypair, simulates once, then broadcasts and confirms
 * with exponential backoff. A retry rebroadcasts the same signed bytes; the
 * transaction is only re-signed once its blockhash has expired without it
 * landing, so at most one copy can ever execute.
 */
export class TransactionSender {
  private readonly container: Container;
  private readonly priorityFee: number;
  private readonly retries: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(container: Container, options: TransactionSenderOptions = {}) {
    this.container = container;
    this.priorityFee = options.priorityFeeMicroLamports ?? 0;
    this.retries = options.retries ?? MAX_RETRIES;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async send(instructions: TransactionInstruction[], label: string): Promise<SendResult> {
    const { logger } = this.container;
    const transaction = await this.build(instructions);

    const unitsConsumed = await this.simulate(transaction, label);
    const signature = await this.sendUntilConfirmed(transaction, label);

    logger.info({ label, signature, unitsConsumed }, 'Transaction confirmed');
    return { signature, unitsConsumed };
  }

  private async build(instructions: TransactionInstruction[]): Promise<Transaction> {
    const { connection, keypair } = this.container.solana;

    const { blockhash, lastValidBlockHeight } = await connection.getLatestBlockhash('confirmed');
    const transaction = new Transaction({ feePayer: keypair.publicKey, blockhash, lastValidBlockHeight });

    if (this.priorityFee > 0) {
      transaction.add(ComputeBudgetProgram.setComputeUnitPrice({ microLamports: this.priorityFee }));
    }
    transaction.add(ComputeBudgetProgram.setComputeUnitLimit({ units: COMPUTE_UNIT_LIMIT }));
    for (const ix of instructions) {
      transaction.add(ix);
    }
    return transaction;
  }

  private async simulate(transaction: Transaction, label: string): Promise<number> {
    const { connection, keypair } = this.container.solana;

    transaction.sign(keypair);
    const result = await connection.simulateTransaction(transaction);

    if (result.value.err !== null) {
      this.container.logger.warn(
        { label, err: result.value.err, logs: result.value.logs },
        'Transaction simulation failed',
      );
      throw new Error(`Simulation of ${label} failed: ${JSON.stringify(result.value.err)}`);
    }
    return result.value.unitsConsumed ?? 0;
  }

  private async sendUntilConfirmed(transaction: Transaction, label: string): Promise<string> {
    const { connection, keypair } = this.container.solana;
    const { logger } = this.container;
    const options: SendOptions = {
      skipPreflight: false,
      preflightCommitment: 'confirmed',
      maxRetries: 0,
    };

    let signature = signatureOf(transaction);
    let lastError: unknown = new Error(`No attempt made to send ${label}`);

    for (let attempt = 0; attempt < this.retries; attempt++) {
      const blockhash = transaction.recentBlockhash ?? '';
      const lastValidBlockHeight = transaction.lastValidBlockHeight ?? 0;

      try {
        await connection.sendRawTransaction(transaction.serialize(), options);
        const confirmation = await connection.confirmTransaction(
          { signature, blockhash, lastValidBlockHeight },
          'confirmed',
        );
        if (confirmation.value.err) {
          throw new OnChainFailure(`${label} failed on chain: ${JSON.stringify(confirmation.value.err)}`);
        }
        return signature;
      } catch (err) {
        if (err instanceof OnChainFailure) throw err;
        lastError = err;
      }

      const outcome = await this.lookup(signature, lastValidBlockHeight, label);
      if (outcome === 'landed') {
        logger.info({ label, signature, attempt: attempt + 1 }, 'Transaction found on chain after a failed confirmation');
        return signature;
      }
      if (attempt === this.retries - 1) break;

      const delay = BASE_RETRY_DELAY_MS * Math.pow(2, attempt);
      logger.warn(
        { label, signature, attempt: attempt + 1, maxRetries: this.retries, delay, outcome, err: lastError },
        'Transaction not confirmed, retrying',
      );
      await this.sleep(delay);

      if (outcome === 'dropped') {
        const latest = await connection.getLatestBlockhash('confirmed');
        transaction.recentBlockhash = latest.blockhash;
        transaction.lastValidBlockHeight = latest.lastValidBlockHeight;
        transaction.sign(keypair);
        signature = signatureOf(transaction);
        logger.info({ label, signature }, 'Blockhash expired, transaction re-signed');
      }
    }

    throw new UnconfirmedTransaction(label, signature, lastError);
  }

  /**
   * `dropped` only when the blockhash has expired and the cluster has no record
   * of the signature; a transaction in that state can never land.
   */
  private async lookup(signature: string, lastValidBlockHeight: number, label: string): Promise<Lookup> {
    const { connection } = this.container.solana;

    let status: SignatureStatus | null;
    let expired: boolean;
    try {
      expired = (await connection.getBlockHeight('confirmed')) > lastValidBlockHeight;
      const { value } = await connection.getSignatureStatuses([signature], { searchTransactionHistory: true });
      status = value[0] ?? null;
    } catch (err) {
      this.container.logger.warn({ label, signature, err }, 'Signature status lookup failed');
      return 'unknown';
    }

    if (status === null) {
      return expired ? 'dropped' : 'unknown';
    }
    if (status.err !== null) {
      throw new OnChainFailure(`${label} failed on chain: ${JSON.stringify(status.err)}`);
    }
    if (status.confirmationStatus === 'confirmed' || status.confirmationStatus === 'finalized') {
      return 'landed';
    }
    return 'unknown';
  }
}

function signatureOf(transaction: Transaction): string {
  const { signature } = transaction;
  if (signature === null) {
    throw new Error('Transaction is not signed');
  }
  return bs58.encode(signature);
}

export class OnChainFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OnChainFailure';
  }
}

/** Broadcast at least once; whether it executed could not be established. */
export class UnconfirmedTransaction extends Error {
  readonly signature: string;

  constructor(label: string, signature: string, cause: unknown) {
    super(`${label} was sent but not confirmed (${signature}): ${describeError(cause)}`);
    this.name = 'UnconfirmedTransaction';
    this.signature = signature;
    this.cause = cause;
  }
}
