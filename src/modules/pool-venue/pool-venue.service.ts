import { PublicKey, TransactionInstruction } from '@solana/web3.js';
import { TOKEN_PROGRAM_ID, getAssociatedTokenAddressSync } from '@solana/spl-token';
import type { Container } from '../../infra/container.js';
import { UnconfirmedTransaction, type TransactionSender } from '../../services/transaction-sender.js';
import { SwapSettlementUnknown, describeError } from '../../services/engine-error.js';
import type { CustodyAsset, BalanceDelta, ExecutionVenue, SettleCallback, SwapOrder } from '../../types/collaborators.js';

const SWAP_DISCRIMINATOR = Buffer.from([0xf8, 0xc6, 0x9e, 0x91, 0xe1, 0x75, 0x87, 0xc8]);
const BPS = 10_000n;

/**
 * Pool account layout:
 *   [0..8)   discriminator
 *   [8..40)  deposit mint
 *   [40..72) locked mint
 *   [72..80) deposit reserve (u64 LE)
 *   [80..88) locked reserve (u64 LE)
 *   [88..90) fee bps (u16 LE)
 */
export const POOL_ACCOUNT_SIZE = 90;

export interface PoolState {
  depositMint: PublicKey;
  lockedMint: PublicKey;
  depositReserve: bigint;
  lockedReserve: bigint;
  feeBps: bigint;
}

export interface PoolQuote {
  amountIn: bigint;
  amountOut: bigint;
  priceImpactBps: number;
}

export interface PoolVenueAssets {
  deposit: CustodyAsset;
  locked: CustodyAsset;
}

/** Constant-product pool program trading the deposit mint for the locked mint. */
export class PoolVenue implements ExecutionVenue {
  private readonly container: Container;
  private readonly sender: TransactionSender;
  private readonly programId: PublicKey;
  private readonly assets: PoolVenueAssets;

  constructor(container: Container, sender: TransactionSender, programId: string, assets: PoolVenueAssets) {
    this.container = container;
    this.sender = sender;
    this.programId = new PublicKey(programId);
    this.assets = assets;
  }

  // --- PDA derivation ---

  getAuthorityPDA(pool: PublicKey): PublicKey {
    const [pda] = PublicKey.findProgramAddressSync([Buffer.from('pool-authority'), pool.toBuffer()], this.programId);
    return pda;
  }

  getVaultPDA(pool: PublicKey, mint: PublicKey): PublicKey {
    const [pda] = PublicKey.findProgramAddressSync(
      [Buffer.from('vault'), pool.toBuffer(), mint.toBuffer()],
      this.programId,
    );
    return pda;
  }

  spenderFor(pair: string): string {
    return this.getAuthorityPDA(new PublicKey(pair)).toBase58();
  }

  // --- Pool state ---

  async getPoolState(pool: PublicKey): Promise<PoolState> {
    const accountInfo = await this.container.solana.connection.getAccountInfo(pool);
    if (!accountInfo) {
      throw new Error(`Pool account ${pool.toBase58()} not found`);
    }
    if (!accountInfo.owner.equals(this.programId)) {
      throw new Error(`Pool account ${pool.toBase58()} is not owned by the venue program`);
    }
    return decodePoolState(accountInfo.data);
  }

  // --- Quote math ---

  calculateQuote(state: PoolState, amountIn: bigint): PoolQuote {
    const netIn = (amountIn * (BPS - state.feeBps)) / BPS;
    const amountOut = (netIn * state.lockedReserve) / (state.depositReserve + netIn);

    const spotPrice = (state.lockedReserve * BPS) / state.depositReserve;
    const execPrice = amountIn > 0n ? (amountOut * BPS) / amountIn : 0n;
    const impact = spotPrice > 0n ? Number(((spotPrice - execPrice) * BPS) / spotPrice) : 0;

    return { amountIn, amountOut, priceImpactBps: Math.max(0, impact) };
  }

  async quoteExactInput(pair: string, amountIn: bigint): Promise<bigint> {
    const state = await this.getPoolState(new PublicKey(pair));
    return this.calculateQuote(state, amountIn).amountOut;
  }

  // --- Swap ---

  async swapExactInput(order: SwapOrder, settle: SettleCallback): Promise<BalanceDelta> {
    const { logger } = this.container;
    const pool = new PublicKey(order.pair);
    const state = await this.getPoolState(pool);
    const quote = this.calculateQuote(state, order.amountIn);

    // Vetoes before anything is sent; the instruction's minimum guards the on-chain price.
    settle({ deposit: -order.amountIn, locked: quote.amountOut });

    const custody = this.container.solana.keypair.publicKey;
    const [depositBefore, lockedBefore] = await this.balances(custody.toBase58());

    const ix = this.buildSwapInstruction(pool, state, custody, order);
    let signature: string;
    try {
      ({ signature } = await this.sender.send([ix], 'pool swap'));
    } catch (err) {
      if (err instanceof UnconfirmedTransaction) {
        throw new SwapSettlementUnknown(`Pool swap outcome unknown: ${err.message}`, err.signature, err);
      }
      throw err;
    }

    let delta: BalanceDelta;
    try {
      const [depositAfter, lockedAfter] = await this.balances(custody.toBase58());
      delta = { deposit: depositAfter - depositBefore, locked: lockedAfter - lockedBefore };
    } catch (err) {
      throw new SwapSettlementUnknown(
        `Pool swap ${signature} confirmed but its balances could not be read: ${describeError(err)}`,
        signature,
        err,
      );
    }

    logger.info(
      {
        pool: order.pair,
        signature,
        amountIn: order.amountIn.toString(),
        quotedOut: quote.amountOut.toString(),
        lockedDelta: delta.locked.toString(),
        priceImpactBps: quote.priceImpactBps,
      },
      'Pool swap settled',
    );
    return delta;
  }

  buildSwapInstruction(pool: PublicKey, state: PoolState, owner: PublicKey, order: SwapOrder): TransactionInstruction {
    return new TransactionInstruction({
      programId: this.programId,
      keys: [
        { pubkey: pool, isSigner: false, isWritable: true },
        { pubkey: this.getAuthorityPDA(pool), isSigner: false, isWritable: false },
        { pubkey: this.getVaultPDA(pool, state.depositMint), isSigner: false, isWritable: true },
        { pubkey: this.getVaultPDA(pool, state.lockedMint), isSigner: false, isWritable: true },
        { pubkey: getAssociatedTokenAddressSync(state.depositMint, owner, true), isSigner: false, isWritable: true },
        { pubkey: getAssociatedTokenAddressSync(state.lockedMint, owner, true), isSigner: false, isWritable: true },
        { pubkey: owner, isSigner: true, isWritable: false },
        { pubkey: TOKEN_PROGRAM_ID, isSigner: false, isWritable: false },
      ],
      data: encodeSwapData(order),
    });
  }

  private async balances(holder: string): Promise<[bigint, bigint]> {
    return Promise.all([this.assets.deposit.balanceOf(holder), this.assets.locked.balanceOf(holder)]);
  }
}

export function decodePoolState(data: Buffer): PoolState {
  if (data.length < POOL_ACCOUNT_SIZE) {
    throw new Error(`Pool account data is ${data.length} bytes, expected ${POOL_ACCOUNT_SIZE}`);
  }
  return {
    depositMint: new PublicKey(data.subarray(8, 40)),
    lockedMint: new PublicKey(data.subarray(40, 72)),
    depositReserve: data.readBigUInt64LE(72),
    lockedReserve: data.readBigUInt64LE(80),
    feeBps: BigInt(data.readUInt16LE(88)),
  };
}

export function encodeSwapData(order: SwapOrder): Buffer {
  const data = Buffer.alloc(8 + 8 + 8 + 8);
  SWAP_DISCRIMINATOR.copy(data, 0);
  data.writeBigUInt64LE(order.amountIn, 8);
  data.writeBigUInt64LE(order.minAmountOut, 16);
  data.writeBigUInt64LE(order.priceLimit, 24);
  return data;
}
