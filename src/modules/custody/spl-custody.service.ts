import { PublicKey, type TransactionInstruction } from '@solana/web3.js';
import {
  TokenAccountNotFoundError,
  createApproveCheckedInstruction,
  createAssociatedTokenAccountIdempotentInstruction,
  createTransferCheckedInstruction,
  getAccount,
  getAssociatedTokenAddressSync,
} from '@solana/spl-token';
import type { Container } from '../../infra/container.js';
import type { TransactionSender } from '../../services/transaction-sender.js';
import type { CustodyAsset, LocalTransferAgent } from '../../types/collaborators.js';

/**
 * SPL token held by the custody keypair. Pulls from other owners rely on the
 * custody key being their approved delegate.
 */
export class SplCustodyAsset implements CustodyAsset {
  readonly mint: string;
  private readonly container: Container;
  private readonly sender: TransactionSender;
  private readonly mintKey: PublicKey;
  private readonly decimals: number;

  constructor(container: Container, sender: TransactionSender, mint: string, decimals: number) {
    this.container = container;
    this.sender = sender;
    this.mint = mint;
    this.mintKey = new PublicKey(mint);
    this.decimals = decimals;
  }

  get custody(): PublicKey {
    return this.container.solana.keypair.publicKey;
  }

  tokenAccount(owner: PublicKey): PublicKey {
    return getAssociatedTokenAddressSync(this.mintKey, owner, true);
  }

  async transferFrom(owner: string, to: string, amount: bigint): Promise<void> {
    const source = this.tokenAccount(new PublicKey(owner));
    await this.sendTransfer(source, new PublicKey(to), amount, `${this.mint} transferFrom`);
  }

  async transfer(to: string, amount: bigint): Promise<void> {
    const source = this.tokenAccount(this.custody);
    await this.sendTransfer(source, new PublicKey(to), amount, `${this.mint} transfer`);
  }

  async approve(spender: string, amount: bigint): Promise<void> {
    const spenderKey = new PublicKey(spender);
    if (spenderKey.equals(this.custody)) {
      // The owner spends its own account without delegation.
      return;
    }

    const ix = createApproveCheckedInstruction(
      this.tokenAccount(this.custody),
      this.mintKey,
      spenderKey,
      this.custody,
      amount,
      this.decimals,
    );
    await this.sender.send([ix], `${this.mint} approve`);
  }

  async balanceOf(holder: string): Promise<bigint> {
    const { connection } = this.container.solana;
    try {
      const account = await getAccount(connection, this.tokenAccount(new PublicKey(holder)), 'confirmed');
      return account.amount;
    } catch (err) {
      if (err instanceof TokenAccountNotFoundError) return 0n;
      throw err;
    }
  }

  buildTransfer(source: PublicKey, recipient: PublicKey, amount: bigint): TransactionInstruction[] {
    const destination = this.tokenAccount(recipient);
    return [
      createAssociatedTokenAccountIdempotentInstruction(this.custody, destination, recipient, this.mintKey),
      createTransferCheckedInstruction(source, this.mintKey, destination, this.custody, amount, this.decimals),
    ];
  }

  private async sendTransfer(source: PublicKey, recipient: PublicKey, amount: bigint, label: string): Promise<void> {
    await this.sender.send(this.buildTransfer(source, recipient, amount), label);
    this.container.logger.debug(
      { mint: this.mint, recipient: recipient.toBase58(), amount: amount.toString() },
      'Custody transfer sent',
    );
  }
}

/** Local delivery: a plain transfer of the locked mint out of custody. */
export class CustodyLocalTransfer implements LocalTransferAgent {
  private readonly asset: SplCustodyAsset;

  constructor(asset: SplCustodyAsset) {
    this.asset = asset;
  }

  get address(): string {
    return this.asset.custody.toBase58();
  }

  validateRecipient(recipient: string): void {
    // PublicKey throws on anything but a 32-byte base58 key.
    this.asset.tokenAccount(new PublicKey(recipient));
  }

  async deliver(amount: bigint, recipient: string): Promise<void> {
    await this.asset.transfer(recipient, amount);
  }
}
