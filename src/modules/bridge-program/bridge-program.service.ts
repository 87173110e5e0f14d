import { PublicKey, TransactionInstruction } from '@solana/web3.js';
import { TOKEN_PROGRAM_ID, getAssociatedTokenAddressSync } from '@solana/spl-token';
import type { Container } from '../../infra/container.js';
import { OnChainFailure, type TransactionSender } from '../../services/transaction-sender.js';
import type { BridgeOrder, BridgeReceipt, BridgeVenue } from '../../types/collaborators.js';

const DEPOSIT_DISCRIMINATOR = Buffer.from([0xf2, 0x23, 0xc6, 0x89, 0x52, 0xe1, 0xf2, 0xb6]);
const MAX_RECIPIENT_BYTES = 128;

/**
 * Client of the bridge program. The route bytes come from an off-system
 * relayer and are appended to the instruction untouched.
 */
export class BridgeProgramClient implements BridgeVenue {
  private readonly container: Container;
  private readonly sender: TransactionSender;
  private readonly lockedMint: PublicKey;

  constructor(container: Container, sender: TransactionSender, lockedMint: string) {
    this.container = container;
    this.sender = sender;
    this.lockedMint = new PublicKey(lockedMint);
  }

  getConfigPDA(program: PublicKey): PublicKey {
    const [pda] = PublicKey.findProgramAddressSync([Buffer.from('bridge-config')], program);
    return pda;
  }

  getEscrowAuthorityPDA(program: PublicKey): PublicKey {
    const [pda] = PublicKey.findProgramAddressSync([Buffer.from('escrow'), this.lockedMint.toBuffer()], program);
    return pda;
  }

  spenderFor(target: string): string {
    return this.getEscrowAuthorityPDA(new PublicKey(target)).toBase58();
  }

  validate(target: string, order: BridgeOrder): void {
    this.buildDepositInstruction(new PublicKey(target), order);
  }

  async dispatch(target: string, order: BridgeOrder): Promise<BridgeReceipt> {
    const { logger } = this.container;
    const ix = this.buildDepositInstruction(new PublicKey(target), order);

    try {
      const { signature } = await this.sender.send([ix], 'bridge deposit');
      return { accepted: true, reference: signature };
    } catch (err) {
      if (err instanceof OnChainFailure) {
        logger.warn({ networkId: order.networkId, reason: err.message }, 'Bridge program rejected deposit');
        return { accepted: false, reference: null, reason: err.message };
      }
      throw err;
    }
  }

  buildDepositInstruction(program: PublicKey, order: BridgeOrder): TransactionInstruction {
    const custody = this.container.solana.keypair.publicKey;
    const escrowAuthority = this.getEscrowAuthorityPDA(program);

    return new TransactionInstruction({
      programId: program,
      keys: [
        { pubkey: this.getConfigPDA(program), isSigner: false, isWritable: false },
        { pubkey: escrowAuthority, isSigner: false, isWritable: false },
        { pubkey: getAssociatedTokenAddressSync(this.lockedMint, custody, true), isSigner: false, isWritable: true },
        { pubkey: getAssociatedTokenAddressSync(this.lockedMint, escrowAuthority, true), isSigner: false, isWritable: true },
        { pubkey: this.lockedMint, isSigner: false, isWritable: false },
        { pubkey: custody, isSigner: true, isWritable: false },
        { pubkey: TOKEN_PROGRAM_ID, isSigner: false, isWritable: false },
      ],
      data: encodeDepositData(order),
    });
  }
}

/** discriminator | network id u32 | amount u64 | recipient len u16 | recipient utf8 | route bytes */
export function encodeDepositData(order: BridgeOrder): Buffer {
  const recipient = Buffer.from(order.recipient, 'utf8');
  if (recipient.length === 0 || recipient.length > MAX_RECIPIENT_BYTES) {
    throw new Error(`Bridge recipient must be 1-${MAX_RECIPIENT_BYTES} bytes`);
  }
  const route = decodeRouteData(order.routeData);

  const header = Buffer.alloc(8 + 4 + 8 + 2);
  DEPOSIT_DISCRIMINATOR.copy(header, 0);
  header.writeUInt32LE(order.networkId, 8);
  header.writeBigUInt64LE(order.amount, 12);
  header.writeUInt16LE(recipient.length, 20);

  return Buffer.concat([header, recipient, route]);
}

export function decodeRouteData(routeData: string): Buffer {
  const hex = routeData.startsWith('0x') ? routeData.slice(2) : routeData;
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error('Route data must be an even-length hex string');
  }
  return Buffer.from(hex, 'hex');
}
