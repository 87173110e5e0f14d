import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Keypair } from '@solana/web3.js';
import { BridgeProgramClient, decodeRouteData, encodeDepositData } from './bridge-program.service.js';
import { OnChainFailure } from '../../services/transaction-sender.js';
import type { TransactionSender } from '../../services/transaction-sender.js';
import type { Container } from '../../infra/container.js';
import { createMockContainer } from '../../testing/fakes.js';

describe('BridgeProgramClient', () => {
  const program = Keypair.generate().publicKey;
  const lockedMint = Keypair.generate().publicKey;
  let send: ReturnType<typeof vi.fn>;
  let client: BridgeProgramClient;

  beforeEach(() => {
    const container: Container = createMockContainer();
    container.solana = { connection: {} as Container['solana']['connection'], keypair: Keypair.generate() };
    send = vi.fn().mockResolvedValue({ signature: 'sig-bridge', unitsConsumed: 10_000 });
    client = new BridgeProgramClient(container, { send } as unknown as TransactionSender, lockedMint.toBase58());
  });

  const order = { networkId: 42161, amount: 400_000_000n, recipient: '0xrecipient', routeData: '0xbeef' };

  it('returns the signature as the reference of an accepted deposit', async () => {
    await expect(client.dispatch(program.toBase58(), order)).resolves.toEqual({
      accepted: true,
      reference: 'sig-bridge',
    });
  });

  it('reports an on-chain rejection instead of throwing', async () => {
    send.mockRejectedValue(new OnChainFailure('bridge deposit failed on chain: {"Custom":6001}'));

    await expect(client.dispatch(program.toBase58(), order)).resolves.toEqual({
      accepted: false,
      reference: null,
      reason: 'bridge deposit failed on chain: {"Custom":6001}',
    });
  });

  it('propagates transport errors', async () => {
    send.mockRejectedValue(new Error('fetch failed'));

    await expect(client.dispatch(program.toBase58(), order)).rejects.toThrow('fetch failed');
  });

  it('approves the escrow authority of the target program', () => {
    expect(client.spenderFor(program.toBase58())).toBe(client.getEscrowAuthorityPDA(program).toBase58());
  });

  it('encodes network id, amount, recipient and route bytes', () => {
    const data = encodeDepositData(order);

    expect(data.readUInt32LE(8)).toBe(42161);
    expect(data.readBigUInt64LE(12)).toBe(400_000_000n);
    expect(data.readUInt16LE(20)).toBe(11);
    expect(data.subarray(22, 33).toString('utf8')).toBe('0xrecipient');
    expect(data.subarray(33)).toEqual(Buffer.from([0xbe, 0xef]));
  });

  it('rejects malformed route data', () => {
    expect(() => decodeRouteData('0xabc')).toThrow('Route data must be an even-length hex string');
    expect(() => decodeRouteData('zz')).toThrow('Route data must be an even-length hex string');
    expect(decodeRouteData('')).toEqual(Buffer.alloc(0));
  });

  it('rejects an empty recipient', () => {
    expect(() => encodeDepositData({ ...order, recipient: '' })).toThrow('Bridge recipient must be 1-128 bytes');
  });

  it('validates an order without sending it', () => {
    expect(() => client.validate(program.toBase58(), order)).not.toThrow();
    // 100 three-byte characters: within 128 characters, over 128 bytes.
    expect(() => client.validate(program.toBase58(), { ...order, recipient: '€'.repeat(100) })).toThrow(
      'Bridge recipient must be 1-128 bytes',
    );
    expect(() => client.validate(program.toBase58(), { ...order, routeData: '0xabc' })).toThrow(
      'Route data must be an even-length hex string',
    );
    expect(() => client.validate('not-a-key', order)).toThrow();
    expect(send).not.toHaveBeenCalled();
  });
});
