import { Connection, Keypair } from '@solana/web3.js';
import fs from 'node:fs';
import type { Logger } from './logger.js';
import type { EnvConfig } from '../config/env.js';

export interface SolanaContext {
  connection: Connection;
  // Custody keypair: holds deposits, locked balances and accumulated fees.
  keypair: Keypair;
}

export function createSolanaContext(
  config: Pick<EnvConfig, 'SOLANA_RPC_URL' | 'SOLANA_WS_URL' | 'WALLET_PRIVATE_KEY' | 'WALLET_KEYPAIR_PATH'>,
  logger: Logger,
): SolanaContext {
  const connection = new Connection(config.SOLANA_RPC_URL, {
    wsEndpoint: config.SOLANA_WS_URL,
    commitment: 'confirmed',
  });

  const keypair = loadCustodyKeypair(config, logger);

  logger.info({ custody: keypair.publicKey.toBase58() }, 'Custody wallet loaded');

  return { connection, keypair };
}

function loadCustodyKeypair(
  config: Pick<EnvConfig, 'WALLET_PRIVATE_KEY' | 'WALLET_KEYPAIR_PATH'>,
  logger: Logger,
): Keypair {
  if (config.WALLET_PRIVATE_KEY) {
    logger.info('Loading custody keypair from environment variable');
    return Keypair.fromSecretKey(new Uint8Array(Buffer.from(config.WALLET_PRIVATE_KEY, 'base64')));
  }

  if (config.WALLET_KEYPAIR_PATH) {
    logger.info({ path: config.WALLET_KEYPAIR_PATH }, 'Loading custody keypair from file');
    const parsed: unknown = JSON.parse(fs.readFileSync(config.WALLET_KEYPAIR_PATH, 'utf-8'));
    if (!Array.isArray(parsed) || !parsed.every((b): b is number => typeof b === 'number')) {
      throw new Error(`Keypair file ${config.WALLET_KEYPAIR_PATH} is not a JSON byte array`);
    }
    return Keypair.fromSecretKey(Uint8Array.from(parsed));
  }

  throw new Error('No custody keypair configured');
}

export async function checkRpcHealth(connection: Connection, logger: Logger): Promise<number> {
  try {
    const slot = await connection.getSlot();
    const version = await connection.getVersion();
    logger.info({ slot, version: version['solana-core'] }, 'RPC health check passed');
    return slot;
  } catch (err) {
    logger.fatal({ err }, 'RPC health check failed');
    throw new Error('Solana RPC is unreachable', { cause: err });
  }
}
