import { z } from 'zod';
import dotenv from 'dotenv';

const base58 = z
  .string()
  .min(32)
  .max(44)
  .regex(/^[1-9A-HJ-NP-Za-km-z]+$/, 'Invalid base58 address');

const envSchema = z.object({
  SOLANA_RPC_URL: z.string().url(),
  SOLANA_WS_URL: z.string().startsWith('wss://').or(z.string().startsWith('ws://')),

  WALLET_PRIVATE_KEY: z.string().optional(),
  WALLET_KEYPAIR_PATH: z.string().optional(),

  REDIS_URL: z.string(),

  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(3100),
  // token=identity pairs, comma separated
  API_KEYS: z.string().default(''),

  ADMIN_IDENTITY: base58,
  OPERATOR_IDENTITY: base58.optional(),

  DEPOSIT_MINT: base58,
  DEPOSIT_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),
  LOCKED_MINT: base58,
  LOCKED_DECIMALS: z.coerce.number().int().min(0).max(18).default(9),

  VENUE_PROGRAM_ID: base58,
  VENUE_POOL: base58.optional(),
  BRIDGE_PROGRAM_ID: base58.optional(),

  LOCAL_DESTINATION: z.string().min(1).max(64).default('solana'),
  LOCAL_NETWORK_ID: z.coerce.number().int().min(0).default(0),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): EnvConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${messages}`);
  }

  if (!result.data.WALLET_PRIVATE_KEY && !result.data.WALLET_KEYPAIR_PATH) {
    throw new Error('Either WALLET_PRIVATE_KEY or WALLET_KEYPAIR_PATH must be set');
  }

  return result.data;
}

export function loadEnv(): EnvConfig {
  dotenv.config();
  return parseEnv(process.env);
}

export function parseApiKeys(raw: string): Map<string, string> {
  const keys = new Map<string, string>();
  const entries = raw.split(',');
  for (const [index, entry] of entries.entries()) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf('=');
    if (separator <= 0 || separator === trimmed.length - 1) {
      throw new Error(`Malformed API_KEYS entry at position ${index}`);
    }
    keys.set(trimmed.slice(0, separator), trimmed.slice(separator + 1));
  }
  return keys;
}
