import { z } from 'zod';

const baseUnits = z
  .string()
  .regex(/^\d+$/, 'Expected a decimal string of base units')
  .max(40)
  .transform((v) => BigInt(v));

const identity = z.string().min(1).max(128);

// The bound the bridge program enforces on encoded recipients.
const recipient = z
  .string()
  .min(1)
  .refine((v) => Buffer.byteLength(v, 'utf8') <= 128, 'Recipient must be at most 128 bytes');

const base58Address = z
  .string()
  .min(32)
  .max(44)
  .regex(/^[1-9A-HJ-NP-Za-km-z]+$/, 'Invalid base58 address');

const routeData = z
  .string()
  .regex(/^(0x)?([0-9a-fA-F]{2})*$/, 'Expected hex-encoded route data')
  .default('');

export const positionParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const holderParamsSchema = z.object({
  identity,
});

export const deliveryParamsSchema = z.object({
  id: z.string().uuid(),
});

export const swapParamsSchema = z.object({
  id: z.string().uuid(),
});

export const purchaseSchema = z.object({
  buyer: identity,
  depositAmount: baseUnits,
  minOutputAmount: baseUnits.nullable().default(null),
  unitPrice: baseUnits,
  destination: z.string().min(1).max(64),
  expiresAt: z.number().int().positive(),
});

export const redeemSchema = z.object({
  amount: baseUnits,
  recipient,
  routeData,
});

export const transferSchema = z.object({
  to: identity,
});

export const setOperatorSchema = z.object({ operator: identity });

export const setVenueSchema = z.object({ pair: base58Address });

export const setBridgeSchema = z.object({ address: base58Address });

export const registerDestinationSchema = z.object({
  name: z.string().min(1).max(64),
  networkId: z.number().int().min(0),
});

export const sweepFeesSchema = z.object({ recipient: identity });

export const emergencySweepSchema = z.object({
  amount: baseUnits,
  recipient: identity,
});

export type PurchaseInput = z.infer<typeof purchaseSchema>;
export type RedeemInput = z.infer<typeof redeemSchema>;

export class RequestValidationError extends Error {
  readonly statusCode = 400;
  readonly details: z.ZodFormattedError<unknown>;

  constructor(error: z.ZodError) {
    super('Validation failed');
    this.name = 'RequestValidationError';
    this.details = error.format();
  }
}

export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new RequestValidationError(parsed.error);
  }
  return parsed.data;
}
