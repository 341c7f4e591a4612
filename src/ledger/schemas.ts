import { z } from 'zod';
import { U128_MAX } from './codec';

const hex = (bytes: number) =>
  z
    .string()
    .regex(new RegExp(`^(0x)?[0-9a-fA-F]{${bytes * 2}}$`), `expected ${bytes} bytes of hex`)
    .transform((value) => value.replace(/^0x/, '').toLowerCase());

export const h256Schema = hex(32);
export const h512Schema = hex(64);

// Amounts travel as decimal strings; small integers are accepted as numbers.
export const valueSchema = z
  .union([z.string().regex(/^\d+$/, 'expected a decimal string'), z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)])
  .transform((value) => BigInt(value))
  .refine((value) => value <= U128_MAX, 'value exceeds 128 bits');

export const outputSchema = z.object({
  value: valueSchema,
  ownerKey: h256Schema,
});

export const inputSchema = z.object({
  outPoint: h256Schema,
  signature: h512Schema,
});

export const transactionSchema = z.object({
  inputs: z.array(inputSchema),
  outputs: z.array(outputSchema),
});

export const blockSchema = z.object({
  id: h256Schema,
  height: z.number().int().nonnegative(),
  authorities: z.array(h256Schema).default([]),
  transactions: z.array(transactionSchema),
});

export const rollbackQuerySchema = z.object({
  height: z.string().regex(/^\d+$/, 'expected a block height').transform(Number),
});
