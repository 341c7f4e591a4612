import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { H256, TransactionOutput, UtxoEntry } from '../interfaces';
import { encodeOutput, encodeVec } from './codec';
import { hash256 } from './crypto';
import { ConfigError } from './errors';
import type { UtxoStore } from './store';
import { genesisOutputId } from './transaction';
import { outputSchema } from './schemas';

export const genesisSchema = z
  .object({ outputs: z.array(outputSchema) })
  .superRefine((genesis, ctx) => {
    const ids = new Set<string>();
    genesis.outputs.forEach((output, index) => {
      const id = genesisOutputId(output);
      if (ids.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['outputs', index],
          message: 'duplicate genesis output',
        });
      }
      ids.add(id);
    });
  });

export function genesisBlockId(outputs: readonly TransactionOutput[]): H256 {
  return hash256(encodeVec(outputs, encodeOutput));
}

export function seedGenesis(outputs: readonly TransactionOutput[], ledger: UtxoStore): UtxoEntry[] {
  return outputs.map((output) => {
    const id = genesisOutputId(output);
    ledger.put(id, output);
    return { id, output };
  });
}

export async function loadGenesisFile(path: string): Promise<TransactionOutput[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read genesis file ${path}: ${String(error)}`);
  }
  const parsed = genesisSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid genesis file ${path}: ${parsed.error.message}`);
  }
  return parsed.data.outputs;
}
