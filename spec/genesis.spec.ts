import { describe, expect, test } from 'vitest';
import { ConfigError } from '../src/ledger/errors';
import { genesisSchema, loadGenesisFile, seedGenesis } from '../src/ledger/genesis';
import { MemoryUtxoStore } from '../src/ledger/store';
import { genesisOutputId } from '../src/ledger/transaction';
import { alice, bob, output } from './helpers';

describe('genesis', () => {
  test('the ledger holds exactly the configured outputs, keyed by their own hash', () => {
    const store = new MemoryUtxoStore();
    const outputs = [output(100n, alice), output(40n, bob)];

    seedGenesis(outputs, store);

    expect(store.entries()).toEqual([
      { id: genesisOutputId(outputs[0]), output: outputs[0] },
      { id: genesisOutputId(outputs[1]), output: outputs[1] },
    ]);
    expect(store.getRewardPool()).toBe(0n);
  });

  test('parses amounts and normalizes keys', () => {
    const parsed = genesisSchema.parse({
      outputs: [{ value: '340282366920938463463374607431768211455', ownerKey: '0x' + 'AB'.repeat(32) }],
    });
    expect(parsed.outputs).toEqual([{ value: (1n << 128n) - 1n, ownerKey: 'ab'.repeat(32) }]);
  });

  test('rejects duplicate and oversized outputs', () => {
    const duplicate = { value: '5', ownerKey: alice.publicKey };
    expect(genesisSchema.safeParse({ outputs: [duplicate, duplicate] }).success).toBe(false);
    expect(
      genesisSchema.safeParse({
        outputs: [{ value: '340282366920938463463374607431768211456', ownerKey: alice.publicKey }],
      }).success,
    ).toBe(false);
  });

  test('loads the bundled genesis file', async () => {
    const outputs = await loadGenesisFile('config/genesis.json');
    expect(outputs).toEqual([
      { value: 1000000n, ownerKey: '11'.repeat(32) },
      { value: 500000n, ownerKey: '22'.repeat(32) },
    ]);
  });

  test('a missing file is a configuration error', async () => {
    await expect(loadGenesisFile('config/does-not-exist.json')).rejects.toBeInstanceOf(ConfigError);
  });
});
