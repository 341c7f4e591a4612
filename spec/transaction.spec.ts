import { describe, expect, test } from 'vitest';
import { bytesToHex, concatBytes, hexToBytes } from '@noble/hashes/utils';
import { encodeOutput, encodeU64 } from '../src/ledger/codec';
import { hash256, isCanonicalSignature, verifySignature, ZERO_SIGNATURE } from '../src/ledger/crypto';
import {
  blockId,
  encodeTransaction,
  genesisOutputId,
  rewardOutputId,
  signingPayload,
  transactionOutputId,
} from '../src/ledger/transaction';
import { alice, bob, output, spend } from './helpers';

const GROUP_ORDER = (1n << 252n) + 27742317777372353535851937790883648493n;

describe('signing payload', () => {
  test('zeroes every signature and keeps everything else', () => {
    const tx = spend(
      [
        { outPoint: '01'.repeat(32), key: alice },
        { outPoint: '02'.repeat(32), key: bob },
      ],
      [output(10n, bob)],
    );
    const payload = signingPayload(tx);
    const zeroed = encodeTransaction({
      inputs: tx.inputs.map((input) => ({ ...input, signature: ZERO_SIGNATURE })),
      outputs: tx.outputs,
    });
    expect(bytesToHex(payload)).toBe(bytesToHex(zeroed));
    expect(tx.inputs[0].signature).not.toBe(ZERO_SIGNATURE);
  });

  test('each input signature verifies under its own key', () => {
    const tx = spend(
      [
        { outPoint: '01'.repeat(32), key: alice },
        { outPoint: '02'.repeat(32), key: bob },
      ],
      [output(10n, bob)],
    );
    const payload = signingPayload(tx);
    expect(verifySignature(alice.publicKey, payload, tx.inputs[0].signature)).toBe(true);
    expect(verifySignature(bob.publicKey, payload, tx.inputs[1].signature)).toBe(true);
    expect(verifySignature(bob.publicKey, payload, tx.inputs[0].signature)).toBe(false);
  });

  test('altering one payload byte breaks the signature', () => {
    const tx = spend([{ outPoint: '01'.repeat(32), key: alice }], [output(10n, bob)]);
    const payload = signingPayload(tx);
    const tampered = payload.slice();
    tampered[tampered.length - 1] ^= 0x01;
    expect(verifySignature(alice.publicKey, tampered, tx.inputs[0].signature)).toBe(false);
  });

  test('a signature with an unreduced S half is refused', () => {
    const tx = spend([{ outPoint: '01'.repeat(32), key: alice }], [output(10n, bob)]);
    const signature = hexToBytes(tx.inputs[0].signature);

    let s = 0n;
    for (let i = 63; i >= 32; i--) {
      s = (s << 8n) | BigInt(signature[i]);
    }
    let malleated = s + GROUP_ORDER;
    const altered = signature.slice();
    for (let i = 32; i < 64; i++) {
      altered[i] = Number(malleated & 0xffn);
      malleated >>= 8n;
    }

    expect(isCanonicalSignature(signature)).toBe(true);
    expect(isCanonicalSignature(altered)).toBe(false);
    expect(verifySignature(alice.publicKey, signingPayload(tx), bytesToHex(altered))).toBe(false);
  });
});

describe('output ids', () => {
  const tx = spend([{ outPoint: '01'.repeat(32), key: alice }], [output(10n, bob), output(5n, alice)]);
  const encoded = encodeTransaction(tx);

  test('are deterministic in the transaction bytes and index', () => {
    expect(transactionOutputId(encoded, 0)).toBe(transactionOutputId(encodeTransaction(tx), 0));
    expect(transactionOutputId(encoded, 0)).not.toBe(transactionOutputId(encoded, 1));
  });

  test('change when only a signature changes', () => {
    const other = { ...tx, inputs: [{ ...tx.inputs[0], signature: '00'.repeat(63) + '01' }] };
    expect(transactionOutputId(encodeTransaction(other), 0)).not.toBe(transactionOutputId(encoded, 0));
  });

  test('genesis id hashes the output alone', () => {
    const genesis = output(100n, alice);
    expect(genesisOutputId(genesis)).toBe(hash256(encodeOutput(genesis)));
  });

  test('reward id mixes in the block height', () => {
    const reward = output(3n, bob);
    expect(rewardOutputId(reward, 7)).toBe(hash256(concatBytes(encodeOutput(reward), encodeU64(7))));
    expect(rewardOutputId(reward, 7)).not.toBe(rewardOutputId(reward, 8));
  });

  test('block id covers height and transaction order', () => {
    const second = spend([{ outPoint: '02'.repeat(32), key: bob }], [output(1n, alice)]);
    expect(blockId(1, [tx, second])).toBe(blockId(1, [tx, second]));
    expect(blockId(1, [tx, second])).not.toBe(blockId(1, [second, tx]));
    expect(blockId(1, [tx])).not.toBe(blockId(2, [tx]));
  });
});
