/** 32-byte value as 64 lowercase hex chars (ids, public keys). */
export type H256 = string;

/** 64-byte value as 128 lowercase hex chars (signatures). */
export type H512 = string;

/** Unsigned 128-bit amount. */
export type Value = bigint;

export interface TransactionInput {
  outPoint: H256;
  signature: H512;
}

export interface TransactionOutput {
  value: Value;
  ownerKey: H256;
}

export interface Transaction {
  inputs: TransactionInput[];
  outputs: TransactionOutput[];
}

export interface Block {
  id: H256;
  height: number;
  authorities: H256[];
  transactions: Transaction[];
}

export interface BlockHeader {
  id: H256;
  height: number;
}

export interface UtxoEntry {
  id: H256;
  output: TransactionOutput;
}
