import { BLOCK_SEED, digest, type Hex, ZERO_HASH } from "./hash";

export type Transaction = {
  sender: string;
  recipient: string;
  amount: number;
};

export type Block = {
  index: number;
  timestamp: number;               // wall-clock seconds, may be fractional
  transactions: readonly Transaction[];
  proof: number;
  previousHash: Hex;
};

export const GENESIS_TIMESTAMP = 1_700_000_000; // fixed so everyone shares same genesis
export const GENESIS_PROOF = 1;

// ---- Canonical encoding (arrays only) ----
// IMPORTANT: if you change field order or number formatting, you hard-fork the chain.
type TransactionArray = [string, string, number];
type BlockArray = [number, number, TransactionArray[], number, Hex];

function blockArray(b: Block): BlockArray {
  return [
    b.index,
    b.timestamp,
    b.transactions.map((tx): TransactionArray => [tx.sender, tx.recipient, tx.amount]),
    b.proof,
    b.previousHash,
  ];
}

const encoder = new TextEncoder();

export function serializeBlock(b: Block): Uint8Array {
  return encoder.encode(JSON.stringify(blockArray(b)));
}

export function hashBlock(b: Block): Hex {
  return digest(serializeBlock(b), BLOCK_SEED);
}

export function freezeTransaction(tx: Transaction): Transaction {
  return Object.freeze({ sender: tx.sender, recipient: tx.recipient, amount: tx.amount });
}

export function freezeBlock(b: Block): Block {
  return Object.freeze({
    index: b.index,
    timestamp: b.timestamp,
    transactions: Object.freeze(b.transactions.map(freezeTransaction)),
    proof: b.proof,
    previousHash: b.previousHash,
  });
}

export function makeGenesis(): Block {
  return freezeBlock({
    index: 0,
    timestamp: GENESIS_TIMESTAMP,
    transactions: [],
    proof: GENESIS_PROOF,
    previousHash: ZERO_HASH,
  });
}

export function isGenesis(b: Block): boolean {
  return (
    b.index === 0 &&
    b.timestamp === GENESIS_TIMESTAMP &&
    b.transactions.length === 0 &&
    b.proof === GENESIS_PROOF &&
    b.previousHash === ZERO_HASH
  );
}

export function nowSeconds(): number {
  return Date.now() / 1000;
}
