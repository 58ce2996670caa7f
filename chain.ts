import { type Block, freezeBlock, hashBlock, isGenesis, makeGenesis, nowSeconds, type Transaction } from "./block";
import type { ProofOfWork } from "./pow";

export type ValidationResult = { ok: true } | { ok: false; err: string };

// Each link is two-fold: the full hash of the prior block, and a proof that is a
// function of the prior proof. Returns on the first broken link.
export function validateChain(blocks: readonly Block[], pow: ProofOfWork): ValidationResult {
  if (blocks.length < 1) return { ok: false, err: "empty" };
  if (!isGenesis(blocks[0])) return { ok: false, err: "genesis" };

  for (let i = 1; i < blocks.length; i++) {
    const prev = blocks[i - 1];
    const b = blocks[i];
    if (b.index !== i) return { ok: false, err: `index@${i}` };
    if (b.previousHash !== hashBlock(prev)) return { ok: false, err: `prev@${i}` };
    if (!pow.verify(prev.proof, b.proof)) return { ok: false, err: `proof@${i}` };
    if (b.timestamp < prev.timestamp) return { ok: false, err: `time@${i}` };
  }
  return { ok: true };
}

export class Chain {
  private readonly list: Block[];

  constructor(readonly pow: ProofOfWork) {
    this.list = [makeGenesis()];
  }

  // Wraps blocks as-is; call isValid() before trusting them.
  static from(blocks: readonly Block[], pow: ProofOfWork): Chain {
    if (blocks.length < 1) throw new Error("chain-empty");
    const chain = new Chain(pow);
    chain.list.length = 0;
    for (const b of blocks) chain.list.push(freezeBlock(b));
    return chain;
  }

  get length(): number {
    return this.list.length;
  }

  get blocks(): readonly Block[] {
    return this.list;
  }

  at(index: number): Block | undefined {
    return this.list[index];
  }

  lastBlock(): Block {
    return this.list[this.list.length - 1];
  }

  append(transactions: readonly Transaction[], proof: number, timestamp: number = nowSeconds()): Block {
    const last = this.lastBlock();
    if (!this.pow.verify(last.proof, proof)) throw new Error("invalid-proof");

    const block = freezeBlock({
      index: last.index + 1,
      timestamp: Math.max(timestamp, last.timestamp),
      transactions,
      proof,
      previousHash: hashBlock(last),
    });
    this.list.push(block);
    return block;
  }

  isValid(candidate: readonly Block[] = this.list): boolean {
    return validateChain(candidate, this.pow).ok;
  }

  toJSON(): Block[] {
    return [...this.list];
  }
}
