import { freezeTransaction, type Transaction } from "./block";

// Pending transactions for the next block. drain() swaps the list out in one
// synchronous step, so an add() lands either in the drained batch or the next one.
export class TransactionPool {
  private pending: Transaction[] = [];

  // Returns the position the transaction will take in the next mined block.
  add(tx: Transaction): number {
    const position = this.pending.length;
    this.pending.push(freezeTransaction(tx));
    return position;
  }

  drain(): Transaction[] {
    const out = this.pending;
    this.pending = [];
    return out;
  }

  get size(): number {
    return this.pending.length;
  }

  list(): Transaction[] {
    return [...this.pending];
  }
}
