import { digest, PROOF_SEED } from "./hash";
import { createLogger } from "./log";

const log = createLogger("pow");

export const DEFAULT_DIFFICULTY = 4;  // 4 leading hex zeros ~= 65536 avg tries
export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 12;

export type SearchOptions = {
  start?: number;   // first candidate
  stride?: number;  // candidate step; miners racing on one tip pick distinct strides
};

export type SolveOptions = SearchOptions & {
  batchSize?: number;
  signal?: AbortSignal;
  progressEvery?: number;
};

const DEFAULT_BATCH = 20_000;
const DEFAULT_PROGRESS_EVERY = 100_000;

function isProof(x: number): boolean {
  return Number.isSafeInteger(x) && x >= 0;
}

// concat(prevProof, candidate) as two unsigned 64-bit big-endian integers
export function proofPair(prevProof: number, candidate: number): Uint8Array {
  const bytes = new Uint8Array(16);
  const view = new DataView(bytes.buffer);
  view.setBigUint64(0, BigInt(prevProof));
  view.setBigUint64(8, BigInt(candidate));
  return bytes;
}

export class ProofOfWork {
  readonly difficulty: number;
  private readonly target: string;

  constructor(difficulty: number = DEFAULT_DIFFICULTY) {
    if (!Number.isSafeInteger(difficulty) || difficulty < MIN_DIFFICULTY || difficulty > MAX_DIFFICULTY) {
      throw new RangeError(`bad difficulty ${difficulty}`);
    }
    this.difficulty = difficulty;
    this.target = "0".repeat(difficulty);
  }

  valid(prevProof: number, candidate: number): boolean {
    return digest(proofPair(prevProof, candidate), PROOF_SEED).startsWith(this.target);
  }

  verify(prevProof: number, proof: number): boolean {
    if (!isProof(prevProof) || !isProof(proof)) return false;
    return this.valid(prevProof, proof);
  }

  // Blocking brute force. Unbounded: returns only when a proof is found.
  search(prevProof: number, opts: SearchOptions = {}): number {
    const stride = opts.stride ?? 1;
    let proof = opts.start ?? 0;
    while (!this.valid(prevProof, proof)) proof += stride;
    return proof;
  }

  // Same candidate sequence as search(), in batches that yield to the event loop.
  // Resolves null once `signal` is aborted.
  solve(prevProof: number, opts: SolveOptions = {}): Promise<number | null> {
    const stride = opts.stride ?? 1;
    const batchSize = opts.batchSize ?? DEFAULT_BATCH;
    const progressEvery = opts.progressEvery ?? DEFAULT_PROGRESS_EVERY;
    const signal = opts.signal;
    let proof = opts.start ?? 0;
    let tried = 0;

    return new Promise((resolve) => {
      const tick = () => {
        if (signal?.aborted) {
          log.debug(`search aborted prev=${prevProof} tried=${tried}`);
          resolve(null);
          return;
        }
        for (let i = 0; i < batchSize; i++) {
          if (this.valid(prevProof, proof)) {
            resolve(proof);
            return;
          }
          proof += stride;
          tried++;
          if (tried % progressEvery === 0) log.debug(`guess = ${proof}...`);
        }
        setImmediate(tick);
      };
      setImmediate(tick);
    });
  }
}
