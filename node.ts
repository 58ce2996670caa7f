import type { Block, Transaction } from "./block";
import { Chain } from "./chain";
import { ConsensusResolver } from "./consensus";
import { genKeypair } from "./keys";
import { createLogger, errMessage, type Logger } from "./log";
import { type ChainFetcher, httpChainFetcher, normalizePeer, PeerSet } from "./peers";
import { TransactionPool } from "./pool";
import { ProofOfWork } from "./pow";
import { loadSnapshot, saveSnapshot } from "./snapshot";

// Sender of the reward transaction a node pays itself for a mined block.
export const MINE_SENDER = "0";

const DEFAULT_FETCH_TIMEOUT_MS = 1500;

export type NodeOptions = {
  name?: string;              // log scope
  difficulty?: number;
  address?: string;           // reward recipient; a fresh ed25519 public key if unset
  reward?: number;            // 0 = no reward transaction
  batchSize?: number;
  start?: number;
  stride?: number;
  fetchChain?: ChainFetcher;
  dataDir?: string | null;    // chain snapshot directory; null = memory only
};

export type Submission = {
  blockIndex: number;         // index of the block the transaction is queued for
  position: number;           // its position inside that block
};

export type ResolveOutcome = {
  replaced: boolean;
  length: number;
};

export class LedgerNode {
  readonly pow: ProofOfWork;
  readonly pool = new TransactionPool();
  readonly peers = new PeerSet();
  readonly address: string;
  readonly reward: number;

  private current: Chain;
  private readonly resolver = new ConsensusResolver();
  private readonly fetchChain: ChainFetcher;
  private readonly dataDir: string | null;
  private readonly batchSize: number | undefined;
  private readonly start: number | undefined;
  private readonly stride: number | undefined;
  private readonly log: Logger;

  private readonly searches = new Set<AbortController>();
  private lock: Promise<void> = Promise.resolve();
  private mining = false;
  private syncTimer: NodeJS.Timeout | null = null;

  constructor(opts: NodeOptions = {}) {
    this.log = createLogger(opts.name ?? "node");
    this.pow = new ProofOfWork(opts.difficulty);
    this.address = opts.address ?? genKeypair().pub;
    this.reward = opts.reward ?? 0;
    this.batchSize = opts.batchSize;
    this.start = opts.start;
    this.stride = opts.stride;
    this.fetchChain = opts.fetchChain ?? httpChainFetcher(DEFAULT_FETCH_TIMEOUT_MS);
    this.dataDir = opts.dataDir ?? null;

    this.current = new Chain(this.pow);
    if (this.dataDir !== null) {
      const saved = loadSnapshot(this.dataDir, this.pow);
      if (saved) this.current = Chain.from(saved, this.pow);
    }
  }

  // The current chain handle. Consensus swaps it wholesale; never mutate through it.
  get chain(): Chain {
    return this.current;
  }

  submit(tx: Transaction): Submission {
    const position = this.pool.add(tx);
    return { blockIndex: this.current.lastBlock().index + 1, position };
  }

  registerPeers(addrs: readonly string[]): string[] {
    const accepted: string[] = [];
    for (const a of addrs) {
      const p = normalizePeer(a);
      if (p === null) {
        this.log.warn(`bad-peer ${JSON.stringify(a)}`);
        continue;
      }
      if (this.peers.add(p)) this.log.info(`peer added ${p}`);
      if (!accepted.includes(p)) accepted.push(p);
    }
    return accepted;
  }

  // Search outside the lock, append inside it. A search whose tip was replaced
  // meanwhile is discarded (null), as is an aborted one.
  async mine(): Promise<Block | null> {
    const tip = this.current.lastBlock();
    const ac = new AbortController();
    this.searches.add(ac);

    let proof: number | null;
    try {
      proof = await this.pow.solve(tip.proof, {
        start: this.start,
        stride: this.stride,
        batchSize: this.batchSize,
        signal: ac.signal,
      });
    } finally {
      this.searches.delete(ac);
    }
    if (proof === null) return null;
    const found = proof;

    return this.exclusive(() => {
      if (this.current.lastBlock() !== tip) {
        this.log.info(`stale-proof discarded index=${tip.index + 1} proof=${found}`);
        return null;
      }
      if (!this.pow.verify(tip.proof, found)) throw new Error("mined-proof-invalid");

      if (this.reward > 0) {
        this.pool.add({ sender: MINE_SENDER, recipient: this.address, amount: this.reward });
      }
      const block = this.current.append(this.pool.drain(), found);
      this.persist();
      this.log.info(`mined block index=${block.index} proof=${block.proof} txs=${block.transactions.length}`);
      return block;
    });
  }

  async resolveConflicts(): Promise<ResolveOutcome> {
    const fetched = await Promise.all(this.peers.list().map((p) => this.fetchFrom(p)));
    const candidates = fetched.filter((c): c is readonly Block[] => c !== null);

    return this.exclusive(() => {
      const res = this.resolver.resolve(this.current, candidates);
      if (res.replaced) {
        const before = this.current.length;
        this.current = res.chain;
        this.abortSearches();
        this.persist();
        this.log.info(`chain replaced length=${before}->${res.chain.length} candidates=${candidates.length}`);
      }
      return { replaced: res.replaced, length: this.current.length };
    });
  }

  startMining(): void {
    if (this.mining) return;
    this.mining = true;
    this.log.info(`mining to ${this.address}`);

    const loop = async () => {
      while (this.mining) {
        await this.mine();
        await new Promise<void>((r) => setImmediate(r));
      }
    };
    loop().catch((e) => {
      this.mining = false;
      this.log.error("mining-stopped", e);
    });
  }

  stopMining(): void {
    this.mining = false;
    this.abortSearches();
  }

  get isMining(): boolean {
    return this.mining;
  }

  startSync(intervalMs: number): void {
    this.stopSync();
    this.syncTimer = setInterval(() => {
      this.resolveConflicts().catch((e) => this.log.error("sync-failed", e));
    }, intervalMs);
    this.syncTimer.unref();
  }

  stopSync(): void {
    if (this.syncTimer !== null) clearInterval(this.syncTimer);
    this.syncTimer = null;
  }

  stop(): void {
    this.stopSync();
    this.stopMining();
  }

  private async fetchFrom(peer: string): Promise<readonly Block[] | null> {
    try {
      return await this.fetchChain(peer);
    } catch (e) {
      this.log.warn(`peer-unreachable ${peer} ${errMessage(e)}`);
      return null;
    }
  }

  private abortSearches(): void {
    for (const ac of this.searches) ac.abort();
    this.searches.clear();
  }

  private persist(): void {
    if (this.dataDir === null) return;
    try {
      saveSnapshot(this.dataDir, this.current.blocks);
    } catch (e) {
      this.log.error("snapshot-save-failed", e);
    }
  }

  // One chain mutation at a time. A failing task rejects its caller only.
  private exclusive<T>(task: () => T): Promise<T> {
    const run = this.lock.then(task);
    this.lock = run.then(() => undefined, () => undefined);
    return run;
  }
}
