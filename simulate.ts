// In-process mining race: several nodes mine on the same tip with distinct
// strides, the first proof wins the round and everyone else adopts it through
// the ordinary consensus path.

import { type Block, hashBlock } from "./block";
import { genKeypair } from "./keys";
import { createLogger } from "./log";
import { LedgerNode } from "./node";
import type { ChainFetcher } from "./peers";

const log = createLogger("simulate");

// odd strides are coprime with any power of two, so every miner covers all candidates eventually
export const STRIDES = [3, 5, 7, 11, 13, 17, 19, 23];

export type SimulationOptions = {
  miners?: number;
  blocks?: number;
  difficulty?: number;
  batchSize?: number;
};

export type RoundResult = {
  round: number;
  winner: string;
  index: number;
  proof: number;
};

export type SimulationReport = {
  miners: { name: string; address: string; length: number; tip: string; valid: boolean }[];
  rounds: RoundResult[];
  converged: boolean;
};

type Won = { i: number; block: Block };

export async function simulate(opts: SimulationOptions = {}): Promise<SimulationReport> {
  const count = opts.miners ?? 3;
  const blocks = opts.blocks ?? 2;
  if (!Number.isSafeInteger(count) || count < 2 || count > STRIDES.length) {
    throw new RangeError(`miners must be between 2 and ${STRIDES.length}`);
  }
  if (!Number.isSafeInteger(blocks) || blocks < 1) throw new RangeError("blocks must be a positive integer");

  // peers are addressed by a fake origin and fetched straight from memory
  const byOrigin = new Map<string, LedgerNode>();
  const fetchChain: ChainFetcher = async (peer) => byOrigin.get(peer)?.chain.toJSON() ?? null;

  const strides = STRIDES.slice(0, count);
  const names = strides.map((s) => `M${s}`);
  const origins = names.map((n) => `http://${n.toLowerCase()}.sim`);
  const nodes = strides.map((stride, i) => {
    const node = new LedgerNode({
      name: names[i],
      difficulty: opts.difficulty,
      address: genKeypair().pub,
      reward: 1,
      stride,
      batchSize: opts.batchSize ?? 64,
      fetchChain,
    });
    byOrigin.set(origins[i], node);
    return node;
  });
  for (const [i, node] of nodes.entries()) {
    node.registerPeers(origins.filter((_, j) => j !== i));
  }

  const rounds: RoundResult[] = [];
  for (let round = 1; round <= blocks; round++) {
    log.info(`mining block #${round}...`);
    const attempts = nodes.map((node, i) => node.mine().then((block) => ({ i, block })));

    const first = await Promise.race(
      attempts.map((a) => a.then((r) => (r.block === null ? never() : { i: r.i, block: r.block }))),
    );
    rounds.push({ round, winner: names[first.i], index: first.block.index, proof: first.block.proof });

    // losers adopt the winner's chain, which aborts their searches
    await Promise.all(nodes.map((n) => n.resolveConflicts()));
    await Promise.all(attempts);
  }

  const tips = nodes.map((n) => hashBlock(n.chain.lastBlock()));
  const report: SimulationReport = {
    miners: nodes.map((n, i) => ({
      name: names[i],
      address: n.address,
      length: n.chain.length,
      tip: tips[i],
      valid: n.chain.isValid(),
    })),
    rounds,
    converged: tips.every((t) => t === tips[0]) && nodes.every((n) => n.chain.isValid()),
  };
  log.info(`done converged=${report.converged} length=${nodes[0].chain.length}`);
  return report;
}

// Pending forever; keeps discarded attempts out of Promise.race.
function never(): Promise<Won> {
  return new Promise(() => undefined);
}
