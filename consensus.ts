import type { Block } from "./block";
import { Chain, validateChain } from "./chain";

export type Resolution = {
  chain: Chain;
  replaced: boolean;
};

// Longest valid chain wins; ties keep the local chain. Pure: the caller swaps.
export class ConsensusResolver {
  resolve(local: Chain, candidates: readonly (readonly Block[])[]): Resolution {
    let best: readonly Block[] | null = null;
    let bestLength = local.length;

    for (const cand of candidates) {
      if (cand.length <= bestLength) continue;
      if (!validateChain(cand, local.pow).ok) continue;
      best = cand;
      bestLength = cand.length;
    }

    if (best === null) return { chain: local, replaced: false };
    return { chain: Chain.from(best, local.pow), replaced: true };
  }
}
