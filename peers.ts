import type { Block } from "./block";
import { createLogger, errMessage } from "./log";
import { chainResponseSchema, firstIssue } from "./wire";

const log = createLogger("peers");

export type ChainFetcher = (peer: string) => Promise<readonly Block[] | null>;

// accept "http://host:port" or bare "host:port"; keep only the origin
export function normalizePeer(addr: string): string | null {
  const raw = addr.trim();
  if (!raw) return null;
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(raw) ? raw : `http://${raw}`;
  try {
    const u = new URL(withScheme);
    if (u.protocol !== "http:" && u.protocol !== "https:") return null;
    if (!u.hostname) return null;
    return u.origin;
  } catch {
    return null;
  }
}

export class PeerSet {
  private readonly peers = new Set<string>();

  add(addr: string): boolean {
    const p = normalizePeer(addr);
    if (p === null || this.peers.has(p)) return false;
    this.peers.add(p);
    return true;
  }

  has(addr: string): boolean {
    const p = normalizePeer(addr);
    return p !== null && this.peers.has(p);
  }

  list(): string[] {
    return Array.from(this.peers);
  }

  get size(): number {
    return this.peers.size;
  }
}

// GET <peer>/chain with a hard timeout. Any failure means "no candidate from this peer".
export function httpChainFetcher(timeoutMs: number): ChainFetcher {
  return async (peer) => {
    const ac = new AbortController();
    const t = setTimeout(() => ac.abort(), timeoutMs);
    try {
      const r = await fetch(peer + "/chain", { signal: ac.signal });
      if (!r.ok) {
        log.warn(`chain-fetch-failed peer=${peer} status=${r.status}`);
        return null;
      }
      const parsed = chainResponseSchema.safeParse(await r.json());
      if (!parsed.success) {
        log.warn(`chain-fetch-bad-shape peer=${peer} ${firstIssue(parsed.error)}`);
        return null;
      }
      return parsed.data.chain;
    } catch (e) {
      log.warn(`chain-fetch-failed peer=${peer} ${errMessage(e)}`);
      return null;
    } finally {
      clearTimeout(t);
    }
  };
}
