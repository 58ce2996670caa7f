import fs from "node:fs";
import path from "node:path";
import type { Block } from "./block";
import { validateChain } from "./chain";
import { createLogger } from "./log";
import type { ProofOfWork } from "./pow";
import { firstIssue, SNAPSHOT_VERSION, snapshotSchema } from "./wire";

const log = createLogger("snapshot");

export const CHAIN_FILE = "chain.json";

export function saveSnapshot(dir: string, blocks: readonly Block[]): void {
  const file = path.join(dir, CHAIN_FILE);
  fs.mkdirSync(dir, { recursive: true });
  const tmp = file + ".tmp";
  fs.writeFileSync(tmp, JSON.stringify({ version: SNAPSHOT_VERSION, chain: blocks }), "utf8");
  fs.renameSync(tmp, file);
}

// A snapshot is trusted no more than a peer's chain: shape-checked, then fully validated.
export function loadSnapshot(dir: string, pow: ProofOfWork): Block[] | null {
  const file = path.join(dir, CHAIN_FILE);
  if (!fs.existsSync(file)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (e) {
    log.error("snapshot-load-failed", e);
    return null;
  }

  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    log.error(`snapshot-load-failed: bad-format ${firstIssue(parsed.error)}`);
    return null;
  }
  const res = validateChain(parsed.data.chain, pow);
  if (!res.ok) {
    log.error(`snapshot-load-failed: bad-chain ${res.err}`);
    return null;
  }
  log.info(`loaded snapshot length=${parsed.data.chain.length}`);
  return parsed.data.chain;
}
