// wegchain: an educational proof-of-work ledger node.
// - Blocks are linked by a Wegman-style universal hash (fast, NOT cryptographic).
// - Peers converge on the longest valid chain; no leader, no signatures.
//
// DISCLAIMER: This is a toy. Transactions are unauthenticated value transfers.

import { type Args, loadConfig, parseArgs } from "./config";
import { genKeypair } from "./keys";
import { createLogger, errMessage, setLogLevel } from "./log";
import { LedgerNode } from "./node";
import { httpChainFetcher, normalizePeer } from "./peers";
import { startServer } from "./server";
import { simulate } from "./simulate";
import { transactionSchema, firstIssue } from "./wire";

const log = createLogger("main");

function usage(): void {
  console.log([
    "wegchain",
    "node mode:",
    "  --port=5000 --host=127.0.0.1 --difficulty=4 --batch=20000 --peers=<origin,...>",
    "  --mine [--reward=1 --address=<pubhex>] --data-dir=<dir> --sync-ms=15000",
    "  --fetch-timeout-ms=1500 --log-level=info   (env: WEGCHAIN_<FLAG>, e.g. WEGCHAIN_PORT)",
    "client mode (against --node=http://127.0.0.1:5000):",
    "  --chain | --pending | --mine-now | --resolve | --peers-list",
    "  --add-tx='{\"sender\":\"a\",\"recipient\":\"b\",\"amount\":1}' | --add-peer=<origin>",
    "tools:",
    "  --keygen | --simulate [--miners=3 --blocks=2 --difficulty=3]",
  ].join("\n"));
}

async function request(node: string, path: string, init?: { method: string; body: unknown }): Promise<unknown> {
  const r = await fetch(node + path, init && {
    method: init.method,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(init.body),
  });
  const body: unknown = await r.json();
  if (!r.ok) throw new Error(`request-rejected ${path} status=${r.status} body=${JSON.stringify(body)}`);
  return body;
}

function print(obj: unknown): void {
  console.log(JSON.stringify(obj, null, 2));
}

function intArg(args: Args, key: string, fallback: number): number {
  const v = args[key];
  if (v === undefined) return fallback;
  const n = Number(v);
  if (typeof v !== "string" || !Number.isSafeInteger(n)) throw new Error(`bad --${key}`);
  return n;
}

// Returns true when a one-shot client command ran.
async function runClient(args: Args): Promise<boolean> {
  const node = normalizePeer(typeof args["node"] === "string" ? args["node"] : "http://127.0.0.1:5000");
  if (node === null) throw new Error("bad --node");

  if (args["chain"]) {
    print(await request(node, "/chain"));
    return true;
  }
  if (args["pending"]) {
    print(await request(node, "/transactions/pending"));
    return true;
  }
  if (args["mine-now"]) {
    print(await request(node, "/mine"));
    return true;
  }
  if (args["resolve"]) {
    print(await request(node, "/nodes/resolve"));
    return true;
  }
  if (args["peers-list"]) {
    print(await request(node, "/nodes"));
    return true;
  }
  if (args["add-peer"]) {
    print(await request(node, "/nodes/register", { method: "POST", body: { nodes: [String(args["add-peer"])] } }));
    return true;
  }
  if (args["add-tx"]) {
    const parsed = transactionSchema.safeParse(JSON.parse(String(args["add-tx"])));
    if (!parsed.success) throw new Error(`bad --add-tx: ${firstIssue(parsed.error)}`);
    print(await request(node, "/transactions/new", { method: "POST", body: parsed.data }));
    return true;
  }
  return false;
}

async function runNode(args: Args): Promise<void> {
  const cfg = loadConfig(args);
  setLogLevel(cfg.logLevel);

  const node = new LedgerNode({
    difficulty: cfg.difficulty,
    address: cfg.address,
    reward: cfg.reward,
    batchSize: cfg.batchSize,
    fetchChain: httpChainFetcher(cfg.fetchTimeoutMs),
    dataDir: cfg.dataDir ?? null,
  });
  if (cfg.peers.length > 0) node.registerPeers(cfg.peers);

  startServer(node, cfg.port, cfg.host);

  // initial sync (best-effort)
  node.resolveConflicts().catch((e) => log.error("initial-sync-failed", e));
  if (cfg.syncIntervalMs > 0) node.startSync(cfg.syncIntervalMs);
  if (cfg.mine) node.startMining();
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args["help"] || args["h"]) {
    usage();
    return;
  }
  if (args["keygen"]) {
    print(genKeypair());
    return;
  }
  if (args["simulate"]) {
    print(await simulate({
      miners: intArg(args, "miners", 3),
      blocks: intArg(args, "blocks", 2),
      difficulty: intArg(args, "difficulty", 3),
    }));
    return;
  }
  if (await runClient(args)) return;

  await runNode(args);
}

main().catch((e) => {
  console.error(errMessage(e));
  process.exit(1);
});
