import { z } from "zod";
import { isPubKeyHex } from "./keys";
import type { LogLevel } from "./log";
import { DEFAULT_DIFFICULTY, MAX_DIFFICULTY, MIN_DIFFICULTY } from "./pow";

export type Args = Record<string, string | boolean>;

export function parseArgs(argv: string[]): Args {
  const out: Args = {};
  for (const a of argv) {
    if (!a.startsWith("--")) continue;
    const raw = a.slice(2);
    const eq = raw.indexOf("=");
    if (eq === -1) out[raw] = true;
    else out[raw.slice(0, eq)] = raw.slice(eq + 1);
  }
  return out;
}

// flag name -> env var consulted when the flag is absent
const ENV: Record<string, string> = {
  port: "WEGCHAIN_PORT",
  host: "WEGCHAIN_HOST",
  difficulty: "WEGCHAIN_DIFFICULTY",
  batch: "WEGCHAIN_BATCH",
  reward: "WEGCHAIN_REWARD",
  address: "WEGCHAIN_ADDRESS",
  peers: "WEGCHAIN_PEERS",
  "data-dir": "WEGCHAIN_DATA_DIR",
  "sync-ms": "WEGCHAIN_SYNC_MS",
  "fetch-timeout-ms": "WEGCHAIN_FETCH_TIMEOUT_MS",
  mine: "WEGCHAIN_MINE",
  "log-level": "WEGCHAIN_LOG_LEVEL",
};

const flag = z.union([z.boolean(), z.enum(["1", "true", "0", "false"])])
  .transform((v) => v === true || v === "1" || v === "true");

// numbers arrive as strings from argv and env; a bare `--port` (true) is rejected
const intIn = (lo: number, hi: number) => z.string().trim().min(1).pipe(z.coerce.number().int().min(lo).max(hi));

const configSchema = z.object({
  port: intIn(1, 65535).default("5000"),
  host: z.string().min(1).default("127.0.0.1"),
  difficulty: intIn(MIN_DIFFICULTY, MAX_DIFFICULTY).default(String(DEFAULT_DIFFICULTY)),
  batch: intIn(1, 10_000_000).default("20000"),
  reward: z.string().trim().min(1).pipe(z.coerce.number().finite().nonnegative()).default("0"),
  address: z.string().refine(isPubKeyHex, "expected 32-byte pubkey hex").optional(),
  peers: z.string().default("")
    .transform((s) => s.split(",").map((p) => p.trim()).filter(Boolean)),
  "data-dir": z.string().min(1).optional(),
  "sync-ms": intIn(0, 86_400_000).default("15000"),
  "fetch-timeout-ms": intIn(1, 600_000).default("1500"),
  mine: flag.default(false),
  "log-level": z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type NodeConfig = {
  port: number;
  host: string;
  difficulty: number;
  batchSize: number;
  reward: number;
  address: string | undefined;
  peers: string[];
  dataDir: string | undefined;
  syncIntervalMs: number;
  fetchTimeoutMs: number;
  mine: boolean;
  logLevel: LogLevel;
};

// flags win over env, env wins over defaults
export function loadConfig(args: Args, env: NodeJS.ProcessEnv = process.env): NodeConfig {
  const merged: Record<string, string | boolean> = {};
  for (const [key, envName] of Object.entries(ENV)) {
    const v = args[key] ?? env[envName];
    if (v !== undefined) merged[key] = v;
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`bad --${issue?.path.join(".") ?? "config"}${issue ? ` (${issue.message})` : ""}`);
  }
  const c = parsed.data;

  return {
    port: c.port,
    host: c.host,
    difficulty: c.difficulty,
    batchSize: c.batch,
    reward: c.reward,
    address: c.address,
    peers: c.peers,
    dataDir: c["data-dir"],
    syncIntervalMs: c["sync-ms"],
    fetchTimeoutMs: c["fetch-timeout-ms"],
    mine: c.mine,
    logLevel: c["log-level"],
  };
}
