// Console logging with a per-component prefix: `[node] mined block index=3 ...`

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 99 };

export function isLogLevel(x: unknown): x is LogLevel {
  return typeof x === "string" && Object.prototype.hasOwnProperty.call(RANK, x);
}

const envLevel = process.env.WEGCHAIN_LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export type Logger = {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
};

export function errMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function createLogger(scope: string): Logger {
  const on = (level: LogLevel) => RANK[level] >= RANK[threshold];
  const prefix = `[${scope}]`;
  return {
    debug: (msg) => { if (on("debug")) console.debug(prefix, msg); },
    info: (msg) => { if (on("info")) console.log(prefix, msg); },
    warn: (msg) => { if (on("warn")) console.warn(prefix, msg); },
    error: (msg, err) => {
      if (!on("error")) return;
      if (err === undefined) console.error(prefix, msg);
      else console.error(prefix, `${msg}: ${errMessage(err)}`);
    },
  };
}
