import http from "node:http";
import { createLogger, errMessage } from "./log";
import type { LedgerNode } from "./node";
import { firstIssue, registerNodesSchema, transactionSchema } from "./wire";

const log = createLogger("http");

const MAX_BODY_BYTES = 1_000_000;   // 1MB HTTP body limit

export type Reply = {
  code: number;
  body: unknown;
};

function reply(code: number, body: unknown): Reply {
  return { code, body };
}

// Routing without sockets: the http server below and the tests both call this.
export async function dispatch(node: LedgerNode, method: string, pathname: string, body: unknown): Promise<Reply> {
  if (method === "GET" && pathname === "/health") {
    return reply(200, { ok: true, length: node.chain.length });
  }

  if (method === "GET" && pathname === "/chain") {
    const chain = node.chain;
    return reply(200, { chain: chain.toJSON(), length: chain.length });
  }

  if (method === "GET" && pathname === "/transactions/pending") {
    return reply(200, { transactions: node.pool.list() });
  }

  if (method === "POST" && pathname === "/transactions/new") {
    const parsed = transactionSchema.safeParse(body);
    if (!parsed.success) return reply(400, { error: firstIssue(parsed.error) });
    const { blockIndex, position } = node.submit(parsed.data);
    return reply(201, {
      message: `Transaction will be added to block ${blockIndex}`,
      index: blockIndex,
      position,
    });
  }

  if ((method === "GET" || method === "POST") && pathname === "/mine") {
    const block = await node.mine();
    if (!block) return reply(409, { error: "stale-tip" });
    return reply(200, { message: "New block forged", block });
  }

  if (method === "GET" && pathname === "/nodes") {
    return reply(200, { nodes: node.peers.list() });
  }

  if (method === "POST" && pathname === "/nodes/register") {
    const parsed = registerNodesSchema.safeParse(body);
    if (!parsed.success) return reply(400, { error: firstIssue(parsed.error) });
    const accepted = node.registerPeers(parsed.data.nodes);
    if (accepted.length === 0) return reply(400, { error: "Please supply a valid list of nodes" });
    return reply(201, { message: "New nodes have been added", nodes: node.peers.list() });
  }

  if (method === "GET" && pathname === "/nodes/resolve") {
    const { replaced } = await node.resolveConflicts();
    return reply(200, {
      message: replaced ? "Our chain was replaced" : "Our chain is authoritative",
      replaced,
      chain: node.chain.toJSON(),
    });
  }

  return reply(404, { error: "not-found" });
}

// ---- node:http plumbing ----
function sendJson(res: http.ServerResponse, code: number, obj: unknown): void {
  const body = JSON.stringify(obj);
  res.writeHead(code, {
    "content-type": "application/json",
    "content-length": Buffer.byteLength(body),
  });
  res.end(body);
}

class BodyTooLarge extends Error {
  constructor() {
    super("body-too-large");
  }
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        req.destroy();
        reject(new BodyTooLarge());
        return;
      }
      data += chunk.toString("utf8");
    });
    req.on("end", () => resolve(data));
    req.on("error", reject);
  });
}

export function startServer(node: LedgerNode, port: number, host: string): http.Server {
  const server = http.createServer((req, res) => {
    void handle(node, req, res);
  });
  server.listen(port, host, () => {
    log.info(`listening on http://${host}:${port}`);
  });
  return server;
}

async function handle(node: LedgerNode, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  try {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";

    let body: unknown = null;
    if (method === "POST") {
      const raw = await readBody(req);
      if (raw) {
        try {
          body = JSON.parse(raw);
        } catch {
          return sendJson(res, 400, { error: "bad-json" });
        }
      }
    }

    const out = await dispatch(node, method, url.pathname, body);
    log.debug(`${method} ${url.pathname} ${out.code}`);
    return sendJson(res, out.code, out.body);
  } catch (e) {
    if (e instanceof BodyTooLarge) return sendJson(res, 413, { error: e.message });
    log.error(`${req.method ?? "?"} ${req.url ?? "?"} failed`, e);
    if (!res.headersSent) sendJson(res, 500, { error: "server-error", detail: errMessage(e) });
  }
}
