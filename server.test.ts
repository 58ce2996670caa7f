import { beforeEach, describe, expect, it } from "vitest";
import { makeGenesis } from "./block";
import { LedgerNode } from "./node";
import { dispatch } from "./server";

describe("dispatch", () => {
  let node: LedgerNode;

  beforeEach(() => {
    node = new LedgerNode({ difficulty: 2, fetchChain: async () => null });
  });

  it("reports health and the chain", async () => {
    expect(await dispatch(node, "GET", "/health", null)).toEqual({ code: 200, body: { ok: true, length: 1 } });
    expect(await dispatch(node, "GET", "/chain", null)).toEqual({
      code: 200,
      body: { chain: [makeGenesis()], length: 1 },
    });
  });

  it("queues a transaction for the next block", async () => {
    const res = await dispatch(node, "POST", "/transactions/new", { sender: "a", recipient: "b", amount: 5 });
    expect(res).toEqual({
      code: 201,
      body: { message: "Transaction will be added to block 1", index: 1, position: 0 },
    });
    expect(await dispatch(node, "GET", "/transactions/pending", null)).toEqual({
      code: 200,
      body: { transactions: [{ sender: "a", recipient: "b", amount: 5 }] },
    });
  });

  it("names the first problem with a malformed transaction", async () => {
    expect(await dispatch(node, "POST", "/transactions/new", { sender: "a", recipient: "b" }))
      .toEqual({ code: 400, body: { error: "amount: amount is required" } });
    expect(await dispatch(node, "POST", "/transactions/new", { sender: "a", recipient: "b", amount: "1" }))
      .toEqual({ code: 400, body: { error: "amount: Expected number, received string" } });
    expect(await dispatch(node, "POST", "/transactions/new", { sender: "a", recipient: "b", amount: 1, memo: "x" }))
      .toEqual({ code: 400, body: { error: "Unrecognized key(s) in object: 'memo'" } });
    expect(await dispatch(node, "POST", "/transactions/new", null))
      .toEqual({ code: 400, body: { error: "Expected object, received null" } });
    expect(node.pool.size).toBe(0);
  });

  it("mines a block on request", async () => {
    await dispatch(node, "POST", "/transactions/new", { sender: "a", recipient: "b", amount: 5 });
    const res = await dispatch(node, "GET", "/mine", null);
    expect(res.code).toBe(200);
    expect(res.body).toEqual({
      message: "New block forged",
      block: node.chain.lastBlock(),
    });
    expect(node.chain.lastBlock().proof).toBe(247);
    expect(node.chain.lastBlock().transactions).toEqual([{ sender: "a", recipient: "b", amount: 5 }]);
  });

  it("registers and lists peers", async () => {
    const res = await dispatch(node, "POST", "/nodes/register", { nodes: ["127.0.0.1:5001", "http://Peer.test:80/x"] });
    expect(res).toEqual({
      code: 201,
      body: { message: "New nodes have been added", nodes: ["http://127.0.0.1:5001", "http://peer.test"] },
    });
    expect(await dispatch(node, "GET", "/nodes", null)).toEqual({
      code: 200,
      body: { nodes: ["http://127.0.0.1:5001", "http://peer.test"] },
    });
  });

  it("refuses an unusable peer list", async () => {
    expect(await dispatch(node, "POST", "/nodes/register", { nodes: [] }))
      .toEqual({ code: 400, body: { error: "nodes: Please supply a valid list of nodes" } });
    expect(await dispatch(node, "POST", "/nodes/register", { nodes: ["ftp://x"] }))
      .toEqual({ code: 400, body: { error: "Please supply a valid list of nodes" } });
    expect(node.peers.size).toBe(0);
  });

  it("runs consensus", async () => {
    const res = await dispatch(node, "GET", "/nodes/resolve", null);
    expect(res).toEqual({
      code: 200,
      body: { message: "Our chain is authoritative", replaced: false, chain: [makeGenesis()] },
    });
  });

  it("adopts a longer chain through consensus", async () => {
    const other = new LedgerNode({ difficulty: 2, fetchChain: async () => null });
    await other.mine();
    const follower = new LedgerNode({ difficulty: 2, fetchChain: async () => other.chain.toJSON() });
    follower.registerPeers(["other.test"]);
    const res = await dispatch(follower, "GET", "/nodes/resolve", null);
    expect(res.body).toEqual({ message: "Our chain was replaced", replaced: true, chain: other.chain.toJSON() });
  });

  it("answers unknown routes with 404", async () => {
    expect(await dispatch(node, "GET", "/nope", null)).toEqual({ code: 404, body: { error: "not-found" } });
    expect(await dispatch(node, "DELETE", "/chain", null)).toEqual({ code: 404, body: { error: "not-found" } });
  });
});
