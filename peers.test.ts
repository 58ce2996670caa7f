import { afterEach, describe, expect, it, vi } from "vitest";
import { makeGenesis } from "./block";
import { httpChainFetcher, normalizePeer, PeerSet } from "./peers";

describe("normalizePeer", () => {
  it("reduces an address to its origin", () => {
    expect(normalizePeer("127.0.0.1:5000")).toBe("http://127.0.0.1:5000");
    expect(normalizePeer("  localhost:5001  ")).toBe("http://localhost:5001");
    expect(normalizePeer("http://Node.Example:8080/chain?x=1")).toBe("http://node.example:8080");
    expect(normalizePeer("https://node.example:443")).toBe("https://node.example");
  });

  it("rejects what cannot be fetched over http", () => {
    expect(normalizePeer("")).toBeNull();
    expect(normalizePeer("   ")).toBeNull();
    expect(normalizePeer("ftp://node.example")).toBeNull();
    expect(normalizePeer("http://")).toBeNull();
    expect(normalizePeer("bad host:5000")).toBeNull();
  });
});

describe("PeerSet", () => {
  it("stores each origin once", () => {
    const peers = new PeerSet();
    expect(peers.add("localhost:5000")).toBe(true);
    expect(peers.add("http://localhost:5000/")).toBe(false);
    expect(peers.add("ftp://x")).toBe(false);
    expect(peers.add("localhost:5001")).toBe(true);
    expect(peers.size).toBe(2);
    expect(peers.has("http://localhost:5001")).toBe(true);
    expect(peers.has("localhost:5002")).toBe(false);
    expect(peers.list()).toEqual(["http://localhost:5000", "http://localhost:5001"]);
  });
});

type FakeResponse = { ok: boolean; status: number; json: () => Promise<unknown> };

function respond(status: number, body: unknown): FakeResponse {
  return { ok: status >= 200 && status < 300, status, json: async () => body };
}

describe("httpChainFetcher", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the peer's chain", async () => {
    const fetchMock = vi.fn(async () => respond(200, { chain: [makeGenesis()], length: 1 }));
    vi.stubGlobal("fetch", fetchMock);
    await expect(httpChainFetcher(1000)("http://peer.test")).resolves.toEqual([makeGenesis()]);
    expect(fetchMock).toHaveBeenCalledWith("http://peer.test/chain", { signal: expect.any(AbortSignal) });
  });

  it("returns null on an error status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => respond(500, { error: "server-error" })));
    await expect(httpChainFetcher(1000)("http://peer.test")).resolves.toBeNull();
  });

  it("returns null on a malformed body", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => respond(200, { chain: [makeGenesis()], length: 2 })));
    await expect(httpChainFetcher(1000)("http://peer.test")).resolves.toBeNull();

    vi.stubGlobal("fetch", vi.fn(async () => respond(200, { chain: [], length: 0 })));
    await expect(httpChainFetcher(1000)("http://peer.test")).resolves.toBeNull();
  });

  it("returns null when the peer is unreachable", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));
    await expect(httpChainFetcher(1000)("http://peer.test")).resolves.toBeNull();
  });

  it("gives up after the timeout", async () => {
    vi.stubGlobal("fetch", vi.fn((_url: string, init: { signal: AbortSignal }) =>
      new Promise<FakeResponse>((_resolve, reject) => {
        init.signal.addEventListener("abort", () => reject(new Error("aborted")));
      })));
    await expect(httpChainFetcher(10)("http://peer.test")).resolves.toBeNull();
  });
});
