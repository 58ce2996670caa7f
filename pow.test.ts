import { describe, expect, it } from "vitest";
import { ProofOfWork, proofPair } from "./pow";

describe("proofPair", () => {
  it("packs both proofs as big-endian u64", () => {
    expect(Array.from(proofPair(1, 247))).toEqual([0, 0, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0, 247]);
    expect(Array.from(proofPair(0x1_0000_0000, 0)).slice(0, 8)).toEqual([0, 0, 0, 1, 0, 0, 0, 0]);
  });
});

describe("ProofOfWork", () => {
  it("rejects difficulties outside the supported range", () => {
    expect(() => new ProofOfWork(0)).toThrow(RangeError);
    expect(() => new ProofOfWork(13)).toThrow("bad difficulty 13");
    expect(() => new ProofOfWork(1.5)).toThrow(RangeError);
    expect(new ProofOfWork().difficulty).toBe(4);
  });

  it("finds the smallest valid candidate", () => {
    expect(new ProofOfWork(1).search(1)).toBe(24);
    expect(new ProofOfWork(2).search(1)).toBe(247);
    expect(new ProofOfWork(3).search(1)).toBe(721);
    expect(new ProofOfWork(4).search(1)).toBe(78459);
  });

  it("walks the candidate sequence given by start and stride", () => {
    expect(new ProofOfWork(1).search(1, { stride: 3 })).toBe(24);
    expect(new ProofOfWork(1).search(1, { start: 5, stride: 2 })).toBe(45);
    expect(new ProofOfWork(2).search(1, { stride: 3 })).toBe(1107);
    expect(new ProofOfWork(2).search(1, { start: 5, stride: 2 })).toBe(247);
    expect(new ProofOfWork(3).search(1, { stride: 3 })).toBe(6801);
  });

  it("verifies against the previous proof", () => {
    const pow = new ProofOfWork(2);
    expect(pow.verify(1, 247)).toBe(true);
    expect(pow.verify(1, 246)).toBe(false);
    expect(pow.verify(2, 247)).toBe(pow.valid(2, 247));
  });

  it("refuses proofs that are not non-negative safe integers", () => {
    const pow = new ProofOfWork(1);
    expect(pow.verify(1, -24)).toBe(false);
    expect(pow.verify(1, 24.5)).toBe(false);
    expect(pow.verify(-1, 24)).toBe(false);
    expect(pow.verify(1, Number.MAX_SAFE_INTEGER + 1)).toBe(false);
    expect(pow.verify(1, 24)).toBe(true);
  });

  it("accepts a proof the search produced", () => {
    const pow = new ProofOfWork(2);
    for (const prev of [0, 1, 247, 99_999]) {
      expect(pow.verify(prev, pow.search(prev))).toBe(true);
    }
  });
});

describe("ProofOfWork.solve", () => {
  it("yields the same proof as search", async () => {
    const pow = new ProofOfWork(2);
    await expect(pow.solve(1)).resolves.toBe(247);
    await expect(pow.solve(1, { batchSize: 7, stride: 3 })).resolves.toBe(1107);
    await expect(pow.solve(1, { batchSize: 1, start: 5, stride: 2 })).resolves.toBe(247);
  });

  it("resolves null when aborted before the first batch", async () => {
    const ac = new AbortController();
    ac.abort();
    await expect(new ProofOfWork(1).solve(1, { signal: ac.signal })).resolves.toBeNull();
  });

  it("resolves null when aborted mid-search", async () => {
    const ac = new AbortController();
    const pending = new ProofOfWork(4).solve(1, { batchSize: 10, signal: ac.signal });
    await new Promise<void>((r) => setImmediate(r));
    ac.abort();
    await expect(pending).resolves.toBeNull();
  });
});
