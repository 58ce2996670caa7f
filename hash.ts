// Wegman-style universal hash: the fingerprint for blocks and the proof-of-work oracle.
// NOT a cryptographic hash. It only has to be deterministic and look uniform enough
// for a leading-zeros difficulty check.

export type Hex = string;

const MASK32 = 0xffff_ffffn;
const MASK64 = (1n << 64n) - 1n;

const LO_KEY = 0xacef_ade5n;
const HI_KEY = 0xbadb_abe5n;

export const DIGEST_LANES = 4;
const LANE_MASK = 0x0fff_ffffn; // only the low 28 bits of wegmanHash are relied upon
const LANE_HEX = 7;
const LANE_STEP = 0x9e37_79b9n;

export const DIGEST_HEX_WIDTH = DIGEST_LANES * LANE_HEX;
export const ZERO_HASH: Hex = "0".repeat(DIGEST_HEX_WIDTH);

// Domain separation: a block fingerprint can never double as a proof digest.
export const BLOCK_SEED = 0x0b10_c4ed;
export const PROOF_SEED = 0x0000_0077;

export function wegmanHash(x: bigint): bigint {
  if (x < 0n || x > MASK64) throw new RangeError("wegman-input-out-of-range");

  const lo = ((x & MASK32) + LO_KEY) & MASK32;
  const hi = (((x >> 32n) & MASK32) + HI_KEY) & MASK32;
  const product = lo * hi;

  // Bit 32 of the sum can be set; callers mask it away.
  return (product & MASK32) + ((product >> 31n) & MASK32);
}

function toWords(data: Uint8Array): number[] {
  const words: number[] = [];
  for (let i = 0; i < data.length; i += 4) {
    const b0 = data[i] ?? 0;
    const b1 = data[i + 1] ?? 0;
    const b2 = data[i + 2] ?? 0;
    const b3 = data[i + 3] ?? 0;
    words.push((b0 | (b1 << 8) | (b2 << 16) | (b3 << 24)) >>> 0);
  }
  // length word: "ab" and "ab\0" must not collide through the zero padding
  words.push(data.length >>> 0);
  return words;
}

export function digest(data: Uint8Array, seed: number): Hex {
  const words = toWords(data);
  let out = "";
  for (let lane = 0; lane < DIGEST_LANES; lane++) {
    let acc = (BigInt(seed >>> 0) + BigInt(lane) * LANE_STEP) & MASK32;
    for (const w of words) {
      acc = (wegmanHash((acc << 32n) | BigInt(w)) + acc) & MASK32;
    }
    // final self-mix, or the last input bytes barely reach the low lane bits
    acc = wegmanHash((acc << 32n) | acc) & MASK32;
    out += (acc & LANE_MASK).toString(16).padStart(LANE_HEX, "0");
  }
  return out;
}

export function isDigestHex(x: unknown): x is Hex {
  return typeof x === "string" && x.length === DIGEST_HEX_WIDTH && /^[0-9a-f]+$/.test(x);
}
