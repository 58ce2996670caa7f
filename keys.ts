import nacl from "tweetnacl";
import type { Hex } from "./hash";

// Node identity. The public key is only an address (mining rewards go to it);
// nothing in the ledger is signed.

export type Keypair = { pub: Hex; secret: Hex };

function bytesToHex(b: Uint8Array): Hex {
  return Buffer.from(b).toString("hex");
}

export function genKeypair(): Keypair {
  const kp = nacl.sign.keyPair();
  return { pub: bytesToHex(kp.publicKey), secret: bytesToHex(kp.secretKey) };
}

export function isPubKeyHex(x: unknown): x is Hex {
  return typeof x === "string" && /^[0-9a-f]{64}$/i.test(x);
}
