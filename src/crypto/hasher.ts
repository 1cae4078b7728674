/* ------------------------------------------------------------------
 * hasher.ts  •  Digest primitives + fingerprinting for merkle-funnel
 * ------------------------------------------------------------------
 *  ▸ digest(data, algo)        – raw digest bytes
 *  ▸ fingerprint(data, algo)   – lowercase hex of the digest
 *  ▸ createFingerprinter(...)  – leaf/pair hashing bound to one
 *                                primitive and one pair encoding
 *
 *  Notes
 *  -----
 *  • SHA-256 path uses Node's built-in crypto
 *  • @napi-rs/blake-hash returns a Buffer for BLAKE3
 *  • the reducer only ever sees hex fingerprints; bytes are recovered
 *    from them when a pair is joined in 'raw' mode
 * ------------------------------------------------------------------ */

import { createHash } from "node:crypto";
import { blake3 } from "@napi-rs/blake-hash";

import { ConfigError, invariant } from "../errors";
import type {
  DigestFn,
  Fingerprint,
  HashAlgo,
  HashInput,
  PairEncoding,
} from "../types";

/** Strings are hashed as their UTF-8 bytes */
export function toBytes(input: HashInput): Buffer {
  if (typeof input === "string") return Buffer.from(input, "utf8");
  return Buffer.from(input.buffer, input.byteOffset, input.byteLength);
}

const primitives: Record<HashAlgo, DigestFn> = {
  sha256: (data) => createHash("sha256").update(data).digest(),
  blake3: (data) => blake3(toBytes(data)),
};

export function digestFor(algo: HashAlgo): DigestFn {
  const fn = primitives[algo];
  if (typeof fn !== "function") {
    throw new ConfigError(`unknown hash algorithm "${String(algo)}"`);
  }
  return fn;
}

export function digest(data: HashInput, algo: HashAlgo = "sha256"): Buffer {
  return toBytes(digestFor(algo)(toBytes(data)));
}

export function fingerprint(
  data: HashInput,
  algo: HashAlgo = "sha256"
): Fingerprint {
  return digest(data, algo).toString("hex");
}

/* ---------- Leaf / pair hashing ----------------------------------- */

export interface Fingerprinter {
  leaf(data: HashInput): Fingerprint;
  pair(left: Fingerprint, right: Fingerprint): Fingerprint;
}

const joiners: Record<
  PairEncoding,
  (left: Fingerprint, right: Fingerprint) => Buffer
> = {
  raw: (left, right) =>
    Buffer.concat([Buffer.from(left, "hex"), Buffer.from(right, "hex")]),
  hex: (left, right) => Buffer.from(left + right, "utf8"),
};

/**
 * Binds a primitive to an encoding. Every digest it produces must be
 * non-empty and as long as the first one; a primitive that breaks this
 * cannot yield a well-formed tree.
 */
export function createFingerprinter(
  fn: DigestFn,
  encoding: PairEncoding
): Fingerprinter {
  const join = joiners[encoding];
  if (typeof join !== "function") {
    throw new ConfigError(`unknown pair encoding "${String(encoding)}"`);
  }

  let width = 0;
  const hash = (data: Buffer): Fingerprint => {
    const out = fn(data);
    invariant(out.length > 0, "digest primitive returned an empty digest");
    if (width === 0) width = out.length;
    invariant(
      out.length === width,
      `digest length changed from ${width} to ${out.length} bytes`
    );
    return toBytes(out).toString("hex");
  };

  return {
    leaf: (data) => hash(toBytes(data)),
    pair: (left, right) => hash(join(left, right)),
  };
}
