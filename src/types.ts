/* ------------------------------------------------------------------
 * types.ts  •  Centralised TypeScript types for merkle-funnel
 * ------------------------------------------------------------------ */

/** Lowercase hex rendering of one digest (64 chars for a 256-bit hash) */
export type Fingerprint = string;

/** One level of the reduction, left-to-right */
export type Layer = readonly Fingerprint[];

/** Built-in hash primitives */
export type HashAlgo = "sha256" | "blake3";

/** Algorithm label recorded on a tree; "custom" when a DigestFn was supplied */
export type HashLabel = HashAlgo | "custom";

/**
 * What a parent node hashes:
 *  • raw – the two digests' bytes, left then right
 *  • hex – the two hex strings joined, as UTF-8 text
 */
export type PairEncoding = "raw" | "hex";

export type LogLevel =
  | "error"
  | "warn"
  | "info"
  | "verbose"
  | "debug"
  | "silly";

/** Pluggable hash primitive: bytes in, fixed-length digest out */
export type DigestFn = (data: Uint8Array) => Uint8Array;

/** Bytes handed to the hash primitive; strings are taken as UTF-8 */
export type HashInput = Uint8Array | string;

/* ------------------------------------------------------------------
 * Hashing contract
 * ------------------------------------------------------------------ */

/** Any item type that can describe its own content as bytes */
export interface Hashable {
  toHashInput(): HashInput;
}

/** Item types the reducer accepts without an explicit encoder */
export type LeafInput = HashInput | Hashable;

/** Maps an arbitrary item type onto the hashing contract */
export type Encoder<T> = (item: T) => HashInput;

/** Canonical JSON value accepted by jsonEncoder */
export type JSONValue =
  | string
  | number
  | boolean
  | null
  | JSONValue[]
  | { [key: string]: JSONValue };

/* ------------------------------------------------------------------
 * Options
 * ------------------------------------------------------------------ */

/** Process-wide settings, see ConfigManager */
export interface MerkleFunnelInit {
  /** Primitive used when a call names none (default: 'sha256') */
  hashAlgo?: HashAlgo;

  /** Bytes hashed for each parent (default: 'raw') */
  pairEncoding?: PairEncoding;

  /** winston level (default: 'info') */
  logLevel?: LogLevel;
}

/** Per-call overrides for construct() / verifyRoot() */
export interface FunnelOptions {
  algo?: HashAlgo;

  /** Custom primitive; takes precedence over `algo` */
  hasher?: DigestFn;

  pairEncoding?: PairEncoding;
}

export interface EncodedFunnelOptions<T> extends FunnelOptions {
  encode: Encoder<T>;
}
