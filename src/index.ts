/**
 * @module merkle-funnel
 * @description Deterministic Merkle roots over ordered item sequences.
 *
 * Basic usage:
 * ```typescript
 * import { construct } from 'merkle-funnel';
 *
 * const tree = construct(["alice->bob:10", "bob->charlie:5"]);
 * tree.root();   // 64-char hex SHA-256 root
 * tree.depth();  // 2
 * tree.layers;   // [[leafA, leafB], [root]]
 * ```
 */

export {
  construct,
  root,
  depth,
  layers,
  expectedDepth,
  FunnelTree,
} from "./funnel/reducer";
export { verifyRoot } from "./funnel/verify";
export { digest, fingerprint } from "./crypto/hasher";
export { canonicalJSON, jsonEncoder, encodeItem, isHashable } from "./utils/hash";
export { ConfigManager, initMerkleFunnel } from "./config";
export { registry } from "./metrics";
export {
  MerkleFunnelError,
  EmptyInputError,
  UnsupportedItemError,
  InvariantViolationError,
  ConfigError,
  SnapshotError,
} from "./errors";
export { TreeSnapshotSchema } from "./schema/tree-snapshot";

export type { MerkleFunnelConfig } from "./config";
export type { MerkleFunnelErrorCode } from "./errors";
export type { TreeSnapshot } from "./schema/tree-snapshot";
export type {
  DigestFn,
  EncodedFunnelOptions,
  Encoder,
  Fingerprint,
  FunnelOptions,
  HashAlgo,
  HashInput,
  HashLabel,
  Hashable,
  JSONValue,
  Layer,
  LeafInput,
  LogLevel,
  MerkleFunnelInit,
  PairEncoding,
} from "./types";
