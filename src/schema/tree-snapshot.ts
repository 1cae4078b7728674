/**
 * @module tree-snapshot
 * @description Plain-JSON form of a constructed tree. A snapshot names
 * the primitive and pair encoding it was built with so that every
 * parent can be recomputed from its children on import.
 */

import { z } from "zod";

export const FingerprintSchema = z
  .string()
  .regex(/^(?:[0-9a-f]{2})+$/, "fingerprint must be lowercase hex");

/**
 * @example
 * ```typescript
 * const snapshot = {
 *   version: 1,
 *   algo: "sha256",
 *   pairEncoding: "raw",
 *   leafCount: 2,
 *   depth: 2,
 *   root: "9a1c...",
 *   layers: [["3f0a...", "b7e2..."], ["9a1c..."]],
 * };
 *
 * TreeSnapshotSchema.parse(snapshot);
 * ```
 */
export const TreeSnapshotSchema = z.object({
  version: z.literal(1),
  algo: z.enum(["sha256", "blake3", "custom"]),
  pairEncoding: z.enum(["raw", "hex"]),
  leafCount: z.number().int().positive(),
  depth: z.number().int().positive(),
  root: FingerprintSchema,
  layers: z.array(z.array(FingerprintSchema).min(1)).min(1),
});

export type TreeSnapshot = z.infer<typeof TreeSnapshotSchema>;
