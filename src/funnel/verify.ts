import { FunnelTree } from "./reducer";
import { log } from "../utils/logger";
import type {
  EncodedFunnelOptions,
  Encoder,
  Fingerprint,
  FunnelOptions,
  LeafInput,
} from "../types";

/**
 * Recomputes the root over `items` and compares it with `expectedRoot`
 * (hex, any case). Empty input still throws EmptyInputError.
 *
 * @example
 * ```typescript
 * const { root } = construct(batch).toJSON();
 * // later, after reloading the batch from storage
 * verifyRoot(reloaded, root); // false if any item changed or moved
 * ```
 */
export function verifyRoot(
  items: readonly LeafInput[],
  expectedRoot: Fingerprint,
  options?: FunnelOptions
): boolean;
export function verifyRoot<T>(
  items: readonly T[],
  expectedRoot: Fingerprint,
  options: EncodedFunnelOptions<T>
): boolean;
export function verifyRoot<T>(
  items: readonly T[],
  expectedRoot: Fingerprint,
  options: FunnelOptions & { encode?: Encoder<T> } = {}
): boolean {
  const actual = FunnelTree.build(items, options).root();
  const ok = actual === expectedRoot.toLowerCase();
  if (!ok) {
    log.warn("root mismatch", { expected: expectedRoot, actual });
  }
  return ok;
}
