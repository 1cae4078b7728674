/* ------------------------------------------------------------------
 * hash.ts  •  Hashing contract adapters
 * ------------------------------------------------------------------
 *  ▸ canonicalJSON(...)  – deterministic, key-sorted JSON stringifier
 *  ▸ jsonEncoder         – Encoder for any JSON value
 *  ▸ encodeItem(...)     – default encoder: string | bytes | Hashable
 * ------------------------------------------------------------------ */

import { UnsupportedItemError } from "../errors";
import type { Encoder, Hashable, HashInput, JSONValue } from "../types";

/**
 * Recursively serialises objects/arrays with keys sorted A→Z so that
 * two structurally equal values always produce the same leaf.
 *
 * @example
 * ```typescript
 * canonicalJSON({ b: 2, a: 1 }) // '{"a":1,"b":2}'
 * canonicalJSON([null, 1, "2"]) // '[null,1,"2"]'
 * ```
 */
export function canonicalJSON(val: JSONValue): string {
  // primitives
  if (val === null || typeof val !== "object") return JSON.stringify(val);

  // arrays
  if (Array.isArray(val)) return `[${val.map(canonicalJSON).join(",")}]`;

  // objects
  const body = Object.keys(val)
    .sort()
    .map((k) => `${JSON.stringify(k)}:${canonicalJSON(val[k])}`)
    .join(",");
  return `{${body}}`;
}

export const jsonEncoder: Encoder<JSONValue> = (value) => canonicalJSON(value);

export function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === "object" &&
    value !== null &&
    "toHashInput" in value &&
    typeof value.toHashInput === "function"
  );
}

export function encodeItem(item: unknown, index = 0): HashInput {
  if (typeof item === "string" || item instanceof Uint8Array) return item;
  if (isHashable(item)) return item.toHashInput();
  throw new UnsupportedItemError(index, item);
}
