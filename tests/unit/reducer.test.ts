import { createHash } from "node:crypto";
import { afterEach, describe, expect, it, vi } from "vitest";

import {
  FunnelTree,
  construct,
  depth,
  expectedDepth,
  layers,
  root,
} from "@/funnel/reducer";
import { fingerprint } from "@/crypto/hasher";
import {
  EmptyInputError,
  InvariantViolationError,
  UnsupportedItemError,
} from "@/errors";
import { emptyInputCounter, leavesCounter } from "@/metrics";
import { jsonEncoder } from "@/utils/hash";
import { log } from "@/utils/logger";
import type { Hashable, HashInput } from "@/types";

const H = (s: string) =>
  createHash("sha256").update(Buffer.from(s, "utf8")).digest("hex");

/** Parent over raw digest bytes, left then right */
const P = (left: string, right: string) =>
  createHash("sha256")
    .update(Buffer.concat([Buffer.from(left, "hex"), Buffer.from(right, "hex")]))
    .digest("hex");

const itemsOf = (n: number) =>
  Array.from({ length: n }, (_, i) => `item-${i}`);

async function counterValue(counter: typeof leavesCounter): Promise<number> {
  const metric = await counter.get();
  return metric.values[0]?.value ?? 0;
}

describe("reducer.ts", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("construct", () => {
    it("should reduce two items to H(H(a) || H(b))", () => {
      const a = "alice->bob:10";
      const b = "bob->charlie:5";
      const tree = construct([a, b]);

      expect(layers(tree)).toEqual([[H(a), H(b)], [P(H(a), H(b))]]);
      expect(root(tree)).toBe(P(H(a), H(b)));
      expect(depth(tree)).toBe(2);
    });

    it("should pair the trailing node of an odd layer with itself", () => {
      const tree = construct(["x", "y", "z"]);
      const layer1 = [P(H("x"), H("y")), P(H("z"), H("z"))];

      expect(tree.layers[0]).toEqual([H("x"), H("y"), H("z")]);
      expect(tree.layers[1]).toEqual(layer1);
      expect(tree.root()).toBe(P(layer1[0], layer1[1]));
      expect(tree.depth()).toBe(3);
    });

    it("should treat a single item as both leaf and root", () => {
      const tree = construct(["only"]);

      expect(tree.root()).toBe(H("only"));
      expect(tree.depth()).toBe(1);
      expect(tree.layers).toEqual([[H("only")]]);
    });

    it("should throw EmptyInputError for zero items", () => {
      expect(() => construct([])).toThrow(EmptyInputError);

      let caught: unknown;
      try {
        construct([]);
      } catch (err) {
        caught = err;
      }
      expect(caught).toMatchObject({
        name: "EmptyInputError",
        code: "EMPTY_INPUT",
      });
    });

    it("should log and count empty-input rejections", async () => {
      const verbose = vi.spyOn(log, "verbose");
      const before = await counterValue(emptyInputCounter);

      expect(() => construct([])).toThrow(EmptyInputError);

      expect(verbose).toHaveBeenCalledWith(
        "construct() rejected an empty item sequence"
      );
      expect(await counterValue(emptyInputCounter)).toBe(before + 1);
    });

    it("should count hashed leaves", async () => {
      const before = await counterValue(leavesCounter);
      construct(itemsOf(3));
      expect(await counterValue(leavesCounter)).toBe(before + 3);
    });

    it("should be deterministic across invocations", () => {
      const items = itemsOf(6);
      expect(construct(items).root()).toBe(construct([...items]).root());
    });

    it("should be sensitive to item order", () => {
      const items = ["a", "b", "c"];
      expect(construct(items).root()).not.toBe(
        construct([...items].reverse()).root()
      );
      expect(construct(["a", "b"]).root()).not.toBe(
        construct(["b", "a"]).root()
      );
    });

    it("should freeze every layer", () => {
      const tree = construct(itemsOf(5));
      expect(Object.isFrozen(tree.layers)).toBe(true);
      tree.layers.forEach((layer) => expect(Object.isFrozen(layer)).toBe(true));
    });
  });

  describe("layer shape", () => {
    it("should halve each layer, rounding up, down to a singleton", () => {
      for (let n = 1; n <= 17; n++) {
        const tree = construct(itemsOf(n));
        const { layers: ls } = tree;

        expect(ls[0]).toHaveLength(n);
        expect(ls[ls.length - 1]).toHaveLength(1);
        for (let i = 0; i + 1 < ls.length; i++) {
          expect(ls[i + 1]).toHaveLength(Math.ceil(ls[i].length / 2));
        }
        ls.flat().forEach((node) => expect(node).toMatch(/^[0-9a-f]{64}$/));
      }
    });

    it("should duplicate the last leaf of an odd leaf layer", () => {
      for (const n of [3, 5, 7, 9]) {
        const tree = construct(itemsOf(n));
        const leaves = tree.layers[0];
        const last = leaves[leaves.length - 1];

        expect(tree.layers[1]).toHaveLength(Math.ceil(n / 2));
        expect(tree.layers[1][tree.layers[1].length - 1]).toBe(P(last, last));
      }
    });
  });

  describe("depth", () => {
    it("should grow by one layer per halving", () => {
      const depths = [1, 2, 3, 4, 5, 6, 7, 8, 9].map((n) =>
        construct(itemsOf(n)).depth()
      );
      expect(depths).toEqual([1, 2, 3, 3, 4, 4, 4, 4, 5]);
    });

    it("should match expectedDepth and floor(log2(n-1)) + 2", () => {
      for (let n = 1; n <= 40; n++) {
        const actual = construct(itemsOf(n)).depth();
        expect(actual).toBe(expectedDepth(n));
        if (n > 1) expect(actual).toBe(Math.floor(Math.log2(n - 1)) + 2);
      }
    });

    it("should reject leaf counts that cannot form a tree", () => {
      expect(() => expectedDepth(0)).toThrow(EmptyInputError);
      expect(() => expectedDepth(-1)).toThrow(RangeError);
      expect(() => expectedDepth(2.5)).toThrow(RangeError);
    });
  });

  describe("hashing contract", () => {
    it("should hash strings as UTF-8 and bytes as-is", () => {
      expect(construct([Buffer.from("x", "utf8")]).root()).toBe(
        construct(["x"]).root()
      );
      expect(construct([new TextEncoder().encode("héllo")]).root()).toBe(
        H("héllo")
      );
    });

    it("should accept Hashable items", () => {
      class Transfer implements Hashable {
        constructor(
          readonly from: string,
          readonly to: string,
          readonly amount: number
        ) {}

        toHashInput(): HashInput {
          return `${this.from}->${this.to}:${this.amount}`;
        }
      }

      const tree = construct([
        new Transfer("alice", "bob", 10),
        new Transfer("bob", "charlie", 5),
      ]);
      expect(tree.root()).toBe(construct(["alice->bob:10", "bob->charlie:5"]).root());
    });

    it("should use a supplied encoder", () => {
      const a = construct([{ b: 1, a: 2 }, { c: [1, 2] }], {
        encode: jsonEncoder,
      });
      const b = construct([{ a: 2, b: 1 }, { c: [1, 2] }], {
        encode: jsonEncoder,
      });

      expect(a.root()).toBe(b.root());
      expect(a.layers[0][0]).toBe(H('{"a":2,"b":1}'));
    });

    it("should reject items it cannot encode", () => {
      expect(() => FunnelTree.build(["ok", 42])).toThrow(UnsupportedItemError);
      expect(() => FunnelTree.build(["ok", 42])).toThrow(/item 1 \(number\)/);
    });
  });

  describe("pair encoding", () => {
    it("should join hex renderings as text in 'hex' mode", () => {
      const tree = construct(["a", "b", "c"], { pairEncoding: "hex" });
      const T = (l: string, r: string) => H(l + r);
      const layer1 = [T(H("a"), H("b")), T(H("c"), H("c"))];

      expect(tree.pairEncoding).toBe("hex");
      expect(tree.layers[1]).toEqual(layer1);
      expect(tree.root()).toBe(T(layer1[0], layer1[1]));
    });

    it("should give different roots for 'raw' and 'hex'", () => {
      const items = itemsOf(4);
      expect(construct(items, { pairEncoding: "raw" }).root()).not.toBe(
        construct(items, { pairEncoding: "hex" }).root()
      );
    });
  });

  describe("hash primitive", () => {
    it("should build with BLAKE3 when asked", () => {
      const tree = construct(["a", "b"], { algo: "blake3" });

      expect(tree.algo).toBe("blake3");
      expect(tree.layers[0]).toEqual([
        fingerprint("a", "blake3"),
        fingerprint("b", "blake3"),
      ]);
      expect(tree.root()).not.toBe(construct(["a", "b"]).root());
    });

    it("should accept a custom digest function", () => {
      const sha512 = (data: Uint8Array) =>
        createHash("sha512").update(data).digest();
      const tree = construct(["a", "b"], { hasher: sha512 });
      const h = (data: Buffer) => createHash("sha512").update(data).digest("hex");
      const leafA = h(Buffer.from("a"));
      const leafB = h(Buffer.from("b"));

      expect(tree.algo).toBe("custom");
      expect(tree.root()).toHaveLength(128);
      expect(tree.root()).toBe(
        h(Buffer.concat([Buffer.from(leafA, "hex"), Buffer.from(leafB, "hex")]))
      );
    });

    it("should reject a primitive that returns an empty digest", () => {
      expect(() =>
        construct(["a"], { hasher: () => new Uint8Array(0) })
      ).toThrow(InvariantViolationError);
    });

    it("should reject a primitive whose digest length varies", () => {
      let calls = 0;
      const unstable = () => new Uint8Array(calls++ === 0 ? 32 : 16);

      expect(() => construct(["a", "b"], { hasher: unstable })).toThrow(
        /digest length changed from 32 to 16 bytes/
      );
    });
  });
});
