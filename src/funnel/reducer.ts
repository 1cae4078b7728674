/**
 * @module reducer
 * @description Layer-by-layer pairwise reduction ("funnel") from an
 * ordered item sequence down to a single Merkle root.
 *
 * ```
 * layer 0   H(a)        H(b)        H(c)
 *             \         /             |\
 * layer 1   H(H(a)‖H(b))          H(H(c)‖H(c))
 *                     \            /
 * layer 2         H(layer1[0] ‖ layer1[1])   ← root
 * ```
 *
 * - leaves keep input order
 * - pairs hash left then right
 * - a trailing unpaired node is hashed with itself
 * - the last layer always holds exactly one fingerprint
 */

import { ConfigManager } from "../config";
import {
  createFingerprinter,
  digestFor,
  type Fingerprinter,
} from "../crypto/hasher";
import {
  EmptyInputError,
  InvariantViolationError,
  SnapshotError,
  invariant,
} from "../errors";
import { constructHist, emptyInputCounter, leavesCounter } from "../metrics";
import { TreeSnapshotSchema, type TreeSnapshot } from "../schema/tree-snapshot";
import { encodeItem } from "../utils/hash";
import { log } from "../utils/logger";
import type {
  DigestFn,
  EncodedFunnelOptions,
  Encoder,
  Fingerprint,
  FunnelOptions,
  HashLabel,
  Layer,
  LeafInput,
  PairEncoding,
} from "../types";

interface ResolvedSettings {
  label: HashLabel;
  fn: DigestFn;
  pairEncoding: PairEncoding;
}

/** Per-call options win over the loaded configuration */
function resolveSettings(options: FunnelOptions): ResolvedSettings {
  const cfg = ConfigManager.cfg;
  const pairEncoding = options.pairEncoding ?? cfg.pairEncoding;
  if (options.hasher) {
    return { label: "custom", fn: options.hasher, pairEncoding };
  }
  const algo = options.algo ?? cfg.hashAlgo;
  return { label: algo, fn: digestFor(algo), pairEncoding };
}

function* chunks(layer: Layer, size: number): Generator<Layer> {
  for (let i = 0; i < layer.length; i += size) {
    yield layer.slice(i, i + size);
  }
}

/** One funnel step: layer k → layer k+1 */
function reduceLayer(layer: Layer, fp: Fingerprinter): Fingerprint[] {
  const next: Fingerprint[] = [];

  for (const chunk of chunks(layer, 2)) {
    switch (chunk.length) {
      case 2:
        next.push(fp.pair(chunk[0], chunk[1]));
        break;
      case 1:
        next.push(fp.pair(chunk[0], chunk[0]));
        break;
      default:
        throw new InvariantViolationError(
          `reduction produced a chunk of ${chunk.length} fingerprints`
        );
    }
  }

  invariant(
    next.length === Math.ceil(layer.length / 2),
    `layer of ${layer.length} reduced to ${next.length} instead of ${Math.ceil(layer.length / 2)}`
  );
  return next;
}

/** Number of layers a tree over `leafCount` items has */
export function expectedDepth(leafCount: number): number {
  if (!Number.isInteger(leafCount) || leafCount < 0) {
    throw new RangeError(`leafCount must be a non-negative integer, got ${leafCount}`);
  }
  if (leafCount === 0) throw new EmptyInputError();

  let depth = 1;
  for (let width = leafCount; width > 1; width = Math.ceil(width / 2)) depth++;
  return depth;
}

export class FunnelTree {
  private constructor(
    private readonly _layers: readonly Layer[],
    readonly algo: HashLabel,
    readonly pairEncoding: PairEncoding
  ) {}

  static build<T>(
    items: readonly T[],
    options: FunnelOptions & { encode?: Encoder<T> } = {}
  ): FunnelTree {
    if (items.length === 0) {
      emptyInputCounter.inc();
      log.verbose("construct() rejected an empty item sequence");
      throw new EmptyInputError();
    }

    const t0 = performance.now();
    const settings = resolveSettings(options);
    const fp = createFingerprinter(settings.fn, settings.pairEncoding);
    const { encode } = options;

    let current: Layer = Object.freeze(
      items.map((item, i) => fp.leaf(encode ? encode(item) : encodeItem(item, i)))
    );
    const layers: Layer[] = [current];

    while (current.length > 1) {
      current = Object.freeze(reduceLayer(current, fp));
      layers.push(current);
    }

    const tree = new FunnelTree(
      Object.freeze(layers),
      settings.label,
      settings.pairEncoding
    );

    constructHist.observe(performance.now() - t0);
    leavesCounter.inc(items.length);
    log.debug("funnel reduced", {
      leaves: items.length,
      depth: tree.depth(),
      algo: tree.algo,
      root: tree.root(),
    });

    return tree;
  }

  /**
   * Rebuilds a tree from its snapshot, recomputing every parent from
   * its children. Throws SnapshotError on the first inconsistency.
   * Snapshots taken with a custom primitive need that primitive again.
   */
  static fromSnapshot(
    input: unknown,
    options: { hasher?: DigestFn } = {}
  ): FunnelTree {
    const parsed = TreeSnapshotSchema.safeParse(input);
    if (!parsed.success) {
      throw new SnapshotError(
        parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; ")
      );
    }
    const snap = parsed.data;

    let fn: DigestFn;
    if (options.hasher) {
      fn = options.hasher;
    } else if (snap.algo === "custom") {
      throw new SnapshotError(
        "built with a custom hasher; pass the same hasher to import it"
      );
    } else {
      fn = digestFor(snap.algo);
    }

    const { layers } = snap;
    const top = layers[layers.length - 1];
    if (layers[0].length !== snap.leafCount) {
      throw new SnapshotError(
        `leafCount ${snap.leafCount} but leaf layer holds ${layers[0].length}`
      );
    }
    if (layers.length !== snap.depth) {
      throw new SnapshotError(`depth ${snap.depth} but ${layers.length} layers`);
    }
    if (top.length !== 1 || top[0] !== snap.root) {
      throw new SnapshotError("final layer is not the declared root");
    }

    // every node must be as wide as the primitive's own digest
    const fp = createFingerprinter(fn, snap.pairEncoding);
    const width = fp.leaf(new Uint8Array(0)).length;
    layers.forEach((layer, i) => {
      layer.forEach((node, j) => {
        if (node.length !== width) {
          throw new SnapshotError(
            `layer ${i} index ${j} is ${node.length / 2} bytes, expected ${width / 2}`
          );
        }
      });
    });

    for (let i = 1; i < layers.length; i++) {
      const recomputed = reduceLayer(layers[i - 1], fp);
      if (layers[i].length !== recomputed.length) {
        throw new SnapshotError(
          `layer ${i} holds ${layers[i].length} fingerprints, expected ${recomputed.length}`
        );
      }
      const j = recomputed.findIndex((node, k) => node !== layers[i][k]);
      if (j !== -1) {
        throw new SnapshotError(`layer ${i} index ${j} does not match its children`);
      }
    }

    log.debug("snapshot verified", {
      leaves: snap.leafCount,
      depth: snap.depth,
      root: snap.root,
    });

    return new FunnelTree(
      Object.freeze(layers.map((layer) => Object.freeze(layer))),
      snap.algo,
      snap.pairEncoding
    );
  }

  get layers(): readonly Layer[] {
    return this._layers;
  }

  get leafCount(): number {
    return this._layers[0].length;
  }

  root(): Fingerprint {
    return this._layers[this._layers.length - 1][0];
  }

  depth(): number {
    return this._layers.length;
  }

  toJSON(): TreeSnapshot {
    return {
      version: 1,
      algo: this.algo,
      pairEncoding: this.pairEncoding,
      leafCount: this.leafCount,
      depth: this.depth(),
      root: this.root(),
      layers: this._layers.map((layer) => [...layer]),
    };
  }
}

/* ---------- Functional surface ------------------------------------ */

export function construct(
  items: readonly LeafInput[],
  options?: FunnelOptions
): FunnelTree;
export function construct<T>(
  items: readonly T[],
  options: EncodedFunnelOptions<T>
): FunnelTree;
export function construct<T>(
  items: readonly T[],
  options: FunnelOptions & { encode?: Encoder<T> } = {}
): FunnelTree {
  return FunnelTree.build(items, options);
}

export function root(tree: FunnelTree): Fingerprint {
  return tree.root();
}

export function depth(tree: FunnelTree): number {
  return tree.depth();
}

export function layers(tree: FunnelTree): readonly Layer[] {
  return tree.layers;
}
