export type MerkleFunnelErrorCode =
  | "EMPTY_INPUT"
  | "UNSUPPORTED_ITEM"
  | "INVARIANT_VIOLATION"
  | "CONFIG_INVALID"
  | "SNAPSHOT_INVALID";

export class MerkleFunnelError extends Error {
  readonly code: MerkleFunnelErrorCode;

  constructor(
    code: MerkleFunnelErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** construct() was handed zero items; there is no root to return */
export class EmptyInputError extends MerkleFunnelError {
  constructor() {
    super("EMPTY_INPUT", "MerkleFunnel: cannot build a tree from zero items");
  }
}

/** An item neither a string, bytes nor Hashable, with no encoder given */
export class UnsupportedItemError extends MerkleFunnelError {
  constructor(index: number, item: unknown) {
    super(
      "UNSUPPORTED_ITEM",
      `MerkleFunnel: item ${index} (${typeof item}) is not hashable; pass an encode option`
    );
  }
}

/** The reducer or a digest primitive broke one of its own guarantees */
export class InvariantViolationError extends MerkleFunnelError {
  constructor(message: string) {
    super("INVARIANT_VIOLATION", `MerkleFunnel invariant violated: ${message}`);
  }
}

export class ConfigError extends MerkleFunnelError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", `MerkleFunnel config: ${message}`, options);
  }
}

export class SnapshotError extends MerkleFunnelError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SNAPSHOT_INVALID", `MerkleFunnel snapshot: ${message}`, options);
  }
}

export function invariant(
  condition: unknown,
  message: string
): asserts condition {
  if (!condition) throw new InvariantViolationError(message);
}
