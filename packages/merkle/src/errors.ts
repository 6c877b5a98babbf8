// packages/merkle/src/errors.ts

export type MerkleErrorCode = "EMPTY_TREE" | "INDEX_OUT_OF_BOUNDS";

export class MerkleError extends Error {
  readonly code: MerkleErrorCode;

  constructor(code: MerkleErrorCode, message: string) {
    super(message);
    this.name = "MerkleError";
    this.code = code;
  }
}

/** root() on a tree with no layers (never built, or built from zero leaves). */
export class EmptyTreeError extends MerkleError {
  constructor(message = "Merkle tree is empty (no root).") {
    super("EMPTY_TREE", message);
    this.name = "EmptyTreeError";
  }
}

export class IndexOutOfBoundsError extends MerkleError {
  readonly index: number;
  readonly leafCount: number;

  constructor(index: number, leafCount: number) {
    super("INDEX_OUT_OF_BOUNDS", `Leaf index ${index} is out of bounds (leaf count ${leafCount}).`);
    this.name = "IndexOutOfBoundsError";
    this.index = index;
    this.leafCount = leafCount;
  }
}

export type MerkleResult<T> =
  | { ok: true; value: T }
  | { ok: false; code: MerkleErrorCode; message: string };

/**
 * Run fn and turn a MerkleError into a failed result.
 * Anything else is not ours to interpret and propagates.
 */
export function toMerkleResult<T>(fn: () => T): MerkleResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (err instanceof MerkleError) {
      return { ok: false, code: err.code, message: err.message };
    }
    throw err;
  }
}
