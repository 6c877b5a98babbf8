// packages/merkle/src/merkle-root.ts
import type { DigestFunction } from "@hashtree/digest";
import { MerkleTree } from "./merkle-tree.js";

/**
 * Root of a fresh tree over `leaves` (already digests), or null for no leaves.
 * Same layering rule as MerkleTree.build().
 */
export function merkleRootHex(leaves: readonly string[], digest?: DigestFunction): string | null {
  if (!leaves.length) return null;
  return MerkleTree.fromLeaves(leaves, { digest }).root();
}

export type VerifyMerkleRootResult =
  | {
      ok: true;
      leaf_count: number;
      expected_root: string;
      computed_root: string;
    }
  | {
      ok: false;
      leaf_count: number;
      expected_root: string | null;
      computed_root: string | null;
      code: "NO_LEAVES" | "MISSING_EXPECTED_ROOT" | "ROOT_HASH_MISMATCH";
      message: string;
    };

/**
 * Recompute the root over `leaves` and compare with a previously recorded one.
 */
export function verifyMerkleRoot(
  leaves: readonly string[],
  expected_root: string | null,
  digest?: DigestFunction
): VerifyMerkleRootResult {
  const leaf_count = leaves.length;
  const expected = expected_root?.trim().toLowerCase() || null;

  if (!expected) {
    return {
      ok: false,
      leaf_count,
      expected_root: null,
      computed_root: null,
      code: "MISSING_EXPECTED_ROOT",
      message: "Missing expected root hash.",
    };
  }

  const computed_root = merkleRootHex(leaves, digest);
  if (computed_root === null) {
    return {
      ok: false,
      leaf_count,
      expected_root: expected,
      computed_root: null,
      code: "NO_LEAVES",
      message: "No leaves to compute a root from.",
    };
  }

  if (computed_root !== expected) {
    return {
      ok: false,
      leaf_count,
      expected_root: expected,
      computed_root,
      code: "ROOT_HASH_MISMATCH",
      message: "Merkle root mismatch (data differs from the recorded root).",
    };
  }

  return { ok: true, leaf_count, expected_root: expected, computed_root };
}
