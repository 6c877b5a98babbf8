// packages/merkle/src/merkle-tree.ts
import { createDigest, type DigestFunction } from "@hashtree/digest";
import { EmptyTreeError, IndexOutOfBoundsError, toMerkleResult, type MerkleResult } from "./errors.js";

export type MerkleTreeOptions = {
  /** Used for leaf rehash in update() and for every parent node. Default: sha256 over canonical JSON. */
  digest?: DigestFunction;
};

/**
 * Binary Merkle tree over pre-hashed leaves, kept as layers from leaves (0) to root.
 *
 * - Parent = digest(left + right), left to right
 * - If a layer has odd length, its last node is paired with itself
 * - update() rewrites one leaf and its ancestor chain in place; shape never changes
 *
 * Not safe for concurrent mutation; serialize writers per instance.
 */
export class MerkleTree {
  private tree: string[][] = [];
  private readonly digest: DigestFunction;

  constructor(options: MerkleTreeOptions = {}) {
    this.digest = options.digest ?? createDigest();
  }

  static fromLeaves(leaves: readonly string[], options?: MerkleTreeOptions): MerkleTree {
    const t = new MerkleTree(options);
    t.build(leaves);
    return t;
  }

  /** Hash each raw value with the tree's digest, then build. */
  static fromValues(values: readonly unknown[], options?: MerkleTreeOptions): MerkleTree {
    const t = new MerkleTree(options);
    t.build(values.map((v) => t.digest(v)));
    return t;
  }

  get leafCount(): number {
    return this.tree[0]?.length ?? 0;
  }

  /** Number of layers, leaves included. */
  get depth(): number {
    return this.tree.length;
  }

  isEmpty(): boolean {
    return this.tree.length === 0;
  }

  /**
   * Replace all state with a tree over `leaves`.
   * A single leaf is its own root (no hashing); zero leaves gives an empty tree.
   */
  build(leaves: readonly string[]): void {
    if (leaves.length === 0) {
      this.tree = [];
      return;
    }

    const layers: string[][] = [leaves.slice()];
    let level = layers[0]!;

    while (level.length > 1) {
      const next: string[] = [];
      for (let i = 0; i < level.length; i += 2) {
        const left = level[i]!;
        const right = level[i + 1] ?? left; // duplicate last if odd
        next.push(this.pair(left, right));
      }
      layers.push(next);
      level = next;
    }

    this.tree = layers;
  }

  root(): string {
    const top = this.tree[this.tree.length - 1];
    if (!top) throw new EmptyTreeError();
    return top[0]!;
  }

  tryRoot(): MerkleResult<string> {
    return toMerkleResult(() => this.root());
  }

  leaf(index: number): string {
    this.assertLeafIndex(index);
    return this.tree[0]![index]!;
  }

  /** Copy of every layer, leaves first. */
  layers(): string[][] {
    return this.tree.map((layer) => layer.slice());
  }

  /** Replace leaf `index` with digest(newValue) and recompute its ancestors. */
  update(index: number, newValue: unknown): void {
    this.assertLeafIndex(index);
    this.updateDigest(index, this.digest(newValue));
  }

  tryUpdate(index: number, newValue: unknown): MerkleResult<string> {
    return toMerkleResult(() => {
      this.update(index, newValue);
      return this.root();
    });
  }

  /** Same as update() but `leafDigest` is already a digest, as build() takes. */
  updateDigest(index: number, leafDigest: string): void {
    this.assertLeafIndex(index);

    const layers = this.tree;
    layers[0]![index] = leafDigest;

    for (let i = 1; i < layers.length; i++) {
      const below = layers[i - 1]!;
      const nodeIndex = index >> i;
      const childLeft = nodeIndex * 2;
      const childRight = childLeft + 1;

      const left = below[childLeft]!;
      // last unpaired node at this layer pairs with itself
      const right = childRight < below.length ? below[childRight]! : left;

      layers[i]![nodeIndex] = this.pair(left, right);
    }
  }

  private pair(left: string, right: string): string {
    return this.digest(left + right);
  }

  private assertLeafIndex(index: number): void {
    const n = this.leafCount;
    if (!Number.isInteger(index) || index < 0 || index >= n) {
      throw new IndexOutOfBoundsError(index, n);
    }
  }
}
