export { MerkleTree } from "./merkle-tree.js";
export type { MerkleTreeOptions } from "./merkle-tree.js";

export { EmptyTreeError, IndexOutOfBoundsError, MerkleError, toMerkleResult } from "./errors.js";
export type { MerkleErrorCode, MerkleResult } from "./errors.js";

export { merkleRootHex, verifyMerkleRoot } from "./merkle-root.js";
export type { VerifyMerkleRootResult } from "./merkle-root.js";

export { LeavesDocumentSchema, parseLeavesDocument, toLeafDigests } from "./leaves.js";
export type { LeafDigestsResult, LeavesDocument, ParseLeavesResult, ParsedLeaves } from "./leaves.js";
