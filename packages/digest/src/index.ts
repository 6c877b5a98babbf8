export {
  DEFAULT_ALGORITHM,
  DIGEST_HEX_LENGTH,
  DigestAlgorithmSchema,
  isHexDigest,
  parseDigestAlgorithm,
} from "./algorithm.js";
export type { DigestAlgorithm, ParseAlgorithmResult } from "./algorithm.js";

export { canonicalJson, createDigest, digestHex, hashData, hashPair, sha256Hex } from "./hash.js";
export type { DigestFunction } from "./hash.js";
