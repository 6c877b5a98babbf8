// packages/digest/src/hash.ts
import { createHash } from "node:crypto";
import { DEFAULT_ALGORITHM, type DigestAlgorithm } from "./algorithm.js";

/**
 * Maps any JSON-representable value to a fixed-size hex digest.
 * Must be deterministic: roots are only comparable while this stays fixed.
 */
export type DigestFunction = (value: unknown) => string;

/**
 * Stable (canonical) JSON stringify:
 * - object keys are sorted
 * - arrays preserve order
 * - undefined is omitted in objects (like JSON.stringify)
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(value: unknown): unknown {
  if (value === null) return null;

  const t = typeof value;

  if (t === "string" || t === "boolean") return value;

  // NaN / Infinity serialize as null in JSON anyway; keep that explicit
  if (t === "number") return Number.isFinite(value) ? value : null;

  if (Array.isArray(value)) return value.map(canonicalize);

  if (isPlainRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(value).sort()) {
      const v = value[k];
      if (typeof v === "undefined") continue;
      out[k] = canonicalize(v);
    }
    return out;
  }

  // functions/symbols/bigints/etc are not representable in JSON
  return null;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function digestHex(input: string, algorithm: DigestAlgorithm = DEFAULT_ALGORITHM): string {
  return createHash(algorithm).update(input, "utf8").digest("hex");
}

export function sha256Hex(input: string): string {
  return digestHex(input, "sha256");
}

/**
 * Hash one raw value: digest(canonicalJson(value)).
 *
 * Strings are JSON-encoded first, so hashData("data1") hashes the seven
 * bytes `"data1"` including the quotes.
 */
export function hashData(value: unknown, algorithm: DigestAlgorithm = DEFAULT_ALGORITHM): string {
  return digestHex(canonicalJson(value), algorithm);
}

export function createDigest(algorithm: DigestAlgorithm = DEFAULT_ALGORITHM): DigestFunction {
  return (value: unknown) => hashData(value, algorithm);
}

/**
 * Parent = digest(left || right). Order matters.
 */
export function hashPair(left: string, right: string, digest: DigestFunction = createDigest()): string {
  return digest(left + right);
}
