// packages/merkle/src/leaves.ts
import { z } from "zod";
import {
  DIGEST_HEX_LENGTH,
  DigestAlgorithmSchema,
  hashData,
  isHexDigest,
  type DigestAlgorithm,
} from "@hashtree/digest";

/* ------------------------------------------------------------------ */
/*                           Input document                           */
/* ------------------------------------------------------------------ */

// Zod v4: z.unknown() array keeps raw values as-is for canonical hashing
const LeafValuesSchema = z.array(z.unknown());

const LeavesEnvelopeSchema = z.object({
  leaves: LeafValuesSchema,
  algorithm: DigestAlgorithmSchema.optional(),
});

export const LeavesDocumentSchema = z.union([LeafValuesSchema, LeavesEnvelopeSchema]);

export type LeavesDocument = z.infer<typeof LeavesDocumentSchema>;

export type ParsedLeaves = {
  algorithm: DigestAlgorithm | null;
  values: unknown[];
};

export type ParseLeavesResult =
  | { ok: true; leaves: ParsedLeaves }
  | { ok: false; issues: string[] };

/**
 * Accepts either `[...]` or `{ "leaves": [...], "algorithm"?: "sha256" }`.
 */
export function parseLeavesDocument(input: unknown): ParseLeavesResult {
  const r = LeavesDocumentSchema.safeParse(input);
  if (!r.success) {
    return {
      ok: false,
      issues: r.error.issues.map((i) => `${i.path.length ? i.path.map(String).join(".") : "(root)"}: ${i.message}`),
    };
  }

  const doc = r.data;
  if (Array.isArray(doc)) return { ok: true, leaves: { algorithm: null, values: doc } };
  return { ok: true, leaves: { algorithm: doc.algorithm ?? null, values: doc.leaves } };
}

export type LeafDigestsResult =
  | { ok: true; digests: string[] }
  | { ok: false; issues: string[] };

/**
 * Turn parsed leaf values into leaf digests.
 * - prehashed: every value must already be a lowercase hex digest of the algorithm's length
 * - otherwise: each value is hashed with hashData()
 */
export function toLeafDigests(
  values: readonly unknown[],
  algorithm: DigestAlgorithm,
  prehashed: boolean
): LeafDigestsResult {
  if (!prehashed) return { ok: true, digests: values.map((v) => hashData(v, algorithm)) };

  const issues: string[] = [];
  const digests: string[] = [];

  values.forEach((v, idx) => {
    if (typeof v === "string" && isHexDigest(v, algorithm)) {
      digests.push(v);
    } else {
      issues.push(`${idx}: expected ${DIGEST_HEX_LENGTH[algorithm]}-char lowercase hex ${algorithm} digest`);
    }
  });

  return issues.length ? { ok: false, issues } : { ok: true, digests };
}
