// packages/digest/src/algorithm.ts
import { z } from "zod";

export const DigestAlgorithmSchema = z.enum(["sha256", "sha384", "sha512"]);

export type DigestAlgorithm = z.infer<typeof DigestAlgorithmSchema>;

export const DEFAULT_ALGORITHM: DigestAlgorithm = "sha256";

/** Hex length of a digest produced by each algorithm. */
export const DIGEST_HEX_LENGTH: Record<DigestAlgorithm, number> = {
  sha256: 64,
  sha384: 96,
  sha512: 128,
};

export type ParseAlgorithmResult =
  | { ok: true; algorithm: DigestAlgorithm }
  | { ok: false; message: string };

/**
 * Parse a user-supplied algorithm name (CLI flag, input document).
 * Missing input falls back to sha256.
 */
export function parseDigestAlgorithm(input: unknown): ParseAlgorithmResult {
  if (input === undefined || input === null) return { ok: true, algorithm: DEFAULT_ALGORITHM };

  const parsed = DigestAlgorithmSchema.safeParse(typeof input === "string" ? input.trim().toLowerCase() : input);
  if (!parsed.success) {
    return {
      ok: false,
      message: `Unsupported digest algorithm: ${String(input)} (expected one of ${DigestAlgorithmSchema.options.join(", ")})`,
    };
  }

  return { ok: true, algorithm: parsed.data };
}

export function isHexDigest(value: string, algorithm: DigestAlgorithm = DEFAULT_ALGORITHM): boolean {
  return value.length === DIGEST_HEX_LENGTH[algorithm] && /^[0-9a-f]+$/.test(value);
}
