export type HashAlgorithm = "md5" | "sha1" | "sha256";

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ["md5", "sha1", "sha256"];

/** Hex characters in a digest produced by each algorithm. */
export const DIGEST_HEX_LENGTH: Readonly<Record<HashAlgorithm, number>> = {
  md5: 32,
  sha1: 40,
  sha256: 64,
};

const ALIASES: Readonly<Record<string, HashAlgorithm>> = {
  "sha-1": "sha1",
  "sha-256": "sha256",
};

export function isHashAlgorithm(value: unknown): value is HashAlgorithm {
  return HASH_ALGORITHMS.some((a) => a === value);
}

/**
 * Maps user input ("SHA256", "sha-256", " md5 ") onto the closed tag.
 * Returns null for anything else.
 */
export function normalizeAlgorithmTag(tag: string): HashAlgorithm | null {
  const lower = tag.trim().toLowerCase();
  if (isHashAlgorithm(lower)) return lower;
  return ALIASES[lower] ?? null;
}
