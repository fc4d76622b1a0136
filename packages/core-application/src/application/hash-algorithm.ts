import { normalizeAlgorithmTag, type HashAlgorithm } from "@dirseal/core-domain";
import { UnsupportedAlgorithmError } from "./errors";

export function parseHashAlgorithm(tag: string): HashAlgorithm {
  const algorithm = normalizeAlgorithmTag(tag);
  if (!algorithm) throw new UnsupportedAlgorithmError(tag);
  return algorithm;
}
