import type { HashAlgorithm } from "@dirseal/core-domain";

export type FileHash = {
  algorithm: HashAlgorithm;
  value: string;
};

/** Incremental digest: feed chunks, then finalize once to lowercase hex. */
export interface DigestAccumulator {
  update(chunk: Uint8Array): void;
  finalize(): string;
}

export interface FileHasher {
  hashFile(absolutePath: string, algorithm: HashAlgorithm): Promise<FileHash>;
}
