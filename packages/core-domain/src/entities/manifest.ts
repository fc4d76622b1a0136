import type { HashAlgorithm } from "../value-objects/hash-algorithm";
import type { FileRecord } from "./file-record";

/** Relative path from the manifest's source directory, always with "/" separators. */
export type RelativePath = string;

/**
 * Snapshot of a directory tree. Built once, persisted once, then only read.
 */
export interface Manifest {
  readonly algorithm: HashAlgorithm;
  /** Absolute root that was scanned; default target for verification. */
  readonly sourceDirectory: string;
  readonly createdAtIso: string;
  readonly entries: ReadonlyMap<RelativePath, Readonly<FileRecord>>;
}
