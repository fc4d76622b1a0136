export type FileHash = string;

export interface FileRecord {
  /** Lowercase hex digest of the full file content. */
  hash: FileHash;
  size: number;
  /** Informational only; verification never compares it. */
  mtimeMs: number;
}
