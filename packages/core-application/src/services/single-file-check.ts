import fs from "node:fs/promises";
import path from "node:path";
import type { HashAlgorithm } from "@dirseal/core-domain";

import type { FileHasher } from "../ports/file-hasher";
import { NodeFileHasher } from "../adapters/node-file-hasher";
import { IOError, NotFoundError, errorCode, errorMessage } from "../application/errors";

export type SingleFileCheck = {
  path: string;
  algorithm: HashAlgorithm;
  size: number;
  hash: string;
  /** Undefined when no expected digest was given. */
  matches?: boolean;
};

/**
 * Hashes one file and, when a known digest is supplied, compares against it.
 * The known digest is trimmed and lowercased first since other tools often
 * print uppercase hex.
 */
export async function checkSingleFile(params: {
  filePath: string;
  algorithm: HashAlgorithm;
  expected?: string;
  hasher?: FileHasher;
}): Promise<SingleFileCheck> {
  const { filePath, algorithm, expected } = params;
  const hasher = params.hasher ?? new NodeFileHasher();
  const abs = path.resolve(filePath);

  let size: number;
  try {
    size = (await fs.stat(abs)).size;
  } catch (err) {
    if (errorCode(err) === "ENOENT") throw new NotFoundError(`File not found: ${filePath}`, abs, err);
    throw new IOError(`Cannot stat ${filePath}: ${errorMessage(err)}`, abs, err);
  }

  const { value } = await hasher.hashFile(abs, algorithm);

  const check: SingleFileCheck = { path: abs, algorithm, size, hash: value };
  if (expected !== undefined) {
    check.matches = expected.trim().toLowerCase() === value;
  }
  return check;
}
