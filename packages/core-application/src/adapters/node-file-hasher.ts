import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { HashAlgorithm } from "@dirseal/core-domain";

import type { DigestAccumulator, FileHash, FileHasher } from "../ports/file-hasher";
import { IOError, NotFoundError, UnsupportedAlgorithmError, errorCode, errorMessage } from "../application/errors";

/** Files are read in 64 KiB chunks whatever their size. */
export const HASH_CHUNK_SIZE = 64 * 1024;

function nodeDigest(name: string): DigestAccumulator {
  const hash = createHash(name);
  return {
    update: (chunk) => {
      hash.update(chunk);
    },
    finalize: () => hash.digest("hex"),
  };
}

export function createDigest(algorithm: HashAlgorithm): DigestAccumulator {
  switch (algorithm) {
    case "md5":
      return nodeDigest("md5");
    case "sha1":
      return nodeDigest("sha1");
    case "sha256":
      return nodeDigest("sha256");
    default: {
      // reachable from untyped callers and hand-edited manifests
      const tag: never = algorithm;
      throw new UnsupportedAlgorithmError(String(tag));
    }
  }
}

export class NodeFileHasher implements FileHasher {
  async hashFile(absolutePath: string, algorithm: HashAlgorithm): Promise<FileHash> {
    const digest = createDigest(algorithm);

    return new Promise((resolve, reject) => {
      const stream = createReadStream(absolutePath, { highWaterMark: HASH_CHUNK_SIZE });

      stream.on("data", (chunk) => {
        digest.update(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
      });
      stream.on("error", (err) => {
        stream.destroy();
        if (errorCode(err) === "ENOENT") {
          reject(new NotFoundError(`File not found: ${absolutePath}`, absolutePath, err));
        } else {
          reject(new IOError(`Failed to read ${absolutePath}: ${errorMessage(err)}`, absolutePath, err));
        }
      });
      stream.on("end", () => {
        resolve({ algorithm, value: digest.finalize() });
      });
    });
  }
}
