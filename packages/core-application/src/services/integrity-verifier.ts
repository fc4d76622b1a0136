import fs from "node:fs/promises";
import path from "node:path";
import type { EntryOutcome, FileRecord, HashAlgorithm, Manifest, VerificationReport } from "@dirseal/core-domain";
import { summarizeOutcomes } from "@dirseal/core-domain";

import type { FileHasher } from "../ports/file-hasher";
import type { ManifestStore } from "../ports/manifest-store";
import type { Logger } from "../ports/logger";
import { NodeFileHasher } from "../adapters/node-file-hasher";
import { NodeManifestStore } from "../adapters/node-manifest-store";
import { ConsoleLogger } from "../adapters/console-logger";
import { OperationAbortedError, errorCode, errorMessage } from "../application/errors";

export type VerifyOptions = {
  /** Defaults to the manifest's source directory. */
  targetDir?: string;
  signal?: AbortSignal;
  onOutcome?: (outcome: EntryOutcome) => void;
};

export type IntegrityVerifierDeps = {
  hasher?: FileHasher;
  store?: ManifestStore;
  logger?: Logger;
};

type Presence = "present" | "absent" | { error: string };

export class IntegrityVerifier {
  private readonly hasher: FileHasher;
  private readonly store: ManifestStore;
  private readonly logger: Logger;

  constructor(deps: IntegrityVerifierDeps = {}) {
    this.hasher = deps.hasher ?? new NodeFileHasher();
    this.store = deps.store ?? new NodeManifestStore();
    this.logger = deps.logger ?? new ConsoleLogger();
  }

  /**
   * Loads a persisted manifest and verifies it. A missing or corrupt manifest
   * rejects before any file is touched.
   */
  async verifyFile(manifestPath: string, options: VerifyOptions = {}): Promise<VerificationReport> {
    const manifest = await this.store.load(manifestPath);
    return this.verify(manifest, options);
  }

  async verify(manifest: Manifest, options: VerifyOptions = {}): Promise<VerificationReport> {
    const targetDirectory = path.resolve(options.targetDir ?? manifest.sourceDirectory);
    const outcomes: EntryOutcome[] = [];

    for (const [rel, record] of manifest.entries) {
      if (options.signal?.aborted) throw new OperationAbortedError("Verification aborted");

      const outcome = await this.checkEntry(targetDirectory, rel, record, manifest.algorithm);
      this.logger.debug("Entry checked", { path: rel, status: outcome.status });

      outcomes.push(outcome);
      options.onOutcome?.(outcome);
    }

    return {
      ...summarizeOutcomes(outcomes),
      algorithm: manifest.algorithm,
      targetDirectory,
      outcomes,
    };
  }

  private async checkEntry(
    targetDirectory: string,
    rel: string,
    record: Readonly<FileRecord>,
    algorithm: HashAlgorithm
  ): Promise<EntryOutcome> {
    const abs = path.join(targetDirectory, ...rel.split("/"));

    const presence = await this.presenceOf(abs);
    if (presence === "absent") {
      return { status: "missing", path: rel, expected: record.hash };
    }
    if (presence !== "present") {
      return { status: "mismatched", path: rel, expected: record.hash, actual: null, error: presence.error };
    }

    let actual: string;
    try {
      actual = (await this.hasher.hashFile(abs, algorithm)).value;
    } catch (err) {
      return { status: "mismatched", path: rel, expected: record.hash, actual: null, error: errorMessage(err) };
    }

    if (actual === record.hash) {
      return { status: "matched", path: rel, hash: actual };
    }
    return { status: "mismatched", path: rel, expected: record.hash, actual };
  }

  private async presenceOf(abs: string): Promise<Presence> {
    try {
      await fs.stat(abs);
      return "present";
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOENT" || code === "ENOTDIR") return "absent";
      return { error: errorMessage(err) };
    }
  }
}
