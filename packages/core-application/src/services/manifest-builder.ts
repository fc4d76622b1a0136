import fs from "node:fs/promises";
import path from "node:path";
import type { FileRecord, HashAlgorithm, Manifest } from "@dirseal/core-domain";

import type { TreeScanner, ScannedFile } from "../ports/tree-scanner";
import type { FileHasher } from "../ports/file-hasher";
import type { Clock } from "../ports/clock";
import type { Logger } from "../ports/logger";
import { NodeTreeScanner } from "../adapters/node-tree-scanner";
import { NodeFileHasher } from "../adapters/node-file-hasher";
import { SystemClock } from "../adapters/system-clock";
import { ConsoleLogger } from "../adapters/console-logger";
import { NotFoundError, OperationAbortedError, errorCode } from "../application/errors";

export type BuildFileEvent =
  | { type: "recorded"; path: string; record: FileRecord }
  | { type: "failed"; path: string; error: Error };

export type BuildFailure = {
  path: string;
  error: Error;
};

export type BuildOptions = {
  rootDir: string;
  algorithm: HashAlgorithm;
  /** Base name of the manifest being written; never recorded at any depth. */
  excludeFileName: string;
  signal?: AbortSignal;
  onFile?: (event: BuildFileEvent) => void;
};

export type BuildResult = {
  manifest: Manifest;
  /** Files successfully recorded (equals manifest.entries.size). */
  processed: number;
  failures: BuildFailure[];
};

type FileResult = { ok: true; record: FileRecord } | { ok: false; error: Error };

export type ManifestBuilderDeps = {
  scanner?: TreeScanner;
  hasher?: FileHasher;
  clock?: Clock;
  logger?: Logger;
};

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Snapshots a directory tree into a Manifest. Files are hashed one at a time;
 * a file that cannot be read is reported and left out, it never aborts the build.
 */
export class ManifestBuilder {
  private readonly scanner: TreeScanner;
  private readonly hasher: FileHasher;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: ManifestBuilderDeps = {}) {
    this.logger = deps.logger ?? new ConsoleLogger();
    this.scanner = deps.scanner ?? new NodeTreeScanner(this.logger);
    this.hasher = deps.hasher ?? new NodeFileHasher();
    this.clock = deps.clock ?? new SystemClock();
  }

  async build(options: BuildOptions): Promise<BuildResult> {
    const { rootDir, algorithm, excludeFileName, signal, onFile } = options;
    const rootAbs = path.resolve(rootDir);
    const createdAtIso = this.clock.now().toISOString();

    if (signal?.aborted) throw new OperationAbortedError("Build aborted");

    const files = await this.scanner.scan(rootAbs, excludeFileName);
    this.logger.debug("Scan complete", { root: rootAbs, files: files.length });

    const entries = new Map<string, FileRecord>();
    const failures: BuildFailure[] = [];

    for (const file of files) {
      if (signal?.aborted) throw new OperationAbortedError("Build aborted");

      const result = await this.processFile(file, algorithm);

      if (result.ok) {
        entries.set(file.relativePath, result.record);
        onFile?.({ type: "recorded", path: file.relativePath, record: result.record });
      } else {
        failures.push({ path: file.relativePath, error: result.error });
        this.logger.warn("Skipping file", { path: file.relativePath, error: result.error.message });
        onFile?.({ type: "failed", path: file.relativePath, error: result.error });
      }
    }

    const manifest: Manifest = {
      algorithm,
      sourceDirectory: rootAbs,
      createdAtIso,
      entries,
    };

    return { manifest, processed: entries.size, failures };
  }

  private async processFile(file: ScannedFile, algorithm: HashAlgorithm): Promise<FileResult> {
    try {
      const stat = await fs.stat(file.absolutePath);
      const hash = await this.hasher.hashFile(file.absolutePath, algorithm);
      return { ok: true, record: { hash: hash.value, size: stat.size, mtimeMs: stat.mtimeMs } };
    } catch (err) {
      // the file can vanish between the scan and the stat
      if (errorCode(err) === "ENOENT") {
        return {
          ok: false,
          error: new NotFoundError(`File disappeared during scan: ${file.absolutePath}`, file.absolutePath, err),
        };
      }
      return { ok: false, error: asError(err) };
    }
  }
}
