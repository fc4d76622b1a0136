import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { HashAlgorithm } from "@dirseal/core-domain";

import { ManifestBuilder, type BuildFileEvent } from "./manifest-builder";
import { NodeFileHasher } from "../adapters/node-file-hasher";
import { NodeManifestStore } from "../adapters/node-manifest-store";
import { NodeTreeScanner } from "../adapters/node-tree-scanner";
import type { FileHasher } from "../ports/file-hasher";
import type { TreeScanner } from "../ports/tree-scanner";
import { DirectoryNotFoundError, IOError, NotFoundError, OperationAbortedError } from "../application/errors";

const SHA256_HELLO = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";
const SHA256_WORLD = "486ea46224d1bb4fb680f34f7c9ad96a8f24ec88be73ea8e5a6c65260e9cb8a7";

function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const fixedClock = { now: () => new Date("2026-05-04T12:00:00.000Z") };

describe("manifest-builder", () => {
  let root: string;
  let logger: ReturnType<typeof fakeLogger>;
  let builder: ManifestBuilder;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "dirseal-build-"));
    await fs.writeFile(path.join(root, "a.txt"), "hello");
    await fs.writeFile(path.join(root, "b.txt"), "world");
    logger = fakeLogger();
    builder = new ManifestBuilder({ clock: fixedClock, logger });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("records the sha256 of every file keyed by relative path", async () => {
    const { manifest, processed, failures } = await builder.build({
      rootDir: root,
      algorithm: "sha256",
      excludeFileName: "checksums.json",
    });

    expect(processed).toBe(2);
    expect(failures).toEqual([]);
    expect(manifest.algorithm).toBe("sha256");
    expect(manifest.sourceDirectory).toBe(path.resolve(root));
    expect(manifest.createdAtIso).toBe("2026-05-04T12:00:00.000Z");
    expect([...manifest.entries.keys()]).toEqual(["a.txt", "b.txt"]);
    expect(manifest.entries.get("a.txt")?.hash).toBe(SHA256_HELLO);
    expect(manifest.entries.get("b.txt")?.hash).toBe(SHA256_WORLD);
  });

  it("captures size and modification time", async () => {
    const when = new Date("2025-12-31T00:00:00.000Z");
    await fs.utimes(path.join(root, "a.txt"), when, when);

    const { manifest } = await builder.build({ rootDir: root, algorithm: "md5", excludeFileName: "checksums.json" });

    expect(manifest.entries.get("a.txt")).toEqual({
      hash: "5d41402abc4b2a76b9719d911017c592",
      size: 5,
      mtimeMs: when.getTime(),
    });
  });

  it("never records its own output file, even when rebuilding over it", async () => {
    const store = new NodeManifestStore();
    const output = path.join(root, "checksums.json");

    const first = await builder.build({ rootDir: root, algorithm: "sha256", excludeFileName: "checksums.json" });
    await store.save(output, first.manifest);

    const second = await builder.build({ rootDir: root, algorithm: "sha256", excludeFileName: "checksums.json" });

    expect(second.manifest.entries.has("checksums.json")).toBe(false);
    expect(second.processed).toBe(2);
  });

  it("leaves out a file that cannot be hashed and keeps going", async () => {
    const real = new NodeFileHasher();
    const hasher: FileHasher = {
      hashFile: async (abs: string, algorithm: HashAlgorithm) => {
        if (abs.endsWith("a.txt")) throw new IOError("device error", abs);
        return real.hashFile(abs, algorithm);
      },
    };
    const flaky = new ManifestBuilder({ hasher, clock: fixedClock, logger });

    const { manifest, processed, failures } = await flaky.build({
      rootDir: root,
      algorithm: "sha256",
      excludeFileName: "checksums.json",
    });

    expect(processed).toBe(1);
    expect([...manifest.entries.keys()]).toEqual(["b.txt"]);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.path).toBe("a.txt");
    expect(failures[0]?.error).toBeInstanceOf(IOError);
    expect(logger.warn).toHaveBeenCalledWith("Skipping file", { path: "a.txt", error: "device error" });
  });

  it("reports a file that disappears between scan and hash", async () => {
    const scanner: TreeScanner = {
      scan: async () => [
        { relativePath: "a.txt", absolutePath: path.join(root, "a.txt") },
        { relativePath: "ghost.txt", absolutePath: path.join(root, "ghost.txt") },
      ],
    };
    const racing = new ManifestBuilder({ scanner, clock: fixedClock, logger });

    const { processed, failures } = await racing.build({
      rootDir: root,
      algorithm: "sha1",
      excludeFileName: "checksums.json",
    });

    expect(processed).toBe(1);
    expect(failures.map((f) => f.path)).toEqual(["ghost.txt"]);
    expect(failures[0]?.error).toBeInstanceOf(NotFoundError);
  });

  it("emits one event per file", async () => {
    const events: BuildFileEvent[] = [];
    await builder.build({
      rootDir: root,
      algorithm: "md5",
      excludeFileName: "checksums.json",
      onFile: (e) => events.push(e),
    });

    expect(events.map((e) => `${e.type}:${e.path}`)).toEqual(["recorded:a.txt", "recorded:b.txt"]);
  });

  it("fails fast when the root directory does not exist", async () => {
    await expect(
      builder.build({ rootDir: path.join(root, "nope"), algorithm: "sha256", excludeFileName: "checksums.json" })
    ).rejects.toBeInstanceOf(DirectoryNotFoundError);
  });

  it("stops before the next file once aborted", async () => {
    const controller = new AbortController();
    const hashed: string[] = [];
    const real = new NodeFileHasher();
    const hasher: FileHasher = {
      hashFile: async (abs: string, algorithm: HashAlgorithm) => {
        hashed.push(path.basename(abs));
        controller.abort();
        return real.hashFile(abs, algorithm);
      },
    };
    const aborting = new ManifestBuilder({ hasher, scanner: new NodeTreeScanner(logger), clock: fixedClock, logger });

    await expect(
      aborting.build({
        rootDir: root,
        algorithm: "sha256",
        excludeFileName: "checksums.json",
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(OperationAbortedError);
    expect(hashed).toEqual(["a.txt"]);
  });
});
