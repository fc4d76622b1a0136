import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { runCli, EXIT_COMPROMISED, EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK } from "./cli";
import { DEFAULT_CONFIG } from "./config";
import type { CommandContext } from "./commands/context";

const SHA256_HELLO = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";
const SHA256_WORLD = "486ea46224d1bb4fb680f34f7c9ad96a8f24ec88be73ea8e5a6c65260e9cb8a7";

function makeContext(cwd: string, signal?: AbortSignal) {
  const lines: string[] = [];
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const ctx: CommandContext = {
    cwd,
    config: DEFAULT_CONFIG,
    logger,
    out: { line: (text) => lines.push(text) },
    signal,
  };
  return { ctx, lines, logger };
}

describe("cli", () => {
  let cwd: string;
  let tree: string;

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dirseal-cli-"));
    tree = path.join(cwd, "tree");
    await fs.mkdir(tree);
    await fs.writeFile(path.join(tree, "a.txt"), "hello");
    await fs.writeFile(path.join(tree, "b.txt"), "world");
  });

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true });
  });

  it("creates checksums.json inside the directory by default", async () => {
    const { ctx, lines } = makeContext(cwd);

    const code = await runCli(["create", "tree"], ctx);

    expect(code).toBe(EXIT_OK);
    const doc = JSON.parse(await fs.readFile(path.join(tree, "checksums.json"), "utf-8"));
    expect(doc.metadata.algorithm).toBe("sha256");
    expect(doc.metadata.directory).toBe(tree);
    expect(Object.keys(doc.files)).toEqual(["a.txt", "b.txt"]);
    expect(doc.files["a.txt"].hash).toBe(SHA256_HELLO);
    expect(doc.files["b.txt"].hash).toBe(SHA256_WORLD);
    expect(lines).toContain("  + a.txt");
    expect(lines).toContain(`Checksums saved to: ${path.join(tree, "checksums.json")}`);
  });

  it("verifies an untouched tree as intact", async () => {
    await runCli(["create", "tree"], makeContext(cwd).ctx);
    const { ctx, lines } = makeContext(cwd);

    const code = await runCli(["verify", "tree/checksums.json"], ctx);

    expect(code).toBe(EXIT_OK);
    expect(lines).toContain("  OK         a.txt");
    expect(lines).toContain("Passed:  2");
    expect(lines[lines.length - 1]).toBe("Verdict: INTACT (all files match)");
  });

  it("exits 1 and lists the problems when files changed or vanished", async () => {
    await runCli(["create", "tree", "--output", "out/sums.json", "--algorithm", "md5"], makeContext(cwd).ctx);
    await fs.writeFile(path.join(tree, "a.txt"), "HELLO");
    await fs.rm(path.join(tree, "b.txt"));
    const { ctx, lines } = makeContext(cwd);

    const code = await runCli(["verify", "out/sums.json"], ctx);

    expect(code).toBe(EXIT_COMPROMISED);
    expect(lines).toContain("  CHANGED    a.txt");
    expect(lines).toContain("    expected: 5d41402abc4b2a76b9719d911017c592");
    expect(lines).toContain("    actual:   eb61eead90e3b899c6bcbe27ac581660");
    expect(lines).toContain("  MISSING    b.txt");
    expect(lines[lines.length - 1]).toBe("Verdict: COMPROMISED (integrity problems found)");
  });

  it("verifies against another directory when one is given", async () => {
    await runCli(["create", "tree"], makeContext(cwd).ctx);
    const other = path.join(cwd, "other");
    await fs.mkdir(other);
    await fs.writeFile(path.join(other, "a.txt"), "hello");
    const { ctx, lines } = makeContext(cwd);

    const code = await runCli(["verify", "tree/checksums.json", "other"], ctx);

    expect(code).toBe(EXIT_COMPROMISED);
    expect(lines).toContain("  MISSING    b.txt");
    expect(lines).toContain("Missing: 1");
  });

  it("exits 2 with a single error when the manifest does not exist", async () => {
    const { ctx, lines, logger } = makeContext(cwd);

    const code = await runCli(["verify", "nowhere.json"], ctx);

    expect(code).toBe(EXIT_FAILURE);
    expect(logger.error).toHaveBeenCalledWith(`Manifest not found: ${path.join(cwd, "nowhere.json")}`);
    expect(lines).toEqual([]);
  });

  it("exits 2 when the directory to snapshot does not exist", async () => {
    const { ctx, logger } = makeContext(cwd);
    expect(await runCli(["create", "ghost"], ctx)).toBe(EXIT_FAILURE);
    expect(logger.error).toHaveBeenCalledWith("Directory not found: " + path.join(cwd, "ghost"));
  });

  it("rejects an unsupported algorithm", async () => {
    const { ctx, logger } = makeContext(cwd);
    expect(await runCli(["create", "tree", "--algorithm", "sha512"], ctx)).toBe(EXIT_FAILURE);
    expect(logger.error).toHaveBeenCalledWith("Unsupported hash algorithm: sha512 (expected md5, sha1 or sha256)");
  });

  it("hashes a single file and compares it to a known digest", async () => {
    const { ctx, lines } = makeContext(cwd);

    const code = await runCli(["hash", "tree/a.txt", "--expect", SHA256_WORLD], ctx);

    expect(code).toBe(EXIT_COMPROMISED);
    expect(lines).toContain(`Digest:    ${SHA256_HELLO}`);
    expect(lines).toContain("Match:     NO (file differs from the expected digest)");
  });

  it("exits 130 when interrupted", async () => {
    const controller = new AbortController();
    controller.abort();
    const { ctx } = makeContext(cwd, controller.signal);

    expect(await runCli(["create", "tree"], ctx)).toBe(EXIT_INTERRUPTED);
    await expect(fs.stat(path.join(tree, "checksums.json"))).rejects.toThrow();
  });

  it("prints usage for unknown commands and missing arguments", async () => {
    const unknown = makeContext(cwd);
    expect(await runCli(["destroy"], unknown.ctx)).toBe(EXIT_FAILURE);
    expect(unknown.lines[0]).toContain("dirseal create <directory>");

    const missing = makeContext(cwd);
    expect(await runCli(["verify"], missing.ctx)).toBe(EXIT_FAILURE);
    expect(missing.logger.error).toHaveBeenCalledWith("Usage: dirseal verify <manifest> [directory]");
  });
});
