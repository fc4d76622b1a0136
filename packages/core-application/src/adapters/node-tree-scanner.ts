import fs from "node:fs/promises";
import path from "node:path";
import type { Dirent } from "node:fs";

import type { ScannedFile, TreeScanner } from "../ports/tree-scanner";
import type { Logger } from "../ports/logger";
import { ConsoleLogger } from "./console-logger";
import { DirectoryNotFoundError, errorMessage } from "../application/errors";

// splits on the platform separator only; "\\" may be part of a POSIX name
function toPosix(p: string) {
  return p.split(path.sep).join("/");
}

function byName(a: Dirent, b: Dirent) {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export class NodeTreeScanner implements TreeScanner {
  constructor(private readonly logger: Logger = new ConsoleLogger()) {}

  async scan(rootDir: string, excludeFileName: string): Promise<ScannedFile[]> {
    const rootAbs = path.resolve(rootDir);

    let isDirectory = false;
    try {
      isDirectory = (await fs.stat(rootAbs)).isDirectory();
    } catch (err) {
      throw new DirectoryNotFoundError(`Directory not found: ${rootDir}`, rootAbs, err);
    }
    if (!isDirectory) {
      throw new DirectoryNotFoundError(`Not a directory: ${rootDir}`, rootAbs);
    }

    const out: ScannedFile[] = [];
    await this.walk(rootAbs, rootAbs, excludeFileName, out);
    return out;
  }

  private async walk(rootAbs: string, dirAbs: string, excludeFileName: string, out: ScannedFile[]) {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirAbs, { withFileTypes: true });
    } catch (err) {
      if (dirAbs === rootAbs) {
        throw new DirectoryNotFoundError(`Cannot read directory ${dirAbs}: ${errorMessage(err)}`, dirAbs, err);
      }
      this.logger.warn("Skipping unreadable directory", { path: dirAbs, error: errorMessage(err) });
      return;
    }

    entries.sort(byName);

    for (const e of entries) {
      const abs = path.join(dirAbs, e.name);

      if (e.isDirectory()) {
        await this.walk(rootAbs, abs, excludeFileName, out);
        continue;
      }

      if (e.name === excludeFileName) continue;

      if (e.isFile() || (e.isSymbolicLink() && (await this.isFileTarget(abs)))) {
        out.push({ relativePath: toPosix(path.relative(rootAbs, abs)), absolutePath: abs });
      }
    }
  }

  // symlinked directories are not followed; dangling links are dropped
  private async isFileTarget(linkAbs: string): Promise<boolean> {
    try {
      return (await fs.stat(linkAbs)).isFile();
    } catch {
      this.logger.debug("Skipping dangling symlink", { path: linkAbs });
      return false;
    }
  }
}
