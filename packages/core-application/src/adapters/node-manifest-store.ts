import fs from "node:fs/promises";
import path from "node:path";
import type { Manifest } from "@dirseal/core-domain";

import type { ManifestStore } from "../ports/manifest-store";
import { parseManifest, serializeManifest } from "../value-objects/persisted-manifest";
import { IOError, ManifestNotFoundError, errorCode, errorMessage } from "../application/errors";

/**
 * Reads and writes manifests as pretty-printed JSON files.
 */
export class NodeManifestStore implements ManifestStore {
  async save(filePath: string, manifest: Manifest): Promise<void> {
    const abs = path.resolve(filePath);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, serializeManifest(manifest), "utf-8");
  }

  async load(filePath: string): Promise<Manifest> {
    const abs = path.resolve(filePath);

    let raw: string;
    try {
      raw = await fs.readFile(abs, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") throw new ManifestNotFoundError(abs, err);
      throw new IOError(`Failed to read manifest ${abs}: ${errorMessage(err)}`, abs, err);
    }

    return parseManifest(raw, abs);
  }
}
