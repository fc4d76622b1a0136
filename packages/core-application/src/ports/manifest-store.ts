import type { Manifest } from "@dirseal/core-domain";

export interface ManifestStore {
  save(filePath: string, manifest: Manifest): Promise<void>;
  load(filePath: string): Promise<Manifest>;
}
