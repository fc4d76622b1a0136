export type ScannedFile = {
  /** Path from the scan root with "/" separators. */
  relativePath: string;
  absolutePath: string;
};

export interface TreeScanner {
  /**
   * Lists every regular file under rootDir, skipping any file named
   * excludeFileName at any depth.
   */
  scan(rootDir: string, excludeFileName: string): Promise<ScannedFile[]>;
}
