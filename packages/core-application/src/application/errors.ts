export class NotFoundError extends Error {
  constructor(message: string, public path: string, public cause?: unknown) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class IOError extends Error {
  constructor(message: string, public path: string, public cause?: unknown) {
    super(message);
    this.name = "IOError";
  }
}

export class UnsupportedAlgorithmError extends Error {
  constructor(public tag: string) {
    super(`Unsupported hash algorithm: ${tag} (expected md5, sha1 or sha256)`);
    this.name = "UnsupportedAlgorithmError";
  }
}

export class DirectoryNotFoundError extends Error {
  constructor(message: string, public path: string, public cause?: unknown) {
    super(message);
    this.name = "DirectoryNotFoundError";
  }
}

export class ManifestNotFoundError extends Error {
  constructor(public path: string, public cause?: unknown) {
    super(`Manifest not found: ${path}`);
    this.name = "ManifestNotFoundError";
  }
}

export class ManifestCorruptError extends Error {
  constructor(message: string, public path: string, public cause?: unknown) {
    super(message);
    this.name = "ManifestCorruptError";
  }
}

export class OperationAbortedError extends Error {
  constructor(message = "Operation aborted") {
    super(message);
    this.name = "OperationAbortedError";
  }
}

/** Node fs errors carry a string `code` ("ENOENT", "EACCES", ...). */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    if (typeof error.code === "string") return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
