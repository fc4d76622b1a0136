// Public API of the core-application package: ports, the persisted manifest
// codec, services and the Node adapters behind them. Consumers import from
// here rather than reaching into internal file paths.

// Ports (interfaces)
export type { FileHash, FileHasher, DigestAccumulator } from "./ports/file-hasher";
export type { ScannedFile, TreeScanner } from "./ports/tree-scanner";
export type { ManifestStore } from "./ports/manifest-store";
export type { Clock } from "./ports/clock";
export type { Logger, LogLevel, LogMeta } from "./ports/logger";
export { LOG_LEVELS } from "./ports/logger";

// Errors
export * from "./application/errors";
export { parseHashAlgorithm } from "./application/hash-algorithm";

// Value objects
export * from "./value-objects/persisted-manifest";

// Services
export * from "./services/manifest-builder";
export * from "./services/integrity-verifier";
export * from "./services/single-file-check";

// Node adapters
export * from "./adapters/node-file-hasher";
export * from "./adapters/node-tree-scanner";
export * from "./adapters/node-manifest-store";
export * from "./adapters/console-logger";
export * from "./adapters/system-clock";
