export * from "./value-objects/hash-algorithm";
export * from "./entities/file-record";
export * from "./entities/manifest";
export * from "./entities/verification-report";
