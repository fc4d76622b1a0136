import { z } from "zod";
import type { FileRecord, Manifest } from "@dirseal/core-domain";

import { ManifestCorruptError, errorMessage } from "../application/errors";

/**
 * On-disk shape of a manifest. Field names follow the established checksums.json
 * layout so existing files keep loading; `modified` is seconds since the epoch.
 */
export const PersistedFileSchema = z.object({
  hash: z.string().min(1),
  size: z.number().int().nonnegative(),
  modified: z.number(),
});

// keys are what the builder writes: relative, "/"-separated, never leaving the root
const RelativePathSchema = z
  .string()
  .min(1)
  .refine((p) => !p.startsWith("/") && !/^[A-Za-z]:/.test(p), "must be a relative path")
  .refine((p) => !p.split(/[\\/]/).includes(".."), "must not contain '..' segments");

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// `files` is read as [key, record] pairs: rebuilding it as an object would drop a "__proto__" key
const FileEntriesSchema = z
  .custom<Record<string, unknown>>(isPlainObject, { message: "Expected object" })
  .transform((files) => (isPlainObject(files) ? Object.entries(files) : []))
  .pipe(z.array(z.tuple([RelativePathSchema, PersistedFileSchema])));

const MetadataSchema = z.object({
  created_at: z.string(),
  algorithm: z.enum(["md5", "sha1", "sha256"]),
  directory: z.string(),
});

export const PersistedManifestSchema = z.object({
  metadata: MetadataSchema,
  files: FileEntriesSchema,
});

export type PersistedFile = z.infer<typeof PersistedFileSchema>;

/** The document as written to disk. */
export type PersistedManifest = {
  metadata: z.infer<typeof MetadataSchema>;
  files: Record<string, PersistedFile>;
};

/** The document after validation, with `files` as ordered pairs. */
export type ParsedManifest = z.infer<typeof PersistedManifestSchema>;

export function toPersisted(manifest: Manifest): PersistedManifest {
  const files = Object.fromEntries(
    [...manifest.entries].map(([rel, record]): [string, PersistedFile] => [
      rel,
      { hash: record.hash, size: record.size, modified: record.mtimeMs / 1000 },
    ])
  );

  return {
    metadata: {
      created_at: manifest.createdAtIso,
      algorithm: manifest.algorithm,
      directory: manifest.sourceDirectory,
    },
    files,
  };
}

export function fromPersisted(doc: ParsedManifest): Manifest {
  const entries = new Map<string, FileRecord>();
  for (const [rel, f] of doc.files) {
    entries.set(rel, { hash: f.hash, size: f.size, mtimeMs: f.modified * 1000 });
  }

  return {
    algorithm: doc.metadata.algorithm,
    sourceDirectory: doc.metadata.directory,
    createdAtIso: doc.metadata.created_at,
    entries,
  };
}

export function serializeManifest(manifest: Manifest): string {
  return JSON.stringify(toPersisted(manifest), null, 2) + "\n";
}

// issue paths under `files` point into the pair list; report the file key instead
function issueLocation(issuePath: (string | number)[], json: unknown): string {
  const [head, index, , ...rest] = issuePath;
  if (head === "files" && typeof index === "number" && isPlainObject(json) && isPlainObject(json.files)) {
    const key = Object.keys(json.files)[index];
    if (key !== undefined) return ["files", key, ...rest].join(".");
  }
  return issuePath.join(".");
}

/**
 * Parses a persisted manifest. `source` only labels error messages.
 */
export function parseManifest(raw: string, source: string): Manifest {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ManifestCorruptError(`Manifest ${source} is not valid JSON: ${errorMessage(err)}`, source, err);
  }

  const result = PersistedManifestSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issueLocation(issue.path, json) : "(root)";
    const why = issue ? issue.message : "invalid structure";
    throw new ManifestCorruptError(`Manifest ${source} is corrupt at ${where}: ${why}`, source, result.error);
  }

  return fromPersisted(result.data);
}
