import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { HashAlgorithm } from "@dirseal/core-domain";
import { normalizeAlgorithmTag } from "@dirseal/core-domain";
import type { LogLevel } from "@dirseal/core-application";
import { errorCode, errorMessage } from "@dirseal/core-application";

export const CONFIG_FILE_NAME = "dirseal.config.json";

export class ConfigError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ConfigError";
  }
}

export type CliConfig = {
  manifestFileName: string;
  algorithm: HashAlgorithm;
  logLevel: LogLevel;
  /** File the settings came from, null when only defaults applied. */
  source: string | null;
};

export const DEFAULT_CONFIG: CliConfig = {
  manifestFileName: "checksums.json",
  algorithm: "sha256",
  logLevel: "info",
  source: null,
};

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const AlgorithmSchema = z.string().transform((tag, ctx) => {
  const algorithm = normalizeAlgorithmTag(tag);
  if (!algorithm) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unsupported algorithm "${tag}"` });
    return z.NEVER;
  }
  return algorithm;
});

const FileConfigSchema = z
  .object({
    manifestFileName: z
      .string()
      .min(1)
      .refine((name) => !/[\\/]/.test(name), "must be a bare file name"),
    algorithm: AlgorithmSchema,
    logLevel: LogLevelSchema,
  })
  .partial()
  .strict();

async function readConfigFile(file: string, required: boolean): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT" && !required) return undefined;
    throw new ConfigError(`Cannot read config ${file}: ${errorMessage(err)}`, err);
  }

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config ${file} is not valid JSON: ${errorMessage(err)}`, err);
  }
}

/**
 * Resolves CLI settings: defaults, then the config file (DIRSEAL_CONFIG or
 * ./dirseal.config.json), then DIRSEAL_LOG_LEVEL.
 */
export async function loadConfig(params: {
  cwd: string;
  env: Record<string, string | undefined>;
}): Promise<CliConfig> {
  const { cwd, env } = params;
  const explicit = env.DIRSEAL_CONFIG;
  const file = explicit ? path.resolve(cwd, explicit) : path.join(cwd, CONFIG_FILE_NAME);

  let config: CliConfig = { ...DEFAULT_CONFIG };

  const json = await readConfigFile(file, Boolean(explicit));
  if (json !== undefined) {
    const parsed = FileConfigSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
      throw new ConfigError(`Invalid config ${file} at ${where}: ${issue ? issue.message : "invalid"}`, parsed.error);
    }
    config = { ...config, ...parsed.data, source: file };
  }

  const envLevel = env.DIRSEAL_LOG_LEVEL;
  if (envLevel) {
    const level = LogLevelSchema.safeParse(envLevel.toLowerCase());
    if (!level.success) {
      throw new ConfigError(`DIRSEAL_LOG_LEVEL must be one of debug, info, warn, error (got "${envLevel}")`);
    }
    config.logLevel = level.data;
  }

  return config;
}
