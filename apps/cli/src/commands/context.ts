import type { Logger } from "@dirseal/core-application";
import type { CliConfig } from "../config";

export type Output = {
  line(text: string): void;
};

export type CommandContext = {
  cwd: string;
  config: CliConfig;
  logger: Logger;
  out: Output;
  signal?: AbortSignal;
};

/** Resolves to a process exit code. */
export type Command = (args: string[], ctx: CommandContext) => Promise<number>;
