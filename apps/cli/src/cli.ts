import { OperationAbortedError, errorMessage } from "@dirseal/core-application";

import { UsageError } from "./args";
import type { Command, CommandContext } from "./commands/context";
import { create, CREATE_USAGE } from "./commands/create";
import { verify, VERIFY_USAGE } from "./commands/verify";
import { hash, HASH_USAGE } from "./commands/hash";

export const EXIT_OK = 0;
export const EXIT_COMPROMISED = 1;
export const EXIT_FAILURE = 2;
export const EXIT_INTERRUPTED = 130;

export const USAGE = `dirseal: snapshot and verify directory checksums

  ${CREATE_USAGE}
  ${VERIFY_USAGE}
  ${HASH_USAGE}`;

const commands: Record<string, Command> = { create, verify, hash };

/**
 * Dispatches one command and maps failures to exit codes. Never throws.
 */
export async function runCli(argv: string[], ctx: CommandContext): Promise<number> {
  const [name, ...args] = argv;

  if (!name || name === "help" || name === "--help") {
    ctx.out.line(USAGE);
    return name ? EXIT_OK : EXIT_FAILURE;
  }

  const command = commands[name];
  if (!command) {
    ctx.logger.error(`Unknown command: ${name}`);
    ctx.out.line(USAGE);
    return EXIT_FAILURE;
  }

  try {
    return await command(args, ctx);
  } catch (err) {
    if (err instanceof OperationAbortedError) {
      ctx.logger.warn("Interrupted by user");
      return EXIT_INTERRUPTED;
    }
    if (err instanceof UsageError) {
      ctx.logger.error(err.message);
      return EXIT_FAILURE;
    }
    ctx.logger.error(errorMessage(err));
    return EXIT_FAILURE;
  }
}
