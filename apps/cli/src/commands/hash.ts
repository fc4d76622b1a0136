import path from "node:path";
import { checkSingleFile, parseHashAlgorithm } from "@dirseal/core-application";

import { parseArgs, UsageError } from "../args";
import { renderSingleFile } from "../render";
import type { Command } from "./context";

export const HASH_USAGE = "dirseal hash <file> [--algorithm md5|sha1|sha256] [--expect <hex>]";

export const hash: Command = async (args, ctx) => {
  const { positionals, flags } = parseArgs(args, ["algorithm", "expect"]);
  const [file] = positionals;
  if (!file || positionals.length > 1) throw new UsageError(`Usage: ${HASH_USAGE}`);

  const check = await checkSingleFile({
    filePath: path.resolve(ctx.cwd, file),
    algorithm: flags.algorithm ? parseHashAlgorithm(flags.algorithm) : ctx.config.algorithm,
    expected: flags.expect,
  });

  for (const line of renderSingleFile(check)) ctx.out.line(line);
  return check.matches === false ? 1 : 0;
};
