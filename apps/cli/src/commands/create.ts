import path from "node:path";
import { ManifestBuilder, NodeManifestStore, parseHashAlgorithm } from "@dirseal/core-application";

import { parseArgs, UsageError } from "../args";
import { renderBuildEvent, renderBuildSummary, RULE } from "../render";
import type { Command } from "./context";

export const CREATE_USAGE = "dirseal create <directory> [--output <file>] [--algorithm md5|sha1|sha256]";

export const create: Command = async (args, ctx) => {
  const { positionals, flags } = parseArgs(args, ["output", "algorithm"]);
  const [directory] = positionals;
  if (!directory || positionals.length > 1) throw new UsageError(`Usage: ${CREATE_USAGE}`);

  const rootAbs = path.resolve(ctx.cwd, directory);
  const algorithm = flags.algorithm ? parseHashAlgorithm(flags.algorithm) : ctx.config.algorithm;
  const outputPath = flags.output
    ? path.resolve(ctx.cwd, flags.output)
    : path.join(rootAbs, ctx.config.manifestFileName);

  ctx.out.line(`Scanning ${rootAbs} (${algorithm})`);
  ctx.out.line(RULE);

  const builder = new ManifestBuilder({ logger: ctx.logger });
  const result = await builder.build({
    rootDir: rootAbs,
    algorithm,
    excludeFileName: path.basename(outputPath),
    signal: ctx.signal,
    onFile: (event) => ctx.out.line(renderBuildEvent(event)),
  });

  await new NodeManifestStore().save(outputPath, result.manifest);
  ctx.logger.debug("Manifest written", { path: outputPath, entries: result.processed });

  for (const line of renderBuildSummary(result, outputPath)) ctx.out.line(line);
  return 0;
};
