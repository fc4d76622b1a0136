import path from "node:path";
import { IntegrityVerifier, NodeManifestStore } from "@dirseal/core-application";

import { parseArgs, UsageError } from "../args";
import { renderOutcome, renderReportSummary, RULE } from "../render";
import type { Command } from "./context";

export const VERIFY_USAGE = "dirseal verify <manifest> [directory]";

export const verify: Command = async (args, ctx) => {
  const { positionals } = parseArgs(args, []);
  const [manifestArg, directory] = positionals;
  if (!manifestArg || positionals.length > 2) throw new UsageError(`Usage: ${VERIFY_USAGE}`);

  const manifest = await new NodeManifestStore().load(path.resolve(ctx.cwd, manifestArg));
  const targetDir = directory ? path.resolve(ctx.cwd, directory) : manifest.sourceDirectory;

  ctx.out.line(`Verifying ${targetDir} (${manifest.algorithm}, ${manifest.entries.size} files)`);
  ctx.out.line(RULE);

  const verifier = new IntegrityVerifier({ logger: ctx.logger });
  const report = await verifier.verify(manifest, {
    targetDir,
    signal: ctx.signal,
    onOutcome: (outcome) => {
      for (const line of renderOutcome(outcome)) ctx.out.line(line);
    },
  });

  for (const line of renderReportSummary(report)) ctx.out.line(line);
  return report.verdict === "intact" ? 0 : 1;
};
