#!/usr/bin/env tsx
import { ConsoleLogger, errorMessage } from "@dirseal/core-application";

import { loadConfig, type CliConfig } from "./config";
import { runCli, EXIT_FAILURE } from "./cli";

async function main(): Promise<number> {
  let config: CliConfig;
  try {
    config = await loadConfig({ cwd: process.cwd(), env: process.env });
  } catch (err) {
    console.error(`[dirseal] ERROR ${errorMessage(err)}`);
    return EXIT_FAILURE;
  }

  const logger = new ConsoleLogger({ level: config.logLevel });
  logger.debug("Configuration loaded", { source: config.source ?? "defaults" });

  // first Ctrl-C stops between files, a second one kills the process
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Stopping after the current file (Ctrl-C again to force)");
    controller.abort();
  });

  return runCli(process.argv.slice(2), {
    cwd: process.cwd(),
    config,
    logger,
    out: { line: (text) => process.stdout.write(text + "\n") },
    signal: controller.signal,
  });
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`[dirseal] ERROR ${errorMessage(err)}`);
    process.exitCode = EXIT_FAILURE;
  }
);
