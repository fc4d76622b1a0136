import type { LogLevel, LogMeta, Logger } from "../ports/logger";
import { LOG_LEVELS } from "../ports/logger";

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  prefix?: string;
};

/**
 * Logger that writes to stderr so stdout stays free for command output.
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly prefix: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LOG_LEVELS.indexOf(options.level ?? "info");
    this.prefix = options.prefix ?? "[dirseal]";
  }

  debug(message: string, meta?: LogMeta): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write("error", message, meta);
  }

  private write(level: LogLevel, message: string, meta?: LogMeta) {
    if (LOG_LEVELS.indexOf(level) < this.threshold) return;

    const line = formatLogLine(this.prefix, level, message, meta);
    console.error(line);
  }
}

export function formatLogLine(prefix: string, level: LogLevel, message: string, meta?: LogMeta): string {
  const head = `${prefix} ${level.toUpperCase()} ${message}`;
  if (!meta || Object.keys(meta).length === 0) return head;
  return `${head} ${JSON.stringify(meta)}`;
}
