export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type ParsedArgs = {
  positionals: string[];
  flags: Partial<Record<string, string>>;
};

/**
 * Splits `args` into positionals and `--flag value` pairs. Only the flags
 * listed in `valueFlags` are accepted.
 */
export function parseArgs(args: string[], valueFlags: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Partial<Record<string, string>> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const [name, inline] = splitInline(arg.slice(2));
    if (!valueFlags.includes(name)) throw new UsageError(`Unknown option --${name}`);

    const value = inline ?? args[++i];
    if (value === undefined || value === "") throw new UsageError(`Option --${name} needs a value`);
    flags[name] = value;
  }

  return { positionals, flags };
}

function splitInline(flag: string): [string, string | undefined] {
  const eq = flag.indexOf("=");
  return eq >= 0 ? [flag.slice(0, eq), flag.slice(eq + 1)] : [flag, undefined];
}
