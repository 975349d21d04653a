/** Minimal `command [positionals] [--flag value | --switch]` parser. */
export interface ParsedArgs {
  command: string | null;
  positionals: string[];
  flags: Map<string, string | true>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const [command = null, ...rest] = argv;
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }
    const name = arg.slice(2);
    const value = rest[i + 1];
    if (value !== undefined && !value.startsWith('--')) {
      flags.set(name, value);
      i++;
    } else {
      flags.set(name, true);
    }
  }

  return { command, positionals, flags };
}

export function numericFlag(flags: ParsedArgs['flags'], name: string, fallback: number): number {
  const raw = flags.get(name);
  if (raw === undefined) return fallback;
  const n = typeof raw === 'string' ? Number(raw) : NaN;
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`--${name} must be a positive integer`);
  }
  return n;
}
