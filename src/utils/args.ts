export type CliArgs = {
  _: string[];
  flags: Record<string, string | true>;
};

export function parseCliArgs(argv: string[]): CliArgs {
  const out: CliArgs = { _: [], flags: {} };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    if (!token.startsWith("--")) {
      out._.push(token);
      continue;
    }

    const eq = token.indexOf("=");
    if (eq !== -1) {
      out.flags[token.slice(2, eq)] = token.slice(eq + 1);
      continue;
    }

    const k = token.slice(2);
    const next = argv[i + 1];

    if (next !== undefined && !next.startsWith("--")) {
      out.flags[k] = next;
      i++;
    } else {
      out.flags[k] = true;
    }
  }

  return out;
}

export function getArg(args: CliArgs, name: string): string | undefined;
export function getArg(args: CliArgs, name: string, fallback: string): string;
export function getArg(args: CliArgs, name: string, fallback?: string) {
  const v = args.flags[name];
  if (v === undefined || v === true) return fallback;
  return v;
}

export function hasFlag(args: CliArgs, name: string) {
  return args.flags[name] !== undefined;
}
