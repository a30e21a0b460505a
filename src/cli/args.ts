export interface CliArgs {
  command?: string;
  args: string[];
  options: Record<string, string | boolean>;
}

/**
 * Split argv (without node and script) into command, positionals and
 * `--key value` / `--flag` options
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const [command, ...rest] = argv;
  const options: Record<string, string | boolean> = {};
  const remaining: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg && arg.startsWith('--')) {
      const key = arg.slice(2);
      const nextArg = rest[i + 1];
      if (nextArg && !nextArg.startsWith('--')) {
        options[key] = nextArg;
        i++;
      } else {
        options[key] = true;
      }
    } else if (arg) {
      remaining.push(arg);
    }
  }

  return { command, args: remaining, options };
}

export function stringOption(options: CliArgs['options'], key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

export function flagOption(options: CliArgs['options'], key: string): boolean {
  return options[key] === true;
}

/**
 * @throws Error when the option is present but not a finite number
 */
export function numberOption(options: CliArgs['options'], key: string): number | undefined {
  const value = stringOption(options, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`--${key} expects a number, got "${value}"`);
  }
  return parsed;
}
