import { CliUsageError } from './errors.js';

export type FlagMap = Partial<Record<string, string>>;

/** Remove `--flag value` pairs for `keys` from `args` and return them. */
export function extractFlags(args: string[], keys: readonly string[]): FlagMap {
  const flags: FlagMap = {};
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !keys.includes(token)) {
      index += 1;
      continue;
    }
    const value = args[index + 1];
    if (value === undefined) {
      throw new Error(`Flag '${token}' requires a value.`);
    }
    flags[token] = value;
    args.splice(index, 2);
  }
  return flags;
}

export function extractBooleanFlags(args: string[], keys: readonly string[]): Set<string> {
  const flags = new Set<string>();
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !keys.includes(token)) {
      index += 1;
      continue;
    }
    flags.add(token);
    args.splice(index, 1);
  }
  return flags;
}

/** The first of `names` present in `flags`. */
export function pickFlag(flags: FlagMap, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = flags[name];
    if (value !== undefined) return value;
  }
  return undefined;
}

/** Whatever is left after flag extraction must be positional. */
export function takePositionals(args: readonly string[], max: number, usage: string): string[] {
  const unknown = args.find((arg) => arg.startsWith('-'));
  if (unknown) throw new CliUsageError(`Unknown flag '${unknown}'. ${usage}`);
  if (args.length > max) throw new CliUsageError(`Too many arguments. ${usage}`);
  return [...args];
}
