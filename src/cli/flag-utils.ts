import { CliUsageError } from './errors.js';

export type FlagMap = Partial<Record<string, string>>;

/**
 * Remove `--flag value` pairs for the given keys from `args` and return them.
 */
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
      throw new CliUsageError(`Flag '${token}' requires a value.`);
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

/**
 * First value present among the aliases of one flag, e.g. `pickFlag(flags, '--path', '-p')`.
 */
export function pickFlag(flags: FlagMap, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = flags[name];
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Fail on anything left in `args` that looks like an unknown flag or an extra positional.
 */
export function rejectLeftoverArgs(args: readonly string[], maxPositionals = 0): string[] {
  const unknownFlag = args.find((arg) => arg.startsWith('-'));
  if (unknownFlag) {
    throw new CliUsageError(`Unknown flag '${unknownFlag}'.`);
  }
  if (args.length > maxPositionals) {
    throw new CliUsageError(`Unexpected arguments: ${args.slice(maxPositionals).join(' ')}`);
  }
  return [...args];
}
