import { ConfigError } from '../domain/errors';
import { unreadablePolicySchema } from '../domain/unreadable-policy';
import type { UnreadablePolicy } from '../domain/unreadable-policy';

export type ParsedArgs = {
  root: string | null;
  extensions: string[];
  excludedDirectories: string[];
  onUnreadable: UnreadablePolicy | null;
  detectCycles: boolean | null;
  json: boolean;
  help: boolean;
};

export const parseCliArgs = (args: string[]): ParsedArgs => {
  const parsed: ParsedArgs = {
    root: null,
    extensions: [],
    excludedDirectories: [],
    onUnreadable: null,
    detectCycles: null,
    json: false,
    help: false,
  };

  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (!token) {
      index += 1;
      continue;
    }
    if (token === '--help' || token === '-h') {
      parsed.help = true;
      index += 1;
      continue;
    }
    if (token === '--json') {
      parsed.json = true;
      index += 1;
      continue;
    }
    if (token === '--no-cycle-detection') {
      parsed.detectCycles = false;
      index += 1;
      continue;
    }
    if (token === '--ext' || token === '-e') {
      parsed.extensions.push(requireValue(token, args[index + 1]));
      index += 2;
      continue;
    }
    if (token === '--exclude-dir' || token === '-x') {
      parsed.excludedDirectories.push(requireValue(token, args[index + 1]));
      index += 2;
      continue;
    }
    if (token === '--on-unreadable') {
      const value = requireValue(token, args[index + 1]);
      const policy = unreadablePolicySchema.safeParse(value);
      if (!policy.success) {
        throw new ConfigError(`Invalid value for --on-unreadable: ${value} (expected skip or abort)`);
      }
      parsed.onUnreadable = policy.data;
      index += 2;
      continue;
    }
    if (token.startsWith('-')) {
      throw new ConfigError(`Unknown option: ${token}`);
    }
    if (parsed.root !== null) {
      throw new ConfigError(`Unexpected argument: ${token}`);
    }
    parsed.root = token;
    index += 1;
  }

  return parsed;
};

const requireValue = (option: string, value: string | undefined): string => {
  if (!value || value.startsWith('--')) {
    throw new ConfigError(`Missing value for ${option}`);
  }
  return value;
};
