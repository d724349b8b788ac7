import { describe, expect, it } from 'vitest';

import { ConfigError } from '../../domain/errors';
import { parseCliArgs } from '../parse-cli-args';

describe('parseCliArgs', () => {
  it('collects the root, repeated filters and flags', () => {
    const parsed = parseCliArgs([
      '../src',
      '--ext',
      '.c',
      '-e',
      '.h',
      '--exclude-dir',
      'examples',
      '--json',
    ]);

    expect(parsed).toEqual({
      root: '../src',
      extensions: ['.c', '.h'],
      excludedDirectories: ['examples'],
      onUnreadable: null,
      detectCycles: null,
      json: true,
      help: false,
    });
  });

  it('defaults to no root when none is given', () => {
    expect(parseCliArgs([]).root).toBeNull();
  });

  it('reads the unreadable-directory policy and cycle flag', () => {
    const parsed = parseCliArgs(['--on-unreadable', 'abort', '--no-cycle-detection']);

    expect(parsed.onUnreadable).toBe('abort');
    expect(parsed.detectCycles).toBe(false);
  });

  it('rejects an unknown policy', () => {
    expect(() => parseCliArgs(['--on-unreadable', 'later'])).toThrow(
      'Invalid value for --on-unreadable: later (expected skip or abort)',
    );
  });

  it('rejects an option without its value', () => {
    expect(() => parseCliArgs(['--ext'])).toThrow('Missing value for --ext');
    expect(() => parseCliArgs(['--exclude-dir', '--json'])).toThrow(
      'Missing value for --exclude-dir',
    );
  });

  it('rejects unknown options and extra arguments', () => {
    expect(() => parseCliArgs(['--fast'])).toThrow(ConfigError);
    expect(() => parseCliArgs(['a', 'b'])).toThrow('Unexpected argument: b');
  });

  it('recognises help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
  });
});
