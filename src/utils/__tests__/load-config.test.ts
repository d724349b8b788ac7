import { describe, expect, it } from 'vitest';

import { DEFAULT_CONFIG, loadConfig } from '../load-config';

describe('loadConfig', () => {
  it('uses the defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({ onUnreadable: 'skip', detectCycles: true });
  });

  it('reads both settings from the environment', () => {
    const config = loadConfig({
      DIR_FINDER_ON_UNREADABLE: ' ABORT ',
      DIR_FINDER_DETECT_CYCLES: 'false',
    });

    expect(config).toEqual({ onUnreadable: 'abort', detectCycles: false });
  });

  it('accepts 1 and 0 for the cycle flag', () => {
    expect(loadConfig({ DIR_FINDER_DETECT_CYCLES: '0' }).detectCycles).toBe(false);
    expect(loadConfig({ DIR_FINDER_DETECT_CYCLES: ' TRUE ' }).detectCycles).toBe(true);
  });

  it('falls back to the defaults for invalid values', () => {
    const config = loadConfig({
      DIR_FINDER_ON_UNREADABLE: 'sometimes',
      DIR_FINDER_DETECT_CYCLES: 'maybe',
    });

    expect(config).toEqual(DEFAULT_CONFIG);
  });
});
