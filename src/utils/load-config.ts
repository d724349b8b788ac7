import { z } from 'zod';

import { UNREADABLE_POLICY, unreadablePolicySchema } from '../domain/unreadable-policy';
import type { UnreadablePolicy } from '../domain/unreadable-policy';
import { getLogger } from './get-logger';

export type FinderConfig = {
  onUnreadable: UnreadablePolicy;
  detectCycles: boolean;
};

export const DEFAULT_CONFIG: FinderConfig = {
  onUnreadable: UNREADABLE_POLICY.SKIP,
  detectCycles: true,
};

const logger = getLogger('config');

const booleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

/**
 * Read finder settings from the environment:
 * DIR_FINDER_ON_UNREADABLE (skip | abort) and DIR_FINDER_DETECT_CYCLES (true | false).
 * Invalid values fall back to the defaults with a warning.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): FinderConfig => {
  const config: FinderConfig = { ...DEFAULT_CONFIG };

  const rawPolicy = env.DIR_FINDER_ON_UNREADABLE;
  if (rawPolicy) {
    const parsed = unreadablePolicySchema.safeParse(rawPolicy.trim().toLowerCase());
    if (parsed.success) {
      config.onUnreadable = parsed.data;
    } else {
      logger.warn(
        { value: rawPolicy, fallback: config.onUnreadable },
        'Ignoring invalid DIR_FINDER_ON_UNREADABLE',
      );
    }
  }

  const rawDetectCycles = env.DIR_FINDER_DETECT_CYCLES;
  if (rawDetectCycles) {
    const parsed = booleanFlagSchema.safeParse(rawDetectCycles);
    if (parsed.success) {
      config.detectCycles = parsed.data;
    } else {
      logger.warn(
        { value: rawDetectCycles, fallback: config.detectCycles },
        'Ignoring invalid DIR_FINDER_DETECT_CYCLES',
      );
    }
  }

  return config;
};
