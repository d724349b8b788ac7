import { z } from 'zod';

import type { ValueOf } from '../types/value-of';

/**
 * What the walker does when a directory cannot be opened.
 * - skip: record it in the report, log a warning and keep walking
 * - abort: rethrow the listing error, which names the directory
 */
export const UNREADABLE_POLICY = {
  SKIP: 'skip',
  ABORT: 'abort',
} as const;

export type UnreadablePolicy = ValueOf<typeof UNREADABLE_POLICY>;

export const unreadablePolicySchema = z.enum(
  Object.values(UNREADABLE_POLICY) as [UnreadablePolicy, ...UnreadablePolicy[]],
);
