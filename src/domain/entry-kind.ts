import type { ValueOf } from '../types/value-of';

export const ENTRY_KIND = {
  FILE: 'file',
  DIRECTORY: 'directory',
  OTHER: 'other',
} as const;

export type EntryKind = ValueOf<typeof ENTRY_KIND>;
