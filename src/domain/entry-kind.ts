import { z } from 'zod';

import type { ValueOf } from '../types/value-of';

export const ENTRY_KIND = {
  FILE: 'file',
  DIRECTORY: 'directory',
  OTHER: 'other',
} as const;

export type EntryKind = ValueOf<typeof ENTRY_KIND>;

export const ENTRY_KIND_SCHEMA = z.enum(
  Object.values(ENTRY_KIND) as [EntryKind, ...EntryKind[]],
);
