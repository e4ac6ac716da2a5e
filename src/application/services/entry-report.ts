import type { DirectoryEntries } from '../../domain/directory-listing';
import { ENTRY_KIND } from '../../domain/entry-kind';
import type { EntryKind } from '../../domain/entry-kind';

export type EntryLine = {
  name: string;
  kind: EntryKind | null;
  error?: string;
};

export const KIND_MARKER: Record<EntryKind, string> = {
  [ENTRY_KIND.FILE]: 'f',
  [ENTRY_KIND.DIRECTORY]: 'd',
  [ENTRY_KIND.OTHER]: '?',
};

export const PROBE_FAILED_MARKER = '!';

const compareNames = (left: string, right: string) => {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
};

/**
 * Resolve the kind of every entry, sorted by name. A failed probe becomes a
 * line with `kind: null` instead of failing the whole report.
 */
export const describeEntries = async (entries: DirectoryEntries): Promise<EntryLine[]> => {
  const sorted = Array.from(entries.entries()).sort(([left], [right]) => compareNames(left, right));
  return Promise.all(
    sorted.map(async ([name, entry]): Promise<EntryLine> => {
      try {
        return { name, kind: await entry.kind() };
      } catch (error) {
        return { name, kind: null, error: error instanceof Error ? error.message : String(error) };
      }
    }),
  );
};

export const formatEntryLine = (line: EntryLine): string => {
  const marker = line.kind ? KIND_MARKER[line.kind] : PROBE_FAILED_MARKER;
  const suffix = line.kind === ENTRY_KIND.DIRECTORY ? '/' : '';
  return `${marker} ${line.name}${suffix}`;
};
