import type { FileEntry } from '../../common/fileTypes';

// Finder-style ordering: case-insensitive, digits compared as numbers.
const nameCollator = new Intl.Collator(undefined, { numeric: true, sensitivity: 'base' });

export const compareEntries = (a: FileEntry, b: FileEntry): number => {
  if (a.isDirectory && !b.isDirectory) return -1;
  if (!a.isDirectory && b.isDirectory) return 1;
  return nameCollator.compare(a.name, b.name);
};

export const sortEntries = (entries: readonly FileEntry[]): FileEntry[] =>
  [...entries].sort(compareEntries);
