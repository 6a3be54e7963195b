import crypto from 'crypto';
import { isApplicationBundle, lastPathComponent } from './path';
import type { FileEntry, ShelfFileSystem } from './fileTypes';

/**
 * Builds an immutable entry for `filePath`. The directory flag and icon are
 * looked up once here and never refreshed; application bundles are treated as
 * launchable files even though they are folders on disk.
 */
export const createFileEntry = async (
  filePath: string,
  fileSystem: ShelfFileSystem,
): Promise<FileEntry> => {
  const inspection = await fileSystem.inspect(filePath);
  const isDirectory =
    inspection.exists && inspection.isDirectory && !isApplicationBundle(filePath);
  const icon = await fileSystem.iconFor(filePath, isDirectory);

  return Object.freeze({
    id: crypto.randomUUID(),
    path: filePath,
    name: lastPathComponent(filePath),
    isDirectory,
    icon: Object.freeze({ ...icon }),
  });
};

export const isSameEntry = (a: FileEntry, b: FileEntry) => a.path === b.path;

export type { FileEntry } from './fileTypes';
