import type { ShelfLogger } from '../../utils/shelfLogger';
import type { IconHandle, PathInspection, ShelfFileSystem } from '../../common/fileTypes';

type NodeKind = 'file' | 'dir';

export interface MemoryFileSystem extends ShelfFileSystem {
  addFile: (filePath: string) => void;
  addDirectory: (directoryPath: string) => void;
  remove: (filePath: string) => void;
  denyListing: (directoryPath: string) => void;
  listCalls: string[];
}

const parentOf = (filePath: string) => {
  const index = filePath.lastIndexOf('/');
  return index <= 0 ? '/' : filePath.slice(0, index);
};

/** Paths are POSIX-style; parents must be added before their children are listed. */
export const createMemoryFileSystem = (
  layout: Record<string, NodeKind> = {},
): MemoryFileSystem => {
  const nodes = new Map<string, NodeKind>(Object.entries(layout));
  const denied = new Set<string>();
  const listCalls: string[] = [];

  return {
    listCalls,
    addFile(filePath) {
      nodes.set(filePath, 'file');
    },
    addDirectory(directoryPath) {
      nodes.set(directoryPath, 'dir');
    },
    remove(filePath) {
      Array.from(nodes.keys())
        .filter((key) => key === filePath || key.startsWith(`${filePath}/`))
        .forEach((key) => nodes.delete(key));
    },
    denyListing(directoryPath) {
      denied.add(directoryPath);
    },
    async inspect(filePath): Promise<PathInspection> {
      const kind = nodes.get(filePath);
      return { exists: kind !== undefined, isDirectory: kind === 'dir' };
    },
    async listDirectory(directoryPath) {
      listCalls.push(directoryPath);
      if (denied.has(directoryPath)) {
        throw new Error(`EACCES: permission denied, scandir '${directoryPath}'`);
      }
      if (nodes.get(directoryPath) !== 'dir') {
        throw new Error(`ENOENT: no such file or directory, scandir '${directoryPath}'`);
      }
      return Array.from(nodes.keys()).filter(
        (key) => key !== directoryPath && parentOf(key) === directoryPath,
      );
    },
    iconFor(filePath, isDirectory): IconHandle {
      if (filePath.endsWith('.app')) return { kind: 'application', mimeType: null };
      return isDirectory
        ? { kind: 'folder', mimeType: 'inode/directory' }
        : { kind: 'file', mimeType: null };
    },
  };
};

export const createSilentLogger = (): jest.Mocked<ShelfLogger> => ({
  logEntryAdded: jest.fn(),
  logDuplicateDrop: jest.fn(),
  logListingComplete: jest.fn(),
  logListingFailure: jest.fn(),
  logPayloadSkipped: jest.fn(),
  logResolutionFailure: jest.fn(),
  logOpenFailure: jest.fn(),
  logDrag: jest.fn(),
});
