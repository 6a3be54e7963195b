import { createFileEntry, isSameEntry } from '../../common/fileEntry';
import { isHiddenName, lastPathComponent } from '../../common/path';
import { shelfLogger, type ShelfLogger } from '../../utils/shelfLogger';
import { sortEntries } from './sort';
import type { FileEntry, FileEntryId, ShelfFileSystem } from '../../common/fileTypes';

export interface ShelfServices {
  fileSystem: ShelfFileSystem;
  logger?: ShelfLogger;
}

export type ListingStatus = 'ready' | 'loading' | 'failed';

export interface ShelfState {
  rootEntries: readonly FileEntry[];
  navigationStack: readonly string[];
  displayedEntries: readonly FileEntry[];
  listingStatus: ListingStatus;
  listingError: string | null;
  /** Lists `navigationStack` (defaults to the current one), publishing it with the result. */
  recomputeDisplay: (navigationStack?: readonly string[]) => Promise<void>;
  addRootEntry: (filePath: string) => Promise<FileEntry | null>;
  removeEntry: (id: FileEntryId) => boolean;
}

export interface ShelfStore {
  getState: () => ShelfState;
  setState: (updater: Partial<ShelfState> | ((state: ShelfState) => Partial<ShelfState>)) => void;
  subscribe: (listener: (state: ShelfState) => void) => () => void;
}

const describeFailure = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export const createShelfStore = (services: ShelfServices): ShelfStore => {
  const { fileSystem } = services;
  const logger = services.logger ?? shelfLogger;
  // Bumped on every recompute; a listing that resolves under an older value is dropped.
  let listingGeneration = 0;

  const publishRoot = (
    rootEntries: readonly FileEntry[],
    navigationStack: readonly string[] = state.navigationStack,
  ) => {
    listingGeneration += 1;
    update({
      rootEntries,
      navigationStack,
      displayedEntries: sortEntries(rootEntries),
      listingStatus: 'ready',
      listingError: null,
    });
  };

  const listFolder = async (navigationStack: readonly string[], folder: string) => {
    const generation = ++listingGeneration;
    update({ navigationStack, displayedEntries: [], listingStatus: 'loading', listingError: null });

    let entries: FileEntry[] = [];
    let failure: string | null = null;
    try {
      const children = await fileSystem.listDirectory(folder);
      const visible = children.filter((child) => !isHiddenName(lastPathComponent(child)));
      entries = await Promise.all(visible.map((child) => createFileEntry(child, fileSystem)));
      if (generation === listingGeneration) {
        logger.logListingComplete({
          folder,
          entryCount: entries.length,
          hiddenCount: children.length - visible.length,
        });
      }
    } catch (error) {
      failure = describeFailure(error);
      if (generation === listingGeneration) {
        logger.logListingFailure(folder, error);
      }
    }

    if (generation !== listingGeneration) {
      return;
    }
    update({
      displayedEntries: sortEntries(entries),
      listingStatus: failure === null ? 'ready' : 'failed',
      listingError: failure,
    });
  };

  let state: ShelfState = {
    rootEntries: [],
    navigationStack: [],
    displayedEntries: [],
    listingStatus: 'ready',
    listingError: null,
    async recomputeDisplay(navigationStack = state.navigationStack) {
      const folder = navigationStack[navigationStack.length - 1];
      if (folder === undefined) {
        publishRoot(state.rootEntries, navigationStack);
        return;
      }
      await listFolder(navigationStack, folder);
    },
    async addRootEntry(filePath) {
      const entry = await createFileEntry(filePath, fileSystem);
      // Checked after the await so overlapping drops of one path still dedupe.
      if (state.rootEntries.some((existing) => isSameEntry(existing, entry))) {
        logger.logDuplicateDrop(filePath);
        return null;
      }
      const rootEntries = [...state.rootEntries, entry];
      if (state.navigationStack.length === 0) {
        publishRoot(rootEntries);
      } else {
        update({ rootEntries });
      }
      logger.logEntryAdded({
        path: entry.path,
        isDirectory: entry.isDirectory,
        rootCount: rootEntries.length,
      });
      return entry;
    },
    removeEntry(id) {
      const target =
        state.displayedEntries.find((entry) => entry.id === id) ??
        state.rootEntries.find((entry) => entry.id === id);
      if (!target) {
        return false;
      }
      if (state.navigationStack.length === 0) {
        publishRoot(state.rootEntries.filter((entry) => !isSameEntry(entry, target)));
        return true;
      }
      // Browsing: hide from the current listing only, the shelf keeps its entry.
      const displayedEntries = state.displayedEntries.filter((entry) => entry.id !== id);
      if (displayedEntries.length === state.displayedEntries.length) {
        return false;
      }
      update({ displayedEntries });
      return true;
    },
  };

  const listeners = new Set<(s: ShelfState) => void>();

  const update = (
    partial: Partial<ShelfState> | ((state: ShelfState) => Partial<ShelfState>),
  ) => {
    const partialState = typeof partial === 'function' ? partial(state) : partial;
    state = { ...state, ...partialState };
    listeners.forEach((listener) => listener(state));
  };

  return {
    getState: () => state,
    setState: update,
    subscribe(listener) {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
  };
};
