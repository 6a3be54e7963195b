import { shelfLogger, type ShelfLogger } from '../../utils/shelfLogger';
import type { FileEntry, FileLauncher } from '../../common/fileTypes';
import type { ShelfStore } from './store';

export type ActivationResult = 'navigated' | 'opened' | 'failed';

export interface NavigationController {
  push: (entry: FileEntry) => Promise<boolean>;
  pop: () => Promise<boolean>;
  popToRoot: () => Promise<void>;
  activate: (entry: FileEntry) => Promise<ActivationResult>;
  currentFolder: () => string | null;
  isAtRoot: () => boolean;
}

export interface NavigationOptions {
  store: ShelfStore;
  launcher: FileLauncher;
  logger?: ShelfLogger;
}

export const createNavigationController = ({
  store,
  launcher,
  logger = shelfLogger,
}: NavigationOptions): NavigationController => {
  const controller: NavigationController = {
    async push(entry) {
      if (!entry.isDirectory) {
        return false;
      }
      const { navigationStack, recomputeDisplay } = store.getState();
      await recomputeDisplay([...navigationStack, entry.path]);
      return true;
    },
    async pop() {
      const { navigationStack, recomputeDisplay } = store.getState();
      if (navigationStack.length === 0) {
        return false;
      }
      await recomputeDisplay(navigationStack.slice(0, -1));
      return true;
    },
    async popToRoot() {
      while (await controller.pop()) {
        // unwind one level at a time so every step recomputes
      }
    },
    async activate(entry) {
      if (entry.isDirectory) {
        await controller.push(entry);
        return 'navigated';
      }
      try {
        await launcher.openPath(entry.path);
        return 'opened';
      } catch (error) {
        logger.logOpenFailure(entry.path, error);
        return 'failed';
      }
    },
    currentFolder() {
      const { navigationStack } = store.getState();
      return navigationStack[navigationStack.length - 1] ?? null;
    },
    isAtRoot() {
      return store.getState().navigationStack.length === 0;
    },
  };

  return controller;
};
