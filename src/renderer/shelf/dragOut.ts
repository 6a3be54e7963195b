import { pathToFileURL } from 'url';
import { shelfLogger, type ShelfLogger } from '../../utils/shelfLogger';
import type { FileEntry, FileEntryId } from '../../common/fileTypes';
import type { DragCompletionStrategy } from '../../types/shelf';
import type { ShelfStore } from './store';

/** What the drag transport carries for an outbound entry. */
export interface DragProvider {
  entryId: FileEntryId;
  path: string;
  name: string;
  uri: string;
}

export interface ActivationSource {
  /** Called whenever the app regains foreground focus. Returns an unsubscribe. */
  onDidBecomeActive: (listener: () => void) => () => void;
}

export interface DragOutCoordinator {
  beginDrag: (entry: FileEntry) => DragProvider;
  finishDrag: (id: FileEntryId, accepted: boolean) => boolean;
  cancelDrag: () => void;
  handleReactivation: () => boolean;
  deleteEntry: (id: FileEntryId) => boolean;
  draggingId: () => FileEntryId | null;
  dispose: () => void;
}

export interface DragOutOptions {
  store: ShelfStore;
  activation?: ActivationSource;
  strategy?: DragCompletionStrategy;
  logger?: ShelfLogger;
}

export const createDragProvider = (entry: FileEntry): DragProvider => ({
  entryId: entry.id,
  path: entry.path,
  name: entry.name,
  uri: pathToFileURL(entry.path).href,
});

/**
 * Tracks the entry currently being dragged out of the shelf and removes it once
 * the drag is judged complete.
 *
 * With the `reactivation` strategy there is no real end-of-drag signal: the
 * app regaining focus is taken to mean the item landed somewhere else. That
 * guess removes items after an aborted drag too, and misses removals when focus
 * never changes. Only one item is tracked at a time.
 */
export const createDragOutCoordinator = ({
  store,
  activation,
  strategy = 'reactivation',
  logger = shelfLogger,
}: DragOutOptions): DragOutCoordinator => {
  let dragging: DragProvider | null = null;

  const coordinator: DragOutCoordinator = {
    beginDrag(entry) {
      dragging = createDragProvider(entry);
      logger.logDrag({ stage: 'begin', path: entry.path });
      return dragging;
    },
    finishDrag(id, accepted) {
      if (strategy !== 'completion-callback' || !dragging || dragging.entryId !== id) {
        return false;
      }
      const { path } = dragging;
      dragging = null;
      const removed = accepted && store.getState().removeEntry(id);
      logger.logDrag({ stage: 'finish', path, removed });
      return removed;
    },
    cancelDrag() {
      if (!dragging) return;
      logger.logDrag({ stage: 'cancel', path: dragging.path });
      dragging = null;
    },
    handleReactivation() {
      if (strategy !== 'reactivation' || !dragging) {
        return false;
      }
      const { entryId, path } = dragging;
      dragging = null;
      const removed = store.getState().removeEntry(entryId);
      logger.logDrag({ stage: 'reactivation', path, removed });
      return removed;
    },
    deleteEntry(id) {
      return store.getState().removeEntry(id);
    },
    draggingId() {
      return dragging?.entryId ?? null;
    },
    dispose() {
      unsubscribe?.();
      unsubscribe = null;
    },
  };

  let unsubscribe: (() => void) | null =
    activation && strategy === 'reactivation'
      ? activation.onDidBecomeActive(() => {
          coordinator.handleReactivation();
        })
      : null;

  return coordinator;
};
