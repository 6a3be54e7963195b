import { useEffect, useState } from 'react';
import type { DragEvent } from 'react';
import type { FileEntry, IconKind } from '../common/fileTypes';
import type { ShelfConfig } from '../types/shelf';
import { shelfLogger, type ShelfLogger } from '../utils/shelfLogger';
import {
  dataTransferPayloads,
  ingestDrop,
  type DropDataSource,
} from './shelf/dropIngestion';
import type { DragOutCoordinator } from './shelf/dragOut';
import type { NavigationController } from './shelf/navigation';
import type { ShelfState, ShelfStore } from './shelf/store';
import {
  canNavigateBack,
  emptyStateMessage,
  headerTitle,
  truncateMiddle,
} from './shelf/viewModel';

const ICON_GLYPHS: Record<IconKind, string> = {
  folder: '📁',
  application: '🚀',
  file: '📄',
};

const useShelfState = (store: ShelfStore): ShelfState => {
  const [state, setState] = useState<ShelfState>(store.getState());

  useEffect(() => {
    const unsubscribe = store.subscribe(setState);
    setState(store.getState());
    return unsubscribe;
  }, [store]);

  return state;
};

interface DropTargetOverlayProps {
  isTargeted: boolean;
  onTargetedChange: (targeted: boolean) => void;
  onDrop: (source: DropDataSource) => void;
}

const DropTargetOverlay = ({ isTargeted, onTargetedChange, onDrop }: DropTargetOverlayProps) => (
  <div
    className={`drop-area ${isTargeted ? 'targeted' : ''}`}
    data-testid="drop-area"
    onDragEnter={(event: DragEvent<HTMLDivElement>) => {
      event.preventDefault();
      onTargetedChange(true);
    }}
    onDragOver={(event: DragEvent<HTMLDivElement>) => {
      event.preventDefault();
    }}
    onDragLeave={() => onTargetedChange(false)}
    onDrop={(event: DragEvent<HTMLDivElement>) => {
      event.preventDefault();
      onTargetedChange(false);
      onDrop(event.dataTransfer);
    }}
  >
    <span className="drop-area-label">Drop Files Here</span>
  </div>
);

interface FileCardProps {
  entry: FileEntry;
  maxNameLength: number;
  onActivate: (entry: FileEntry) => void;
  onDelete: (entry: FileEntry) => void;
  onDragStart: (event: DragEvent<HTMLDivElement>, entry: FileEntry) => void;
  onDragEnd: (event: DragEvent<HTMLDivElement>, entry: FileEntry) => void;
}

const FileCard = ({
  entry,
  maxNameLength,
  onActivate,
  onDelete,
  onDragStart,
  onDragEnd,
}: FileCardProps) => (
  <div
    className="file-card"
    title={entry.path}
    draggable
    onDragStart={(event) => onDragStart(event, entry)}
    onDragEnd={(event) => onDragEnd(event, entry)}
    onDoubleClick={() => onActivate(entry)}
  >
    <span className={`file-card-icon icon-${entry.icon.kind}`} aria-hidden="true">
      {ICON_GLYPHS[entry.icon.kind]}
    </span>
    <span className="file-card-name">{truncateMiddle(entry.name, maxNameLength)}</span>
    <button
      type="button"
      className="file-card-remove"
      aria-label={`Remove ${entry.name}`}
      onClick={(event) => {
        event.stopPropagation();
        onDelete(entry);
      }}
    >
      ×
    </button>
  </div>
);

export interface ShelfAppProps {
  store: ShelfStore;
  navigation: NavigationController;
  dragOut: DragOutCoordinator;
  config: ShelfConfig;
  /** Maps a dropped `File` to its path on disk, where the host can. */
  resolveDroppedFile?: (file: File) => string | null;
  logger?: ShelfLogger;
}

const ShelfApp = ({
  store,
  navigation,
  dragOut,
  config,
  resolveDroppedFile,
  logger = shelfLogger,
}: ShelfAppProps) => {
  const { navigationStack, displayedEntries, listingStatus } = useShelfState(store);
  const [showDropArea, setShowDropArea] = useState(config.showDropAreaOnLaunch);
  const [isTargeted, setIsTargeted] = useState(false);

  const handleDrop = async (source: DropDataSource) => {
    const ingestion = ingestDrop(
      dataTransferPayloads(source, resolveDroppedFile),
      store.getState(),
      { logger },
    );
    if (!ingestion.accepted) return;
    await ingestion.settled;
  };

  const handleActivate = async (entry: FileEntry) => {
    await navigation.activate(entry);
  };

  const handleBack = async () => {
    await navigation.pop();
  };

  const handleDragStart = (event: DragEvent<HTMLDivElement>, entry: FileEntry) => {
    const provider = dragOut.beginDrag(entry);
    event.dataTransfer.effectAllowed = 'copyMove';
    event.dataTransfer.setData('text/uri-list', provider.uri);
    event.dataTransfer.setData('text/plain', provider.path);
  };

  const handleDragEnd = (event: DragEvent<HTMLDivElement>, entry: FileEntry) => {
    if (config.dragCompletion !== 'completion-callback') return;
    dragOut.finishDrag(entry.id, event.dataTransfer.dropEffect !== 'none');
  };

  const emptyMessage = emptyStateMessage(navigationStack, displayedEntries);
  const currentFolder = navigationStack[navigationStack.length - 1];

  const renderContent = () => {
    if (listingStatus === 'loading') {
      return <p className="empty-state">Loading…</p>;
    }
    if (emptyMessage) {
      return <p className="empty-state">{emptyMessage}</p>;
    }
    return (
      <div className="file-grid">
        {displayedEntries.map((entry) => (
          <FileCard
            key={entry.id}
            entry={entry}
            maxNameLength={config.maxDisplayNameLength}
            onActivate={handleActivate}
            onDelete={(target) => dragOut.deleteEntry(target.id)}
            onDragStart={handleDragStart}
            onDragEnd={handleDragEnd}
          />
        ))}
      </div>
    );
  };

  return (
    <div className="shelf-app">
      <div className="shelf-toolbar">
        <button
          type="button"
          className="drop-area-toggle"
          aria-label={showDropArea ? 'Hide drop area' : 'Show drop area'}
          onClick={() => setShowDropArea((visible) => !visible)}
        >
          {showDropArea ? '▴' : '▾'}
        </button>
      </div>
      {showDropArea && (
        <DropTargetOverlay
          isTargeted={isTargeted}
          onTargetedChange={setIsTargeted}
          onDrop={handleDrop}
        />
      )}
      <header className="shelf-header">
        {canNavigateBack(navigationStack) && (
          <button type="button" className="back-button" onClick={handleBack}>
            ‹ Back
          </button>
        )}
        <h1 className="shelf-title" title={currentFolder ?? ''}>
          {headerTitle(navigationStack)}
        </h1>
      </header>
      <main className="shelf-content" aria-busy={listingStatus === 'loading'}>
        {renderContent()}
      </main>
    </div>
  );
};

export default ShelfApp;
