export type FileEntryId = string;

export type IconKind = 'folder' | 'application' | 'file';

export interface IconHandle {
  /** Broad category used to pick the glyph drawn for an entry */
  kind: IconKind;
  /** MIME type inferred from the file extension (files only) */
  mimeType: string | null;
}

export interface FileEntry {
  /** UI identity, unique per construction even for the same path */
  readonly id: FileEntryId;
  /** Absolute path on disk; the only field compared for equality */
  readonly path: string;
  /** Last path component */
  readonly name: string;
  /** Resolved once when the entry is built; `.app` bundles are never directories */
  readonly isDirectory: boolean;
  readonly icon: IconHandle;
}

export interface PathInspection {
  exists: boolean;
  isDirectory: boolean;
}

export interface ShelfFileSystem {
  inspect: (filePath: string) => Promise<PathInspection>;
  /** Absolute paths of the direct children of a folder, hidden ones included */
  listDirectory: (directoryPath: string) => Promise<string[]>;
  iconFor: (filePath: string, isDirectory: boolean) => IconHandle | Promise<IconHandle>;
}

export interface FileLauncher {
  /** Opens a path with the handler the OS associates with it */
  openPath: (filePath: string) => Promise<void>;
}
