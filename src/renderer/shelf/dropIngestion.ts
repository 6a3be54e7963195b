import { fileURLToPath } from 'url';
import { shelfLogger, type ShelfLogger } from '../../utils/shelfLogger';
import type { FileEntry } from '../../common/fileTypes';

/** One item of an incoming drag, as handed over by the drag transport. */
export interface DropPayload {
  description: string;
  canResolvePath: () => boolean;
  resolvePath: () => Promise<string>;
}

export interface DropTarget {
  addRootEntry: (filePath: string) => Promise<FileEntry | null>;
}

export interface DropFailure {
  description: string;
  message: string;
}

export interface DropOutcome {
  added: FileEntry[];
  duplicates: string[];
  failures: DropFailure[];
  skipped: number;
}

export interface DropIngestion {
  /** The gesture was taken: at least one payload began processing. */
  accepted: boolean;
  /** Resolves once every payload has been handled; never rejects. */
  settled: Promise<DropOutcome>;
}

export interface DropIngestionOptions {
  logger?: ShelfLogger;
}

export interface DropDataSource {
  readonly files: ArrayLike<File>;
  getData: (format: string) => string;
}

const describeFailure = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export const ingestDrop = (
  payloads: readonly DropPayload[],
  target: DropTarget,
  { logger = shelfLogger }: DropIngestionOptions = {},
): DropIngestion => {
  const outcome: DropOutcome = { added: [], duplicates: [], failures: [], skipped: 0 };

  const resolvable = payloads.filter((payload) => {
    if (payload.canResolvePath()) {
      return true;
    }
    outcome.skipped += 1;
    logger.logPayloadSkipped(payload.description);
    return false;
  });

  const processPayload = async (payload: DropPayload) => {
    let filePath: string;
    try {
      filePath = await payload.resolvePath();
    } catch (error) {
      logger.logResolutionFailure(payload.description, error);
      outcome.failures.push({ description: payload.description, message: describeFailure(error) });
      return;
    }
    const entry = await target.addRootEntry(filePath);
    if (entry) {
      outcome.added.push(entry);
    } else {
      outcome.duplicates.push(filePath);
    }
  };

  const settled = Promise.allSettled(resolvable.map(processPayload)).then((results) => {
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const { description } = resolvable[index];
        logger.logResolutionFailure(description, result.reason);
        outcome.failures.push({ description, message: describeFailure(result.reason) });
      }
    });
    return outcome;
  });

  return { accepted: resolvable.length > 0, settled };
};

export const pathPayload = (filePath: string): DropPayload => ({
  description: filePath,
  canResolvePath: () => filePath.length > 0,
  resolvePath: async () => filePath,
});

const fileUrlPayload = (uri: string): DropPayload => ({
  description: uri,
  canResolvePath: () => uri.startsWith('file:'),
  resolvePath: async () => fileURLToPath(uri),
});

/** Parses a `text/uri-list` body; comment lines start with `#`. */
export const uriListPayloads = (text: string): DropPayload[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map(fileUrlPayload);

/**
 * Payloads for a browser drop event. `resolveFile` is the host's way of mapping
 * a dropped `File` to its location on disk; without it, or when the drop carries
 * no files, the `text/uri-list` data is used instead.
 */
export const dataTransferPayloads = (
  source: DropDataSource,
  resolveFile?: (file: File) => string | null,
): DropPayload[] => {
  const files = Array.from(source.files);
  if (resolveFile && files.length > 0) {
    return files.map((file) => {
      const resolved = resolveFile(file);
      return {
        description: file.name,
        canResolvePath: () => resolved !== null && resolved.length > 0,
        resolvePath: async () => {
          if (resolved === null) {
            throw new Error(`No file path for ${file.name}`);
          }
          return resolved;
        },
      };
    });
  }
  return uriListPayloads(source.getData('text/uri-list'));
};
