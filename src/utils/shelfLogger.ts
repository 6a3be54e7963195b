import { bold, cyan, dim, green, magenta, red, yellow, blue } from 'colorette';

const MAX_PATH_LENGTH = 160;

const numberFormatter = new Intl.NumberFormat('en-US');

const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return false;
};

const isProductionBuild = () => {
  if (process.env.DEBUG_PROD === 'true') {
    return false;
  }
  return process.env.NODE_ENV === 'production';
};

const verboseFlagEnabled = () =>
  coerceBoolean(process.env.SHELF_LOG_VERBOSE) || coerceBoolean(process.env.DEBUG_SHELF);

const isVerboseEnabled = () => verboseFlagEnabled() && !isProductionBuild();

const shouldLogProblems = () => !isProductionBuild();

const timestamp = () => dim(new Date().toISOString());

const prefix = cyan('🗂️ [Shelf]');

const formatNumber = (value: number) => numberFormatter.format(value);

const truncatePath = (value: string) => {
  if (value.length <= MAX_PATH_LENGTH) return value;
  const keep = Math.floor((MAX_PATH_LENGTH - 1) / 2);
  return `${value.slice(0, keep)}…${value.slice(value.length - keep)}`;
};

const describeError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(typeof error === 'string' ? error : 'Unknown shelf error');

const buildLines = (header: string, details: string[]) => {
  const lines = [`${timestamp()} ${prefix} ${header}`];
  details.forEach((detail) => {
    if (detail.includes('\n')) {
      lines.push(...detail.split('\n').map((line) => `   ${line}`));
    } else {
      lines.push(`   ${detail}`);
    }
  });
  return lines;
};

const emit = (header: string, details: string[] = []) => {
  buildLines(header, details).forEach((line) => console.log(line));
};

const emitWarning = (header: string, details: string[] = []) => {
  buildLines(header, details).forEach((line) => console.warn(line));
};

const emitError = (header: string, details: string[] = []) => {
  buildLines(header, details).forEach((line) => console.error(line));
};

export interface EntryAddedInfo {
  path: string;
  isDirectory: boolean;
  rootCount: number;
}

export interface ListingInfo {
  folder: string;
  entryCount: number;
  hiddenCount: number;
}

export type DragStage = 'begin' | 'finish' | 'cancel' | 'reactivation';

export interface DragInfo {
  stage: DragStage;
  path: string;
  removed?: boolean;
}

export const logEntryAdded = (info: EntryAddedInfo) => {
  if (!isVerboseEnabled()) return;
  emit(`${green('Added to shelf')} ${bold(truncatePath(info.path))}`, [
    `Kind: ${info.isDirectory ? 'folder' : 'file'}`,
    `Shelf size: ${formatNumber(info.rootCount)}`,
  ]);
};

export const logDuplicateDrop = (filePath: string) => {
  if (!isVerboseEnabled()) return;
  emit(`${dim('Already on shelf')} ${truncatePath(filePath)}`);
};

export const logListingComplete = (info: ListingInfo) => {
  if (!isVerboseEnabled()) return;
  const summary =
    info.entryCount === 0 ? yellow('(empty)') : `${formatNumber(info.entryCount)} entries`;
  emit(`${blue('Listed folder')} ${bold(truncatePath(info.folder))} ${summary}`, [
    `Hidden entries skipped: ${formatNumber(info.hiddenCount)}`,
  ]);
};

export const logListingFailure = (folder: string, error: unknown) => {
  if (!shouldLogProblems()) return;
  const err = describeError(error);
  emitError(`${red('Folder listing failed')} ${bold(truncatePath(folder))}`, [
    'Showing the folder as empty.',
    err.stack ?? err.message,
  ]);
};

export const logPayloadSkipped = (description: string) => {
  if (!shouldLogProblems()) return;
  emitWarning(`${yellow('Dropped item skipped')} ${dim('(cannot resolve to a file path)')}`, [
    `Payload: ${truncatePath(description)}`,
  ]);
};

export const logResolutionFailure = (description: string, error: unknown) => {
  if (!shouldLogProblems()) return;
  const err = describeError(error);
  emitWarning(`${yellow('Could not resolve dropped item')}`, [
    `Payload: ${truncatePath(description)}`,
    err.stack ?? err.message,
  ]);
};

export const logOpenFailure = (filePath: string, error: unknown) => {
  if (!shouldLogProblems()) return;
  const err = describeError(error);
  emitError(`${red('Could not open')} ${bold(truncatePath(filePath))}`, [err.stack ?? err.message]);
};

export const logDrag = (info: DragInfo) => {
  if (!isVerboseEnabled()) return;
  const details = info.removed === undefined ? [] : [`Removed from shelf: ${info.removed ? 'yes' : 'no'}`];
  emit(`${magenta(`Drag ${info.stage}`)} ${truncatePath(info.path)}`, details);
};

export const shelfLogger = {
  logEntryAdded,
  logDuplicateDrop,
  logListingComplete,
  logListingFailure,
  logPayloadSkipped,
  logResolutionFailure,
  logOpenFailure,
  logDrag,
};

export type ShelfLogger = typeof shelfLogger;
