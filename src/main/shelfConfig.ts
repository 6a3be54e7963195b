import log from './log';
import type { DragCompletionStrategy, ShelfConfig } from '../types/shelf';

const logger = log.scope('shelf-config');

const DRAG_COMPLETION_STRATEGIES: readonly DragCompletionStrategy[] = [
  'reactivation',
  'completion-callback',
];

const DEFAULT_CONFIG: ShelfConfig = {
  dragCompletion: 'reactivation',
  showDropAreaOnLaunch: true,
  maxDisplayNameLength: 40,
};

const isDragCompletionStrategy = (value: string): value is DragCompletionStrategy =>
  DRAG_COMPLETION_STRATEGIES.some((strategy) => strategy === value);

const parseDragCompletion = (raw: string | undefined): DragCompletionStrategy => {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_CONFIG.dragCompletion;
  }
  const normalised = raw.trim().toLowerCase();
  if (isDragCompletionStrategy(normalised)) {
    return normalised;
  }
  logger.warn(
    `Unknown SHELF_DRAG_COMPLETION "${raw}"; falling back to ${DEFAULT_CONFIG.dragCompletion}.`,
  );
  return DEFAULT_CONFIG.dragCompletion;
};

const parseBoolean = (raw: string | undefined, fallback: boolean, name: string): boolean => {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const normalised = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalised)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalised)) return false;
  logger.warn(`Ignoring ${name}="${raw}"; expected a boolean.`);
  return fallback;
};

const parsePositiveInteger = (raw: string | undefined, fallback: number, name: string): number => {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (Number.isInteger(value) && value > 0) {
    return value;
  }
  logger.warn(`Ignoring ${name}="${raw}"; expected a positive integer.`);
  return fallback;
};

export const resolveShelfConfig = (
  overrides?: Partial<ShelfConfig>,
  env: NodeJS.ProcessEnv = process.env,
): ShelfConfig => {
  const fromEnv: ShelfConfig = {
    dragCompletion: parseDragCompletion(env.SHELF_DRAG_COMPLETION),
    showDropAreaOnLaunch: parseBoolean(
      env.SHELF_SHOW_DROP_AREA,
      DEFAULT_CONFIG.showDropAreaOnLaunch,
      'SHELF_SHOW_DROP_AREA',
    ),
    maxDisplayNameLength: parsePositiveInteger(
      env.SHELF_MAX_NAME_LENGTH,
      DEFAULT_CONFIG.maxDisplayNameLength,
      'SHELF_MAX_NAME_LENGTH',
    ),
  };
  return { ...fromEnv, ...overrides };
};
