import { lastPathComponent } from '../../common/path';
import type { FileEntry } from '../../common/fileTypes';

export const ROOT_TITLE = 'Dropped Files';
export const ROOT_EMPTY_MESSAGE = 'Drag and drop files into the area above.';
export const FOLDER_EMPTY_MESSAGE = 'This folder is empty.';

export const headerTitle = (navigationStack: readonly string[]) => {
  const folder = navigationStack[navigationStack.length - 1];
  return folder === undefined ? ROOT_TITLE : lastPathComponent(folder);
};

export const canNavigateBack = (navigationStack: readonly string[]) =>
  navigationStack.length > 0;

export const emptyStateMessage = (
  navigationStack: readonly string[],
  displayedEntries: readonly FileEntry[],
): string | null => {
  if (displayedEntries.length > 0) {
    return null;
  }
  return navigationStack.length === 0 ? ROOT_EMPTY_MESSAGE : FOLDER_EMPTY_MESSAGE;
};

/** Keeps both ends of a long name: `quarterly-report-final.pdf` at 20 becomes `quarterly-…final.pdf`. */
export const truncateMiddle = (name: string, maxLength: number) => {
  if (maxLength < 3 || name.length <= maxLength) {
    return name;
  }
  const available = maxLength - 1;
  const head = Math.ceil(available / 2);
  const tail = Math.floor(available / 2);
  return `${name.slice(0, head)}…${name.slice(name.length - tail)}`;
};
