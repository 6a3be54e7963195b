import {
  FOLDER_EMPTY_MESSAGE,
  ROOT_EMPTY_MESSAGE,
  ROOT_TITLE,
  canNavigateBack,
  emptyStateMessage,
  headerTitle,
  truncateMiddle,
} from '../renderer/shelf/viewModel';
import { extensionOf, isApplicationBundle, isHiddenName, lastPathComponent } from '../common/path';
import type { FileEntry } from '../common/fileTypes';

const entry = (path: string): FileEntry => ({
  id: path,
  path,
  name: lastPathComponent(path),
  isDirectory: false,
  icon: { kind: 'file', mimeType: null },
});

describe('shelf view model', () => {
  it('titles the root and named folders', () => {
    expect(headerTitle([])).toBe(ROOT_TITLE);
    expect(headerTitle(['/Users/sam/Reports'])).toBe('Reports');
    expect(headerTitle(['/Users/sam/Reports', '/Users/sam/Reports/2024/'])).toBe('2024');
    expect(headerTitle(['/'])).toBe('/');
  });

  it('offers back navigation only below the root', () => {
    expect(canNavigateBack([])).toBe(false);
    expect(canNavigateBack(['/tmp'])).toBe(true);
  });

  it('picks the empty-state message from the location', () => {
    expect(emptyStateMessage([], [])).toBe(ROOT_EMPTY_MESSAGE);
    expect(emptyStateMessage(['/tmp/empty'], [])).toBe(FOLDER_EMPTY_MESSAGE);
    expect(emptyStateMessage([], [entry('/tmp/a.txt')])).toBeNull();
  });

  it('shortens long names in the middle', () => {
    expect(truncateMiddle('quarterly-report-final.pdf', 20)).toBe('quarterly-…final.pdf');
    expect(truncateMiddle('abcdefghij', 5)).toBe('ab…ij');
    expect(truncateMiddle('short.txt', 20)).toBe('short.txt');
    expect(truncateMiddle('exactly-ten', 11)).toBe('exactly-ten');
    expect(truncateMiddle('anything', 2)).toBe('anything');
  });
});

describe('path helpers', () => {
  it('takes the last component of a path', () => {
    expect(lastPathComponent('/tmp/a.txt')).toBe('a.txt');
    expect(lastPathComponent('/tmp/folder/')).toBe('folder');
    expect(lastPathComponent('C:\\Users\\sam\\notes.md')).toBe('notes.md');
  });

  it('recognises application bundles by extension, in any case', () => {
    expect(extensionOf('/Applications/Tool.APP')).toBe('app');
    expect(isApplicationBundle('/Applications/Tool.app')).toBe(true);
    expect(isApplicationBundle('/Applications/Tool.app.zip')).toBe(false);
    expect(isApplicationBundle('/Applications/.app')).toBe(false);
  });

  it('treats dot-prefixed names as hidden', () => {
    expect(isHiddenName('.DS_Store')).toBe(true);
    expect(isHiddenName('notes.md')).toBe(false);
  });
});
