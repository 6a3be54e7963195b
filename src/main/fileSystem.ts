import fs from 'fs/promises';
import path from 'path';
import { spawn } from 'child_process';
import mime from 'mime-types';
import log from './log';
import { isApplicationBundle } from '../common/path';
import type {
  FileLauncher,
  IconHandle,
  PathInspection,
  ShelfFileSystem,
} from '../common/fileTypes';

const logger = log.scope('file-system');

export const inspectPath = async (filePath: string): Promise<PathInspection> => {
  try {
    const stats = await fs.stat(filePath);
    return { exists: true, isDirectory: stats.isDirectory() };
  } catch (error) {
    logger.debug(`Could not stat ${filePath}`, error);
    return { exists: false, isDirectory: false };
  }
};

export const listDirectory = async (directoryPath: string): Promise<string[]> => {
  const names = await fs.readdir(directoryPath);
  return names.map((name) => path.join(directoryPath, name));
};

export const resolveIcon = (filePath: string, isDirectory: boolean): IconHandle => {
  if (isApplicationBundle(filePath)) {
    return { kind: 'application', mimeType: null };
  }
  if (isDirectory) {
    return { kind: 'folder', mimeType: 'inode/directory' };
  }
  return { kind: 'file', mimeType: mime.lookup(filePath) || null };
};

export interface OpenCommand {
  command: string;
  args: string[];
}

export const openCommandFor = (
  filePath: string,
  platform: NodeJS.Platform = process.platform,
): OpenCommand => {
  if (platform === 'darwin') {
    return { command: 'open', args: [filePath] };
  }
  if (platform === 'win32') {
    // The empty string is the window title `start` would otherwise take from the path.
    return { command: 'cmd', args: ['/c', 'start', '', filePath] };
  }
  return { command: 'xdg-open', args: [filePath] };
};

export const openPath = (filePath: string): Promise<void> =>
  new Promise((resolve, reject) => {
    const { command, args } = openCommandFor(filePath);
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', (error) => {
      logger.error(`Failed to open ${filePath} with ${command}`, error);
      reject(error);
    });
    child.once('spawn', () => {
      logger.info(`Opened ${filePath}`);
      child.unref();
      resolve();
    });
  });

export const nodeFileSystem: ShelfFileSystem = {
  inspect: inspectPath,
  listDirectory,
  iconFor: resolveIcon,
};

export const nodeLauncher: FileLauncher = { openPath };
