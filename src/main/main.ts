/**
 * Builds a ready-to-use shelf: the store, the navigation controller and the
 * outbound drag coordinator, wired to the Node file-system services and to the
 * host's foreground-activation signal.
 */
import { EventEmitter } from 'events';
import log from './log';
import { nodeFileSystem, nodeLauncher } from './fileSystem';
import { resolveShelfConfig } from './shelfConfig';
import { createShelfStore, type ShelfStore } from '../renderer/shelf/store';
import {
  createNavigationController,
  type NavigationController,
} from '../renderer/shelf/navigation';
import {
  createDragOutCoordinator,
  type ActivationSource,
  type DragOutCoordinator,
} from '../renderer/shelf/dragOut';
import type { FileLauncher, ShelfFileSystem } from '../common/fileTypes';
import type { ShelfLogger } from '../utils/shelfLogger';
import type { ShelfConfig } from '../types/shelf';

const logger = log.scope('runtime');

export interface ActivationEmitter extends ActivationSource {
  /** The host calls this when the application comes back to the foreground. */
  notifyActivated: () => void;
}

export const createActivationEmitter = (): ActivationEmitter => {
  const emitter = new EventEmitter();
  return {
    onDidBecomeActive(listener) {
      emitter.on('activate', listener);
      return () => {
        emitter.off('activate', listener);
      };
    },
    notifyActivated() {
      emitter.emit('activate');
    },
  };
};

export interface ShelfRuntimeOptions {
  config?: ShelfConfig;
  fileSystem?: ShelfFileSystem;
  launcher?: FileLauncher;
  /**
   * Foreground signal for the reactivation heuristic. Renderers pass
   * `windowFocusActivation(window)`; without one the runtime owns an emitter and
   * the host reports activation through `ShelfRuntime.notifyActivated`.
   */
  activation?: ActivationSource;
  logger?: ShelfLogger;
}

export interface ShelfRuntime {
  config: ShelfConfig;
  store: ShelfStore;
  navigation: NavigationController;
  dragOut: DragOutCoordinator;
  activation: ActivationSource;
  /** Feeds the runtime's own emitter; a no-op when `options.activation` was given. */
  notifyActivated: () => void;
  dispose: () => void;
}

export const createShelfRuntime = (options: ShelfRuntimeOptions = {}): ShelfRuntime => {
  const config = options.config ?? resolveShelfConfig();
  const ownEmitter = createActivationEmitter();
  const activation = options.activation ?? ownEmitter;
  const store = createShelfStore({
    fileSystem: options.fileSystem ?? nodeFileSystem,
    logger: options.logger,
  });
  const navigation = createNavigationController({
    store,
    launcher: options.launcher ?? nodeLauncher,
    logger: options.logger,
  });
  const dragOut = createDragOutCoordinator({
    store,
    activation,
    strategy: config.dragCompletion,
    logger: options.logger,
  });

  logger.info(`Shelf ready (drag completion: ${config.dragCompletion})`);

  return {
    config,
    store,
    navigation,
    dragOut,
    activation,
    notifyActivated: () => ownEmitter.notifyActivated(),
    dispose: () => dragOut.dispose(),
  };
};

export { resolveShelfConfig } from './shelfConfig';
export { nodeFileSystem, nodeLauncher } from './fileSystem';
