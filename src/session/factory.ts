import type { Config, StorageConfig } from '../utils/config';
import { defaultLogger, type Logger } from '../utils/logger';
import { getEncoder } from '../storage/encoder';
import { LocalFileStore } from '../storage/local-file';
import { MemoryStore } from '../storage/memory';
import type { SnapshotStore } from '../storage/types';
import { CheckpointSession } from './checkpoint-session';
import type { Scope } from './scope';

export interface SessionFactoryOptions {
  scope?: Scope;
  logger?: Logger;
  /** Overrides `config.name` */
  name?: string;
  /** Stores registered ahead of the configured ones */
  extraStores?: SnapshotStore[];
}

export function createStoreFromConfig(
  storage: StorageConfig,
  logger: Logger = defaultLogger
): SnapshotStore {
  const encoder = getEncoder(storage.encoder);

  switch (storage.type) {
    case 'local':
      return new LocalFileStore(storage.path, {
        encoder,
        logger,
        extension: storage.extension,
      });
    case 'memory':
      return new MemoryStore({ encoder, logger });
  }
}

export function createSessionFromConfig(
  config: Config,
  options: SessionFactoryOptions = {}
): CheckpointSession {
  const logger = options.logger ?? defaultLogger;
  const stores = config.storage.map((storage) => createStoreFromConfig(storage, logger));

  return new CheckpointSession(options.name ?? config.name, {
    attach: config.attach,
    uses: [...(options.extraStores ?? []), ...stores],
    whenComplete: config.whenComplete,
    resetIf: config.reset,
    scope: options.scope,
    logger,
  });
}
