/**
 * Storage Module Exports
 */

export {
  isSnapshotStore,
  isVariableMapping,
  type SnapshotEncoder,
  type SnapshotStore,
  type VariableMapping,
} from './types';
export { getEncoder, jsonEncoder, v8Encoder } from './encoder';
export { EncodedSnapshotStore, type EncodedStoreOptions } from './encoded-store';
export {
  LocalFileStore,
  createLocalFileStore,
  currentTemplateEnvironment,
  renderSnapshotName,
  DEFAULT_SNAPSHOT_EXTENSION,
  type LocalFileStoreOptions,
  type TemplateEnvironment,
} from './local-file';
export { MemoryStore, type MemoryStoreOptions } from './memory';
