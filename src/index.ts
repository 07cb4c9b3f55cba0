/**
 * checkpoint-guard
 *
 * Crash-resilient checkpointing for long-running, failure-prone work. When
 * the work throws, the attached variables are saved; the next attempt
 * restores them and picks up where the last one stopped.
 */

export * from './session';
export * from './storage';
export {
  AttachmentError,
  CheckpointError,
  ConfigurationError,
  DecodeError,
  EncodeError,
  StoreFanoutError,
  type ConfigurationErrorCode,
  type ErrorCode,
  type FanoutOperation,
  type StoreFailure,
} from './utils/errors';
export { defaultLogger, silentLogger, type Logger } from './utils/logger';
export {
  DEFAULT_CONFIG,
  getEnvFlag,
  loadConfig,
  parseBooleanFlag,
  parseConfig,
  type Config,
  type StorageConfig,
} from './utils/config';
