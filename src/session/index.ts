/**
 * Session Module Exports
 */

export {
  CheckpointSession,
  ExitPolicy,
  createCheckpointSession,
  defaultSessionName,
  type CheckpointSessionOptions,
  type ResetPredicate,
} from './checkpoint-session';
export { AttachmentFilter } from './attachments';
export { MemoryScope, objectScope, type Scope } from './scope';
export {
  createSessionFromConfig,
  createStoreFromConfig,
  type SessionFactoryOptions,
} from './factory';
