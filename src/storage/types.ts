/**
 * Snapshot Storage Types
 *
 * A snapshot is the set of variables a session persisted for one session
 * name. Stores move snapshots to and from a durable medium; they never see
 * attachment filtering, which the session applies before every save.
 */

/**
 * Variable name to value. Values are opaque to the engine.
 */
export type VariableMapping = Record<string, unknown>;

/**
 * A durable backend able to load, save and wipe snapshots by session name.
 *
 * Implementations must make `save` atomic from the point of view of a
 * later `load`, must treat a wipe of a missing snapshot as a no-op, and
 * must report unreadable data as `null` rather than throwing.
 */
export interface SnapshotStore {
  /** Human-readable identity, used in error reports and logs */
  readonly label: string;

  /**
   * Load the snapshot saved under `name`.
   *
   * @returns The saved mapping, or `null` when none exists or it cannot be decoded
   */
  load(name: string): Promise<VariableMapping | null>;

  /**
   * Persist `mapping` under `name`, replacing any previous snapshot.
   * Throws an EncodeError when a value cannot be serialized.
   */
  save(name: string, mapping: VariableMapping): Promise<void>;

  /**
   * Remove the snapshot saved under `name`, if any.
   */
  wipe(name: string): Promise<void>;
}

/**
 * Serializes snapshots to bytes and back
 */
export interface SnapshotEncoder {
  /** Short identifier, e.g. `v8` or `json` */
  readonly format: string;

  /**
   * Throws when a value cannot be represented.
   */
  encode(mapping: VariableMapping): Uint8Array;

  /**
   * Throws a DecodeError when `data` is not a snapshot in this format.
   */
  decode(data: Uint8Array): VariableMapping;
}

/**
 * Check whether a value has the capabilities of a SnapshotStore
 */
export function isSnapshotStore(value: unknown): value is SnapshotStore {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'load' in value &&
    typeof value.load === 'function' &&
    'save' in value &&
    typeof value.save === 'function' &&
    'wipe' in value &&
    typeof value.wipe === 'function'
  );
}

/**
 * Check whether a decoded value can stand as a VariableMapping
 */
export function isVariableMapping(value: unknown): value is VariableMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
