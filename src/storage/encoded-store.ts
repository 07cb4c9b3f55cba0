/**
 * Base class for byte-oriented snapshot stores.
 *
 * Subclasses move raw bytes; this class owns the encoding rules: an
 * unreadable snapshot is logged and reported as absent, while a value the
 * encoder rejects is raised as an EncodeError before anything is written.
 */

import { DecodeError, EncodeError, errorMessage } from '../utils/errors';
import { defaultLogger, type Logger } from '../utils/logger';
import { v8Encoder } from './encoder';
import type { SnapshotEncoder, SnapshotStore, VariableMapping } from './types';

export interface EncodedStoreOptions {
  /** Snapshot byte format (default: v8Encoder) */
  encoder?: SnapshotEncoder;
  logger?: Logger;
}

export abstract class EncodedSnapshotStore implements SnapshotStore {
  abstract readonly label: string;

  protected readonly encoder: SnapshotEncoder;
  protected readonly logger: Logger;

  constructor(options: EncodedStoreOptions = {}) {
    this.encoder = options.encoder ?? v8Encoder;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Read the stored bytes for `name`, or `null` when nothing is stored
   */
  protected abstract readBytes(name: string): Promise<Uint8Array | null>;

  /**
   * Replace the stored bytes for `name` in one step
   */
  protected abstract writeBytes(name: string, data: Uint8Array): Promise<void>;

  abstract wipe(name: string): Promise<void>;

  async load(name: string): Promise<VariableMapping | null> {
    const data = await this.readBytes(name);
    if (!data || data.length === 0) {
      return null;
    }

    try {
      return this.encoder.decode(data);
    } catch (error) {
      const reason = error instanceof DecodeError ? error.message : `decoder threw: ${errorMessage(error)}`;
      this.logger.warn(`Ignoring unreadable snapshot '${name}' in ${this.label}: ${reason}`);
      return null;
    }
  }

  async save(name: string, mapping: VariableMapping): Promise<void> {
    let data: Uint8Array;
    try {
      data = this.encoder.encode(mapping);
    } catch (error) {
      throw new EncodeError(
        `Cannot encode snapshot '${name}' as ${this.encoder.format}: ${errorMessage(error)}`,
        { cause: error, sessionName: name, store: this.label }
      );
    }

    await this.writeBytes(name, data);
  }
}
