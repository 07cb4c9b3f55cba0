/**
 * In-memory snapshot store.
 *
 * Keeps encoded snapshots in a Map for the life of the process. Useful as
 * a fast secondary backend and in tests; it goes through the same encoder
 * as the file store so unsupported values fail the same way.
 */

import { EncodedSnapshotStore, type EncodedStoreOptions } from './encoded-store';

export interface MemoryStoreOptions extends EncodedStoreOptions {
  /** Label suffix, to tell several memory stores apart */
  id?: string;
}

let memoryStoreCount = 0;

export class MemoryStore extends EncodedSnapshotStore {
  readonly label: string;
  private readonly snapshots = new Map<string, Uint8Array>();

  constructor(options: MemoryStoreOptions = {}) {
    super(options);
    memoryStoreCount += 1;
    this.label = `memory:${options.id ?? memoryStoreCount}`;
  }

  /**
   * Names with a stored snapshot
   */
  names(): string[] {
    return [...this.snapshots.keys()];
  }

  has(name: string): boolean {
    return this.snapshots.has(name);
  }

  /**
   * Put raw bytes under a name, bypassing the encoder
   */
  putRaw(name: string, data: Uint8Array): void {
    this.snapshots.set(name, data);
  }

  protected async readBytes(name: string): Promise<Uint8Array | null> {
    return this.snapshots.get(name) ?? null;
  }

  protected async writeBytes(name: string, data: Uint8Array): Promise<void> {
    this.snapshots.set(name, data);
  }

  async wipe(name: string): Promise<void> {
    this.snapshots.delete(name);
  }
}
