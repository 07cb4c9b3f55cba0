/**
 * Attachment Filter
 *
 * Tracks which variable names a session persists. An empty set means
 * "everything": no filtering is applied.
 */

import { AttachmentError } from '../utils/errors';
import type { VariableMapping } from '../storage/types';

export class AttachmentFilter {
  private readonly names = new Set<string>();

  /**
   * Attach variables by name. Duplicates are ignored.
   *
   * Every argument is checked before any is added, so a bad call leaves
   * the set unchanged.
   */
  attach(...names: string[]): this {
    for (const name of names) {
      if (typeof name !== 'string') {
        throw new AttachmentError(name);
      }
    }
    for (const name of names) {
      this.names.add(name);
    }
    return this;
  }

  /**
   * Detach variables by name. Names that are not attached are ignored.
   */
  detach(...names: string[]): this {
    for (const name of names) {
      this.names.delete(name);
    }
    return this;
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  /** Attached names in insertion order */
  list(): string[] {
    return [...this.names];
  }

  get isEmpty(): boolean {
    return this.names.size === 0;
  }

  /**
   * Restrict a mapping to the attached names.
   * Returns the input unchanged when nothing is attached.
   */
  project(mapping: VariableMapping): VariableMapping {
    if (this.isEmpty) {
      return mapping;
    }

    const projected: VariableMapping = {};
    for (const [name, value] of Object.entries(mapping)) {
      if (this.names.has(name)) {
        projected[name] = value;
      }
    }
    return projected;
  }
}
