/**
 * Scope Adapters
 *
 * A Scope is the caller's live working set: the session restores loaded
 * variables into it on open and captures from it on close. The engine never
 * inspects the caller's variables any other way.
 */

import type { VariableMapping } from '../storage/types';

export interface Scope {
  /** Current variables, read when the session persists */
  captureBindings(): VariableMapping | Promise<VariableMapping>;
  /** Inject loaded variables into the working set */
  restoreBindings(bindings: VariableMapping): void | Promise<void>;
}

/**
 * Scope backed by a Map of name to value
 */
export class MemoryScope implements Scope {
  private readonly bindings: Map<string, unknown>;

  constructor(initial: VariableMapping = {}) {
    this.bindings = new Map(Object.entries(initial));
  }

  get(name: string): unknown {
    return this.bindings.get(name);
  }

  set(name: string, value: unknown): this {
    this.bindings.set(name, value);
    return this;
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  delete(name: string): boolean {
    return this.bindings.delete(name);
  }

  toObject(): VariableMapping {
    return Object.fromEntries(this.bindings);
  }

  captureBindings(): VariableMapping {
    return this.toObject();
  }

  restoreBindings(bindings: VariableMapping): void {
    for (const [name, value] of Object.entries(bindings)) {
      this.bindings.set(name, value);
    }
  }
}

/**
 * Use a plain object as the working set.
 *
 * Capture takes a shallow copy of the object's own enumerable properties;
 * restore assigns loaded values back onto the same object, so code holding
 * a reference to it sees the restored state.
 *
 * @example
 * ```typescript
 * const state: { cursor: number; results: string[] } = { cursor: 0, results: [] };
 * await session.bind(objectScope(state)).run(async () => {
 *   for (; state.cursor < items.length; state.cursor++) {
 *     state.results.push(await process(items[state.cursor]));
 *   }
 * });
 * ```
 */
export function objectScope<T extends object>(target: T): Scope {
  return {
    captureBindings: () => Object.fromEntries(Object.entries(target)),
    restoreBindings: (bindings) => {
      for (const [name, value] of Object.entries(bindings)) {
        if (name === '__proto__') {
          // Assigning would replace the prototype; keep it an ordinary property
          Object.defineProperty(target, name, {
            value,
            writable: true,
            enumerable: true,
            configurable: true,
          });
        } else {
          Reflect.set(target, name, value);
        }
      }
    },
  };
}
