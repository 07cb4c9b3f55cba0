/**
 * Checkpoint Session
 *
 * Loads a saved snapshot into the caller's scope when a unit of work
 * starts, and on the way out either persists the attached variables (the
 * work failed, or the policy says retain) or wipes every store.
 *
 * @example
 * ```typescript
 * const state = { cleaned: {} as Record<number, string> };
 *
 * await new CheckpointSession('clean-records')
 *   .uses(new LocalFileStore('.checkpoints'))
 *   .attach('cleaned')
 *   .bind(objectScope(state))
 *   .run(async () => {
 *     for (const [id, record] of records.entries()) {
 *       if (!(id in state.cleaned)) {
 *         state.cleaned[id] = await riskyClean(record);
 *       }
 *     }
 *   });
 * ```
 *
 * First run: nothing is loaded; if `riskyClean` throws, `cleaned` is saved
 * and the error propagates. Next run: `cleaned` is restored before the loop,
 * and a clean finish wipes the snapshot.
 */

import { basename, extname } from 'path';
import {
  ConfigurationError,
  EncodeError,
  errorMessage,
  StoreFanoutError,
  type FanoutOperation,
  type StoreFailure,
} from '../utils/errors';
import { defaultLogger, type Logger } from '../utils/logger';
import { isSnapshotStore, type SnapshotStore, type VariableMapping } from '../storage/types';
import { AttachmentFilter } from './attachments';
import type { Scope } from './scope';

/**
 * What happens to the snapshot when the work completes without error
 */
export const ExitPolicy = {
  DeleteOnSuccess: 'delete',
  RetainOnSuccess: 'retain',
} as const;

export type ExitPolicy = (typeof ExitPolicy)[keyof typeof ExitPolicy];

/**
 * Forces a fresh start when true. Functions are evaluated on every open.
 */
export type ResetPredicate = boolean | (() => boolean | Promise<boolean>);

export interface CheckpointSessionOptions {
  attach?: string[];
  uses?: SnapshotStore[];
  whenComplete?: ExitPolicy;
  resetIf?: ResetPredicate;
  scope?: Scope;
  logger?: Logger;
}

/**
 * Session name used when none is given: derived from the entry script
 */
export function defaultSessionName(): string {
  const script = process.argv[1];
  const stem = script ? basename(script, extname(script)) : '';
  return `savedstate_${stem || 'main'}`;
}

export class CheckpointSession {
  readonly name: string;

  private readonly filter = new AttachmentFilter();
  private readonly stores: SnapshotStore[] = [];
  private policy: ExitPolicy = ExitPolicy.DeleteOnSuccess;
  private resetPredicate: ResetPredicate = false;
  private scope?: Scope;
  private readonly logger: Logger;
  private opened = false;

  constructor(name?: string, options: CheckpointSessionOptions = {}) {
    this.name = name || defaultSessionName();
    this.logger = options.logger ?? defaultLogger;
    this.scope = options.scope;

    if (options.attach) {
      this.attach(...options.attach);
    }
    if (options.uses) {
      this.uses(...options.uses);
    }
    if (options.whenComplete) {
      this.whenComplete(options.whenComplete);
    }
    if (options.resetIf !== undefined) {
      this.resetIf(options.resetIf);
    }
  }

  get isOpen(): boolean {
    return this.opened;
  }

  get attached(): string[] {
    return this.filter.list();
  }

  get storages(): readonly SnapshotStore[] {
    return this.stores;
  }

  get exitPolicy(): ExitPolicy {
    return this.policy;
  }

  /**
   * Attach variables by name
   */
  attach(...names: string[]): this {
    this.filter.attach(...names);
    return this;
  }

  /**
   * Detach variables by name
   */
  detach(...names: string[]): this {
    this.filter.detach(...names);
    return this;
  }

  /**
   * Register stores. Earlier registrations are loaded from first;
   * a store already registered is skipped.
   */
  uses(...stores: SnapshotStore[]): this {
    for (const store of stores) {
      if (!isSnapshotStore(store)) {
        throw new ConfigurationError(
          'INVALID_STORE',
          `All storages for CheckpointSession must implement load, save and wipe; ` +
            `found ${String(store)}`,
          { context: { sessionName: this.name } }
        );
      }
    }

    for (const store of stores) {
      if (!this.stores.includes(store)) {
        this.stores.push(store);
      }
    }
    return this;
  }

  whenComplete(policy: ExitPolicy): this {
    this.policy = policy;
    return this;
  }

  resetIf(predicate: ResetPredicate): this {
    this.resetPredicate = predicate;
    return this;
  }

  /**
   * Set the scope that receives restored variables and supplies them on close
   */
  bind(scope: Scope): this {
    this.scope = scope;
    return this;
  }

  /**
   * Restrict a mapping to the attached variables
   */
  project(mapping: VariableMapping): VariableMapping {
    return this.filter.project(mapping);
  }

  /**
   * Enter the session: reset if asked, then restore the first snapshot found.
   *
   * @returns The restored variables, or `null` when no snapshot was found
   */
  async open(): Promise<VariableMapping | null> {
    const scope = this.requireReady();
    // Claimed before the first await so an overlapping open() is refused
    this.opened = true;

    try {
      if (await this.shouldReset()) {
        this.logger.debug(`Resetting checkpoint '${this.name}' before load`);
        await this.wipeState();
      }

      const loaded = await this.loadState();
      if (!loaded) {
        return null;
      }

      const restored = this.project(loaded);
      await scope.restoreBindings(restored);
      return restored;
    } catch (error) {
      this.opened = false;
      throw error;
    }
  }

  /**
   * Leave the session. Persists the attached variables when the work failed
   * or the policy retains on success; wipes every store otherwise.
   *
   * Throws a StoreFanoutError when any store fails, after all have finished.
   */
  async close(workFailed: boolean): Promise<void> {
    if (!this.opened) {
      throw new ConfigurationError(
        'SESSION_NOT_OPEN',
        `Checkpoint session '${this.name}' is not open`,
        { context: { sessionName: this.name } }
      );
    }
    this.opened = false;

    const scope = this.requireScope();
    const shouldPersist = workFailed || this.policy === ExitPolicy.RetainOnSuccess;

    if (shouldPersist) {
      const bindings = await scope.captureBindings();
      await this.saveState(this.project(bindings));
    } else {
      await this.wipeState();
    }
  }

  /**
   * Run `work` inside the session.
   *
   * The work's result or error is passed through unchanged. When the work
   * fails and persisting also fails, the persistence error is logged and
   * the work's error is the one thrown.
   */
  async run<T>(work: (session: this) => T | Promise<T>): Promise<T> {
    await this.open();

    let result: T;
    try {
      result = await work(this);
    } catch (error) {
      try {
        await this.close(true);
      } catch (closeError) {
        this.logger.error(
          `Failed to persist checkpoint '${this.name}' after work failed: ${errorMessage(closeError)}`
        );
      }
      throw error;
    }

    await this.close(false);
    return result;
  }

  /**
   * Load from stores in registration order; the first snapshot found wins
   */
  async loadState(): Promise<VariableMapping | null> {
    for (const store of this.stores) {
      const loaded = await store.load(this.name);
      if (loaded !== null) {
        this.logger.debug(`Restored checkpoint '${this.name}' from ${store.label}`);
        return loaded;
      }
    }
    return null;
  }

  /**
   * Save a mapping to every store concurrently
   */
  async saveState(mapping: VariableMapping): Promise<void> {
    await this.fanOut('save', (store) => store.save(this.name, mapping));
  }

  /**
   * Wipe the snapshot from every store concurrently
   */
  async wipeState(): Promise<void> {
    await this.fanOut('wipe', (store) => store.wipe(this.name));
  }

  private async fanOut(
    operation: FanoutOperation,
    task: (store: SnapshotStore) => Promise<void>
  ): Promise<void> {
    const outcomes = await Promise.all(
      this.stores.map(async (store): Promise<StoreFailure | null> => {
        try {
          await task(store);
          return null;
        } catch (error) {
          return { store: store.label, error };
        }
      })
    );

    const failures = outcomes.filter((outcome): outcome is StoreFailure => outcome !== null);
    if (failures.length === 0) {
      return;
    }

    for (const failure of failures) {
      if (failure.error instanceof EncodeError) {
        throw this.withFanoutFailures(failure.error, failures);
      }
    }
    throw new StoreFanoutError(this.name, operation, failures);
  }

  /**
   * An encode failure is thrown as an EncodeError, but it still reports
   * what the other stores did in the same fan-out.
   */
  private withFanoutFailures(error: EncodeError, failures: StoreFailure[]): EncodeError {
    const others = failures.filter((failure) => failure.error !== error);
    const details = others
      .map((failure) => `${failure.store}: ${errorMessage(failure.error)}`)
      .join('; ');

    return new EncodeError(
      details ? `${error.message} (other store failures: ${details})` : error.message,
      { cause: error, sessionName: this.name, store: error.store, failures }
    );
  }

  private async shouldReset(): Promise<boolean> {
    const predicate = this.resetPredicate;
    return typeof predicate === 'function' ? Boolean(await predicate()) : predicate;
  }

  private requireReady(): Scope {
    if (this.opened) {
      throw new ConfigurationError(
        'SESSION_ALREADY_OPEN',
        `Checkpoint session '${this.name}' is already open`,
        { context: { sessionName: this.name } }
      );
    }

    if (this.stores.length === 0) {
      throw new ConfigurationError(
        'NO_STORAGE',
        `No storage registered; checkpoint session '${this.name}' has nowhere to ` +
          'save state. Use uses() to add SnapshotStore instances.',
        { context: { sessionName: this.name } }
      );
    }

    return this.requireScope();
  }

  private requireScope(): Scope {
    if (!this.scope) {
      throw new ConfigurationError(
        'NO_SCOPE',
        `Checkpoint session '${this.name}' has no scope; use bind() to provide one`,
        { context: { sessionName: this.name } }
      );
    }
    return this.scope;
  }
}

/**
 * Create a checkpoint session instance
 */
export function createCheckpointSession(
  name?: string,
  options?: CheckpointSessionOptions
): CheckpointSession {
  return new CheckpointSession(name, options);
}
