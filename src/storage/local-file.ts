/**
 * Local File Snapshot Store
 *
 * Writes each snapshot to `<dir>/<rendered name><extension>`. Names may
 * contain template tokens that are rendered on every call:
 *
 * - `{now}`     local time, `YYYY-MM-DD_HH:MM:SS.ffffff`
 * - `{utcnow}`  UTC time, same layout
 * - `{today}`   local date, `YYYY-MM-DD`
 * - `{dir}`     name of the parent of the working directory
 * - `{rand}`    random 16-bit tag, 4 hex digits
 * - `{uuid}`    random UUID
 *
 * Volatile tokens make a name resolve to a different file on each attempt,
 * so a session that must resume should not use them.
 */

import { readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { randomInt, randomUUID } from 'crypto';
import { basename, dirname, join, resolve } from 'path';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { EncodedSnapshotStore, type EncodedStoreOptions } from './encoded-store';

export const DEFAULT_SNAPSHOT_EXTENSION = '.snapshot';

export interface LocalFileStoreOptions extends EncodedStoreOptions {
  /** Appended to the rendered name unless already present (default: `.snapshot`) */
  extension?: string;
}

/**
 * Inputs for template rendering
 */
export interface TemplateEnvironment {
  now: Date;
  cwd: string;
  randomTag: () => string;
  uuid: () => string;
}

export function currentTemplateEnvironment(): TemplateEnvironment {
  return {
    now: new Date(),
    cwd: process.cwd(),
    randomTag: () => randomInt(0, 0x10000).toString(16).padStart(4, '0'),
    uuid: () => randomUUID(),
  };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function formatTimestamp(date: Date, utc: boolean): string {
  const [year, month, day, hours, minutes, seconds, millis] = utc
    ? [
        date.getUTCFullYear(),
        date.getUTCMonth() + 1,
        date.getUTCDate(),
        date.getUTCHours(),
        date.getUTCMinutes(),
        date.getUTCSeconds(),
        date.getUTCMilliseconds(),
      ]
    : [
        date.getFullYear(),
        date.getMonth() + 1,
        date.getDate(),
        date.getHours(),
        date.getMinutes(),
        date.getSeconds(),
        date.getMilliseconds(),
      ];

  return (
    `${year}-${pad(month)}-${pad(day)} ` +
    `${pad(hours)}:${pad(minutes)}:${pad(seconds)}.${pad(millis * 1000, 6)}`
  );
}

function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Render a snapshot file name: substitute tokens, replace spaces with
 * underscores, and append the extension if it is missing.
 */
export function renderSnapshotName(
  name: string,
  extension: string = DEFAULT_SNAPSHOT_EXTENSION,
  env: TemplateEnvironment = currentTemplateEnvironment()
): string {
  const tokens = new Map<string, () => string>([
    ['now', () => formatTimestamp(env.now, false)],
    ['utcnow', () => formatTimestamp(env.now, true)],
    ['today', () => formatDate(env.now)],
    ['dir', () => basename(dirname(resolve(env.cwd)))],
    ['rand', env.randomTag],
    ['uuid', env.uuid],
  ]);

  const rendered = name
    .replace(/\{(\w*)\}/g, (match: string, token: string) => {
      const render = tokens.get(token);
      if (!render) {
        throw new ConfigurationError(
          'INVALID_TEMPLATE',
          `Unknown template token ${match} in snapshot name '${name}'`,
          { context: { name, token } }
        );
      }
      return render();
    })
    .replace(/ /g, '_');

  return rendered.endsWith(extension) ? rendered : `${rendered}${extension}`;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class LocalFileStore extends EncodedSnapshotStore {
  readonly label: string;
  readonly dir: string;
  readonly extension: string;

  constructor(dir = '.', options: LocalFileStoreOptions = {}) {
    super(options);
    this.dir = dir;
    this.extension = options.extension ?? DEFAULT_SNAPSHOT_EXTENSION;
    this.label = `local:${resolve(dir)}`;
  }

  /**
   * Resolve the absolute file path for a session name.
   * The base directory must exist when this is called.
   */
  async resolvePath(name: string): Promise<string> {
    await this.assertDirectory();
    return resolve(join(this.dir, renderSnapshotName(name, this.extension)));
  }

  private async assertDirectory(): Promise<void> {
    const target = resolve(this.dir);
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(target)).isDirectory();
    } catch (error) {
      const reason =
        isErrnoException(error) && error.code === 'ENOENT'
          ? 'does not exist'
          : `is not accessible (${errorMessage(error)})`;
      throw new ConfigurationError('INVALID_STORAGE_TARGET', `Storage path ${target} ${reason}`, {
        cause: error,
        context: { dir: target },
      });
    }

    if (!isDirectory) {
      throw new ConfigurationError(
        'INVALID_STORAGE_TARGET',
        `Storage path must be a directory; ${target} found`,
        { context: { dir: target } }
      );
    }
  }

  protected async readBytes(name: string): Promise<Uint8Array | null> {
    const path = await this.resolvePath(name);
    try {
      return await readFile(path);
    } catch (error) {
      // Wiped by another session since the directory check
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  protected async writeBytes(name: string, data: Uint8Array): Promise<void> {
    const path = await this.resolvePath(name);
    const tempPath = `${path}.${randomUUID()}.tmp`;

    try {
      await writeFile(tempPath, data);
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  async wipe(name: string): Promise<void> {
    const path = await this.resolvePath(name);
    await rm(path, { force: true });
  }
}

/**
 * Create a local file store instance
 */
export function createLocalFileStore(
  dir?: string,
  options?: LocalFileStoreOptions
): LocalFileStore {
  return new LocalFileStore(dir, options);
}
