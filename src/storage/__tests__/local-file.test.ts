/**
 * Tests for the local file snapshot store
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  LocalFileStore,
  createLocalFileStore,
  currentTemplateEnvironment,
  renderSnapshotName,
  type TemplateEnvironment,
} from '../local-file';
import { jsonEncoder } from '../encoder';
import { ConfigurationError, EncodeError } from '../../utils/errors';
import type { Logger } from '../../utils/logger';

function fixedEnvironment(overrides: Partial<TemplateEnvironment> = {}): TemplateEnvironment {
  return {
    now: new Date(2024, 0, 2, 3, 4, 5, 6),
    cwd: '/work/projects/app',
    randomTag: () => 'beef',
    uuid: () => '0b6f3c2e-1d2a-4c1b-9f7e-2a1d3c4b5e6f',
    ...overrides,
  };
}

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('renderSnapshotName', () => {
  it('should append the default extension', () => {
    expect(renderSnapshotName('job-42', undefined, fixedEnvironment())).toBe('job-42.snapshot');
  });

  it('should not append an extension that is already present', () => {
    expect(renderSnapshotName('job-42.snapshot', undefined, fixedEnvironment())).toBe(
      'job-42.snapshot'
    );
  });

  it('should use a custom extension', () => {
    expect(renderSnapshotName('job-42', '.bin', fixedEnvironment())).toBe('job-42.bin');
  });

  it('should replace spaces with underscores', () => {
    expect(renderSnapshotName('nightly import job', '.bin', fixedEnvironment())).toBe(
      'nightly_import_job.bin'
    );
  });

  it('should render local time tokens', () => {
    const env = fixedEnvironment();

    expect(renderSnapshotName('run-{now}', '.bin', env)).toBe('run-2024-01-02_03:04:05.006000.bin');
    expect(renderSnapshotName('run-{today}', '.bin', env)).toBe('run-2024-01-02.bin');
  });

  it('should render UTC time', () => {
    const env = fixedEnvironment({ now: new Date(Date.UTC(2023, 11, 31, 23, 59, 58, 120)) });

    expect(renderSnapshotName('{utcnow}', '.bin', env)).toBe('2023-12-31_23:59:58.120000.bin');
  });

  it('should render the parent directory name', () => {
    expect(renderSnapshotName('{dir}-state', '.bin', fixedEnvironment())).toBe('projects-state.bin');
  });

  it('should render random tokens', () => {
    const env = fixedEnvironment();

    expect(renderSnapshotName('state-{rand}', '.bin', env)).toBe('state-beef.bin');
    expect(renderSnapshotName('state-{uuid}', '.bin', env)).toBe(
      'state-0b6f3c2e-1d2a-4c1b-9f7e-2a1d3c4b5e6f.bin'
    );
  });

  it('should reject unknown tokens', () => {
    expect(() => renderSnapshotName('state-{nope}', '.bin', fixedEnvironment())).toThrow(
      ConfigurationError
    );
    expect(() => renderSnapshotName('state-{constructor}', '.bin', fixedEnvironment())).toThrow(
      'Unknown template token {constructor}'
    );
  });

  it('should produce 4-digit hex random tags', () => {
    const env = currentTemplateEnvironment();

    for (let i = 0; i < 50; i++) {
      expect(env.randomTag()).toMatch(/^[0-9a-f]{4}$/);
    }
  });
});

describe('LocalFileStore', () => {
  let dir: string;
  let logger: Logger;
  let store: LocalFileStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'checkpoint-local-'));
    logger = createLogger();
    store = createLocalFileStore(dir, { logger });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should label itself with the resolved directory', () => {
    expect(store.label).toBe(`local:${dir}`);
  });

  it('should resolve paths inside the base directory', async () => {
    expect(await store.resolvePath('job-42')).toBe(join(dir, 'job-42.snapshot'));
  });

  it('should return null when no snapshot exists', async () => {
    expect(await store.load('job-42')).toBeNull();
  });

  it('should save and load a snapshot', async () => {
    await store.save('job-42', { count: 5, seen: new Set([1, 2]) });

    expect(existsSync(join(dir, 'job-42.snapshot'))).toBe(true);
    expect(await store.load('job-42')).toEqual({ count: 5, seen: new Set([1, 2]) });
  });

  it('should overwrite an existing snapshot', async () => {
    await store.save('job-42', { count: 5 });
    await store.save('job-42', { count: 6 });

    expect(await store.load('job-42')).toEqual({ count: 6 });
  });

  it('should leave no temporary files behind', async () => {
    await store.save('job-42', { count: 5 });

    expect(await readdir(dir)).toEqual(['job-42.snapshot']);
  });

  it('should wipe a snapshot', async () => {
    await store.save('job-42', { count: 5 });
    await store.wipe('job-42');

    expect(existsSync(join(dir, 'job-42.snapshot'))).toBe(false);
    expect(await store.load('job-42')).toBeNull();
  });

  it('should treat wiping a missing snapshot as a no-op', async () => {
    await expect(store.wipe('never-saved')).resolves.toBeUndefined();
  });

  it('should return null when the file disappears before it is read', async () => {
    await store.save('job-42', { count: 5 });
    const resolvePath = store.resolvePath.bind(store);
    vi.spyOn(store, 'resolvePath').mockImplementation(async (name: string) => {
      const path = await resolvePath(name);
      await rm(path);
      return path;
    });

    expect(await store.load('job-42')).toBeNull();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should treat a corrupt snapshot as absent and warn', async () => {
    await writeFile(join(dir, 'job-42.snapshot'), 'not a snapshot');

    expect(await store.load('job-42')).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      `Ignoring unreadable snapshot 'job-42' in ${store.label}: Not a v8 snapshot: missing header`
    );
  });

  it('should treat an empty file as absent', async () => {
    await writeFile(join(dir, 'job-42.snapshot'), '');

    expect(await store.load('job-42')).toBeNull();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should raise EncodeError and write nothing for unencodable values', async () => {
    await expect(store.save('job-42', { callback: () => 1 })).rejects.toBeInstanceOf(EncodeError);
    await expect(store.save('job-42', { callback: () => 1 })).rejects.toMatchObject({
      code: 'ENCODE_FAILED',
      sessionName: 'job-42',
      store: store.label,
    });
    expect(await readdir(dir)).toEqual([]);
  });

  it('should use the configured encoder and extension', async () => {
    const jsonStore = new LocalFileStore(dir, { encoder: jsonEncoder, extension: '.json' });

    await jsonStore.save('job-42', { count: 5 });

    expect(await readdir(dir)).toEqual(['job-42.json']);
    expect(await jsonStore.load('job-42')).toEqual({ count: 5 });
  });

  it('should reject a base directory that does not exist', async () => {
    const missing = new LocalFileStore(join(dir, 'missing'));

    await expect(missing.load('job-42')).rejects.toBeInstanceOf(ConfigurationError);
    await expect(missing.save('job-42', { a: 1 })).rejects.toMatchObject({
      code: 'INVALID_STORAGE_TARGET',
      message: `Storage path ${join(dir, 'missing')} does not exist`,
    });
  });

  it('should reject a base path that is a file', async () => {
    const filePath = join(dir, 'plain.txt');
    await writeFile(filePath, 'x');
    const fileStore = new LocalFileStore(filePath);

    await expect(fileStore.wipe('job-42')).rejects.toMatchObject({
      code: 'INVALID_STORAGE_TARGET',
      message: `Storage path must be a directory; ${filePath} found`,
    });
  });
});
