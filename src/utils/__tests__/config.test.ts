/**
 * Tests for configuration loading
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_CONFIG,
  getEnvFlag,
  loadConfig,
  parseBooleanFlag,
  parseConfig,
} from '../config';

describe('parseBooleanFlag', () => {
  it('should read true and false in any case', () => {
    expect(parseBooleanFlag('TRUE')).toBe(true);
    expect(parseBooleanFlag(' false ')).toBe(false);
  });

  it('should compare numeric strings against zero', () => {
    expect(parseBooleanFlag('0')).toBe(false);
    expect(parseBooleanFlag('000')).toBe(false);
    expect(parseBooleanFlag('12')).toBe(true);
  });

  it('should treat other non-empty strings as true', () => {
    expect(parseBooleanFlag('yes')).toBe(true);
    expect(parseBooleanFlag('')).toBe(false);
    expect(parseBooleanFlag('   ')).toBe(false);
  });
});

describe('getEnvFlag', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should read a flag from the environment', () => {
    vi.stubEnv('CHECKPOINT_TEST_FLAG', '1');

    expect(getEnvFlag('CHECKPOINT_TEST_FLAG')).toBe(true);
  });

  it('should fall back when the variable is unset', () => {
    expect(getEnvFlag('CHECKPOINT_TEST_UNSET_FLAG', true)).toBe(true);
    expect(getEnvFlag('CHECKPOINT_TEST_UNSET_FLAG')).toBe(false);
  });
});

describe('parseConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should fill in defaults', () => {
    expect(DEFAULT_CONFIG).toEqual({
      attach: [],
      whenComplete: 'delete',
      reset: false,
      storage: [{ type: 'local', path: '.', encoder: 'v8' }],
    });
  });

  it('should resolve environment variable references', () => {
    vi.stubEnv('CHECKPOINT_TEST_RESET', 'true');
    vi.stubEnv('CHECKPOINT_TEST_DIR', '/var/checkpoints');

    const config = parseConfig({
      reset: '${CHECKPOINT_TEST_RESET}',
      storage: [{ type: 'local', path: '${CHECKPOINT_TEST_DIR}' }],
    });

    expect(config.reset).toBe(true);
    expect(config.storage).toEqual([{ type: 'local', path: '/var/checkpoints', encoder: 'v8' }]);
  });

  it('should treat unset variables as empty strings', () => {
    expect(parseConfig({ reset: '${CHECKPOINT_TEST_NOT_SET}' }).reset).toBe(false);
  });

  it('should reject unknown exit policies', () => {
    expect(() => parseConfig({ whenComplete: 'sometimes' })).toThrow();
  });

  it('should reject unknown storage types', () => {
    expect(() => parseConfig({ storage: [{ type: 's3' }] })).toThrow();
  });
});

describe('loadConfig', () => {
  let dir: string;
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'checkpoint-config-'));
    logger.error.mockClear();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load a YAML file', async () => {
    const configPath = join(dir, 'config.yaml');
    await writeFile(
      configPath,
      [
        'name: nightly-import',
        'attach:',
        '  - cursor',
        '  - results',
        'whenComplete: retain',
        'storage:',
        '  - type: local',
        '    path: /srv/checkpoints',
        '    encoder: json',
        '  - type: memory',
        '',
      ].join('\n')
    );

    const config = await loadConfig(configPath, logger);

    expect(config).toEqual({
      name: 'nightly-import',
      attach: ['cursor', 'results'],
      whenComplete: 'retain',
      reset: false,
      storage: [
        { type: 'local', path: '/srv/checkpoints', encoder: 'json' },
        { type: 'memory', encoder: 'v8' },
      ],
    });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should log invalid files and fall back to defaults', async () => {
    const configPath = join(dir, 'config.yaml');
    await writeFile(configPath, 'whenComplete: sometimes\n');

    const config = await loadConfig(configPath, logger);

    expect(config).toBe(DEFAULT_CONFIG);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('should return defaults when the file does not exist', async () => {
    expect(await loadConfig(join(dir, 'missing.yaml'), logger)).toBe(DEFAULT_CONFIG);
  });
});
