/**
 * Configuration loading and validation
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { defaultLogger, type Logger } from './logger';

/**
 * Interpret an environment-style flag.
 *
 * `true`/`false` in any case map to themselves, all-digit strings are
 * compared against zero, and any other non-empty string is true.
 */
export function parseBooleanFlag(value: string): boolean {
  const trimmed = value.trim();
  const lower = trimmed.toLowerCase();

  if (lower === 'true') {
    return true;
  }
  if (lower === 'false') {
    return false;
  }
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) !== 0;
  }
  return trimmed.length > 0;
}

/**
 * Read a boolean flag from the environment
 */
export function getEnvFlag(key: string, fallback = false): boolean {
  const value = process.env[key];
  return value === undefined ? fallback : parseBooleanFlag(value);
}

/**
 * Configuration schema
 */
const EncoderFormatSchema = z.enum(['v8', 'json']).default('v8');

const LocalStorageSchema = z.object({
  type: z.literal('local'),
  path: z.string().default('.'),
  extension: z.string().optional(),
  encoder: EncoderFormatSchema,
});

const MemoryStorageSchema = z.object({
  type: z.literal('memory'),
  encoder: EncoderFormatSchema,
});

const StorageSchema = z.discriminatedUnion('type', [LocalStorageSchema, MemoryStorageSchema]);

const ConfigSchema = z.object({
  name: z.string().optional(),
  attach: z.array(z.string()).default([]),
  whenComplete: z.enum(['delete', 'retain']).default('delete'),
  reset: z
    .union([z.boolean(), z.string().transform(parseBooleanFlag)])
    .default(false),
  storage: z.array(StorageSchema).default([{ type: 'local', path: '.', encoder: 'v8' }]),
});

export type Config = z.infer<typeof ConfigSchema>;
export type StorageConfig = z.infer<typeof StorageSchema>;

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

/**
 * Validate raw configuration data, resolving `${VAR}` references first
 */
export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(resolveEnvVars(raw ?? {}));
}

/**
 * Load configuration from file
 */
export async function loadConfig(
  configPath?: string,
  logger: Logger = defaultLogger
): Promise<Config> {
  // Try multiple config locations
  const configLocations = configPath
    ? [configPath]
    : [
        '.checkpoint/config.yaml',
        '.checkpoint/config.yml',
        join(process.env.HOME || '', '.checkpoint/config.yaml'),
        join(process.env.HOME || '', '.checkpoint/config.yml'),
      ];

  for (const location of configLocations) {
    if (existsSync(location)) {
      try {
        const content = await readFile(location, 'utf-8');
        return parseConfig(parseYaml(content));
      } catch (error) {
        logger.error(`Error loading config from ${location}:`, error);
      }
    }
  }

  return DEFAULT_CONFIG;
}

/**
 * Resolve environment variable references in raw config data
 */
function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string' && value.startsWith('${') && value.endsWith('}')) {
    return process.env[value.slice(2, -1)] || '';
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, resolveEnvVars(entry)])
    );
  }
  return value;
}
