import { dirname, isAbsolute, resolve } from 'path';
import { cosmiconfig } from 'cosmiconfig';
import {
  cokacencConfigSchema,
  type CokacencConfigInput,
  type CokacencConfigOutput,
} from '../schemas/config.schema.js';
import { ConfigError } from '../errors.js';
import { APP_NAME, CONFIG_SEARCH_PLACES, MB } from '../constants.js';
import type { PackOptions, UnpackOptions } from '../types.js';

export interface LoadedConfig {
  config: CokacencConfigOutput;
  /** Config file that contributed, or null when only defaults and flags apply */
  filepath: string | null;
}

/**
 * Flag values from the command line; undefined means "not given"
 */
export type ConfigOverrides = Partial<CokacencConfigInput>;

const validate = (raw: unknown, source: string): CokacencConfigOutput => {
  const result = cokacencConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}: ${result.error.message}`, [
      'Check the values in your .cokacencrc file',
    ]);
  }
  return result.data;
};

const dropUndefined = (overrides: ConfigOverrides): Record<string, unknown> => {
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
};

/**
 * Load configuration for a target directory.
 * Precedence: built-in defaults < .cokacencrc in dir < command-line flags.
 */
export const loadConfig = async (dir: string, overrides: ConfigOverrides = {}): Promise<LoadedConfig> => {
  const explorer = cosmiconfig(APP_NAME, {
    searchPlaces: CONFIG_SEARCH_PLACES,
    // Only the target directory itself, never its parents or global config
    searchStrategy: 'none',
  });

  let fileConfig: Record<string, unknown> = {};
  let filepath: string | null = null;

  try {
    const result = await explorer.search(dir);
    if (result && !result.isEmpty) {
      filepath = result.filepath;
      const raw: unknown = result.config;
      if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
        throw new ConfigError(`Configuration in ${filepath} must be an object`);
      }
      fileConfig = { ...raw };
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }

  // A key path in the rc file is relative to the file, not the cwd
  const fileKey = fileConfig.key;
  if (filepath && typeof fileKey === 'string' && !isAbsolute(fileKey) && !fileKey.startsWith('~/')) {
    fileConfig.key = resolve(dirname(filepath), fileKey);
  }

  if (filepath) {
    validate(fileConfig, filepath);
  }

  const config = validate({ ...fileConfig, ...dropUndefined(overrides) }, filepath ?? 'command-line flags');
  return { config, filepath };
};

export const requireKeyPath = (config: CokacencConfigOutput): string => {
  if (!config.key) {
    throw new ConfigError('No key file given', [
      'Pass --key <file>',
      'Or set "key" in a .cokacencrc file in the target directory',
    ]);
  }
  return config.key;
};

export const toPackOptions = (config: CokacencConfigOutput): PackOptions => ({
  splitSize: config.size * MB,
  md5: config.md5,
  delete: config.delete,
});

export const toUnpackOptions = (config: CokacencConfigOutput): UnpackOptions => ({
  delete: config.delete,
  overwrite: config.overwrite,
});

/**
 * Parse a non-negative integer flag value such as --size or --length
 */
export const parseIntegerFlag = (value: string | undefined, flag: string): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`${flag} must be a non-negative integer, got "${value}"`);
  }
  return Number.parseInt(value.trim(), 10);
};
