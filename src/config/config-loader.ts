import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError } from '../errors/custom-errors.js';
import { DEFAULT_CONFIG_PATH } from './config-defaults.js';
import { resolveConfig } from './config-resolver.js';
import { type Config, type RawConfig, validateConfig } from './config-schema.js';
import type { ResolvedConfig } from './resolved-config.types.js';

export type ConfigFormat = 'json' | 'yaml';

/**
 * A configuration file, both as the user wrote it and resolved for the engine
 */
export type LoadedConfig = {
  /** Absolute path the file was read from */
  path: string;
  format: ConfigFormat;
  /** Validated document as written; episode numbers are written back into a copy of it */
  document: Config;
  config: ResolvedConfig;
};

/**
 * Pick the file format from the extension; anything but .yaml/.yml is JSON
 */
export function detectConfigFormat(configPath: string): ConfigFormat {
  const extension = extname(configPath).toLowerCase();
  return extension === '.yaml' || extension === '.yml' ? 'yaml' : 'json';
}

/**
 * Parse configuration text
 *
 * @throws ConfigError if the text is not valid JSON/YAML or not an object
 */
export function parseConfigText(content: string, format: ConfigFormat): RawConfig {
  let parsed: unknown;

  try {
    parsed = format === 'yaml' ? yaml.load(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${format.toUpperCase()}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  if (!isRawConfig(parsed)) {
    throw new ConfigError('Configuration must be an object');
  }
  return parsed;
}

/**
 * Load, parse and validate configuration
 *
 * @param configPath - Path to config file, relative to the working directory
 * @returns Parsed configuration
 * @throws ConfigError if file doesn't exist or is invalid
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<LoadedConfig> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(
      `Configuration file not found: "${absolutePath}". Create one or see --print-config-schema for reference.`,
    );
  }

  const format = detectConfigFormat(absolutePath);
  const content = await readFile(absolutePath, 'utf-8');
  const document = validateConfig(parseConfigText(content, format));

  return {
    path: absolutePath,
    format,
    document,
    config: resolveConfig(document),
  };
}

function isRawConfig(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
