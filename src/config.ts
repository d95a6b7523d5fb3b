/**
 * Configuration Loader
 * Loads and validates .decla.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_LOG_LEVEL, isLogLevel, type LogLevel } from './logger.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.decla.yaml';

export const DEFAULT_PROMPT = '> ';

// ============================================================
// TYPES
// ============================================================

export interface DeclaConfig {
  /** Logger level, 0 (none) to 4 (debug) */
  logLevel: LogLevel;
  /** Interactive prompt */
  prompt: string;
  /** Print the banner when an interactive session starts */
  banner: boolean;
}

/** Raised for unreadable or invalid configuration files */
export class ConfigError extends Error {
  constructor(reason: string) {
    super(`Invalid configuration: ${reason}`);
    this.name = 'ConfigError';
  }
}

export function createDefaultConfig(): DeclaConfig {
  return { logLevel: DEFAULT_LOG_LEVEL, prompt: DEFAULT_PROMPT, banner: true };
}

// ============================================================
// VALIDATION
// ============================================================

const CONFIG_KEYS = new Set(['logLevel', 'prompt', 'banner']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed YAML and return the settings it carries.
 * An empty document carries none.
 *
 * @throws {ConfigError} On a non-mapping document, unknown key or bad value
 */
export function validateConfig(data: unknown): Partial<DeclaConfig> {
  if (data === null || data === undefined) return {};
  if (!isRecord(data)) {
    throw new ConfigError('must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!CONFIG_KEYS.has(key)) {
      throw new ConfigError(`unknown key ${key}`);
    }
  }

  const settings: Partial<DeclaConfig> = {};

  if ('logLevel' in data) {
    const level = data['logLevel'];
    if (!isLogLevel(level)) {
      throw new ConfigError('logLevel must be an integer from 0 to 4');
    }
    settings.logLevel = level;
  }

  if ('prompt' in data) {
    const prompt = data['prompt'];
    if (typeof prompt !== 'string') {
      throw new ConfigError('prompt must be a string');
    }
    settings.prompt = prompt;
  }

  if ('banner' in data) {
    const banner = data['banner'];
    if (typeof banner !== 'boolean') {
      throw new ConfigError('banner must be a boolean');
    }
    settings.banner = banner;
  }

  return settings;
}

/**
 * Parse configuration text.
 *
 * @throws {ConfigError} On invalid YAML or invalid settings
 */
export function parseConfig(content: string): Partial<DeclaConfig> {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return validateConfig(data);
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .decla.yaml in the specified directory,
 * merged over the defaults.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Merged configuration, or null if no file exists
 * @throws {ConfigError} If the file cannot be read or is invalid
 */
export function loadConfig(cwd: string): DeclaConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return { ...createDefaultConfig(), ...parseConfig(content) };
}
