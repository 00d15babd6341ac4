/**
 * Configuration Loader for weft-exec
 * Loads and validates weft.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import {
  DEFAULT_DOCUMENT_NAME,
  DEFAULT_EXPOSED_NAME,
  DEFAULT_MINIMUM_TIME_BETWEEN_VALIDITY_CHECKS,
} from 'weft';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name looked up in the base directory */
export const CONFIG_FILE_NAME = 'weft.yaml';

export interface WeftConfig {
  /** Language of untagged scriptlets when the extension maps to none */
  readonly defaultLanguage: string;
  readonly defaultName: string;
  readonly preferredExtension: string | undefined;
  readonly minimumTimeBetweenValidityChecks: number;
  readonly prepare: boolean;
  readonly exposedName: string;
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): WeftConfig {
  return {
    defaultLanguage: 'javascript',
    defaultName: DEFAULT_DOCUMENT_NAME,
    preferredExtension: undefined,
    minimumTimeBetweenValidityChecks:
      DEFAULT_MINIMUM_TIME_BETWEEN_VALIDITY_CHECKS,
    prepare: false,
    exposedName: DEFAULT_EXPOSED_NAME,
  };
}

// ============================================================
// VALIDATION
// ============================================================

const STRING_KEYS = [
  'defaultLanguage',
  'defaultName',
  'preferredExtension',
  'exposedName',
] as const;

const KNOWN_KEYS = new Set<string>([
  ...STRING_KEYS,
  'minimumTimeBetweenValidityChecks',
  'prepare',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed configuration and merge it over the defaults.
 * Throws Error if configuration is invalid.
 */
export function validateConfig(data: unknown): WeftConfig {
  const defaults = createDefaultConfig();
  // An empty file parses to null
  if (data === null || data === undefined) {
    return defaults;
  }
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  for (const key of STRING_KEYS) {
    const value = data[key];
    if (value !== undefined && (typeof value !== 'string' || value === '')) {
      throw new Error(
        `Invalid configuration: ${key} must be a non-empty string`
      );
    }
  }

  const interval = data['minimumTimeBetweenValidityChecks'];
  if (
    interval !== undefined &&
    (typeof interval !== 'number' ||
      !Number.isInteger(interval) ||
      interval < -1)
  ) {
    throw new Error(
      'Invalid configuration: minimumTimeBetweenValidityChecks must be an integer >= -1'
    );
  }

  const prepare = data['prepare'];
  if (prepare !== undefined && typeof prepare !== 'boolean') {
    throw new Error('Invalid configuration: prepare must be a boolean');
  }

  const text = (key: (typeof STRING_KEYS)[number]): string | undefined => {
    const value = data[key];
    return typeof value === 'string' ? value : undefined;
  };

  return {
    defaultLanguage: text('defaultLanguage') ?? defaults.defaultLanguage,
    defaultName: text('defaultName') ?? defaults.defaultName,
    preferredExtension:
      text('preferredExtension') ?? defaults.preferredExtension,
    minimumTimeBetweenValidityChecks:
      typeof interval === 'number'
        ? interval
        : defaults.minimumTimeBetweenValidityChecks,
    prepare: prepare ?? defaults.prepare,
    exposedName: text('exposedName') ?? defaults.exposedName,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from weft.yaml in the base directory, or from an
 * explicit path.
 *
 * @returns WeftConfig, or null if no weft.yaml exists in the base directory
 * @throws Error with "Invalid configuration: {reason}" on unreadable or invalid files
 */
export function loadConfig(
  baseDir: string,
  configPath?: string | undefined
): WeftConfig | null {
  const path = configPath ?? join(baseDir, CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    if (configPath !== undefined) {
      throw new Error(`Invalid configuration: file not found (${path})`);
    }
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return validateConfig(parsedData);
}
