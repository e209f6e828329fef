/**
 * Configuration Management
 *
 * Loads, validates and saves the engine configuration. The file is
 * optional; when present it lives beside the database as taggraph.json.
 */

import * as fs from 'fs';
import * as path from 'path';
import { TagGraphConfig, TagGraphConfigOverrides, DEFAULT_CONFIG } from './types';
import { ConfigError } from './errors';

/**
 * Configuration filename
 */
export const CONFIG_FILENAME = 'taggraph.json';

const POSITIVE_INTEGER_FIELDS = [
  'cycleGuardDepth',
  'maxBreadcrumbDepth',
  'defaultSubtreeDepth',
  'maxPathsPerNode',
  'rootsLimit',
  'typeaheadLimit',
  'searchLimit',
  'relatedLimit',
  'randomTagCount',
] as const;

const FTS_WEIGHT_FIELDS = ['text', 'aliases', 'pathTokens'] as const;

/**
 * Get the configuration file path for a database
 */
export function getConfigPath(dbPath: string): string {
  return path.join(path.dirname(path.resolve(dbPath)), CONFIG_FILENAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check a configuration candidate. Returns every problem found.
 */
export function validateConfig(config: unknown): string[] {
  const errors: string[] = [];

  if (!isRecord(config)) {
    return ['Configuration must be an object'];
  }

  for (const field of POSITIVE_INTEGER_FIELDS) {
    const value = config[field];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      errors.push(`${field} must be a positive integer`);
    }
  }

  const separator = config.pathSeparator;
  if (typeof separator !== 'string' || separator.length === 0) {
    errors.push('pathSeparator must be a non-empty string');
  }

  const weights = config.ftsWeights;
  if (!isRecord(weights)) {
    errors.push('ftsWeights must be an object');
  } else {
    for (const field of FTS_WEIGHT_FIELDS) {
      const value = weights[field];
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        errors.push(`ftsWeights.${field} must be a non-negative number`);
      }
    }
  }

  return errors;
}

export function isTagGraphConfig(value: unknown): value is TagGraphConfig {
  return validateConfig(value).length === 0;
}

/**
 * Merge overrides over a base configuration and validate the result
 */
export function resolveConfig(
  overrides: TagGraphConfigOverrides = {},
  base: TagGraphConfig = DEFAULT_CONFIG
): TagGraphConfig {
  const merged: TagGraphConfig = {
    ...base,
    ...overrides,
    ftsWeights: {
      ...base.ftsWeights,
      ...(overrides.ftsWeights ?? {}),
    },
  };

  const errors = validateConfig(merged);
  if (errors.length > 0) {
    throw new ConfigError('Invalid configuration', errors);
  }

  return merged;
}

/**
 * Load configuration from a file, merged over the defaults.
 * A missing file yields the defaults.
 */
export function loadConfig(configPath: string): TagGraphConfig {
  if (!fs.existsSync(configPath)) {
    return resolveConfig();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to read configuration ${configPath}`, [], error);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Invalid configuration in ${configPath}`, ['Configuration must be an object']);
  }

  const unknownKeys = Object.keys(parsed).filter((key) => !(key in DEFAULT_CONFIG));
  const merged: Record<string, unknown> = {
    ...DEFAULT_CONFIG,
    ...parsed,
    ftsWeights: isRecord(parsed.ftsWeights)
      ? { ...DEFAULT_CONFIG.ftsWeights, ...parsed.ftsWeights }
      : parsed.ftsWeights ?? DEFAULT_CONFIG.ftsWeights,
  };

  const errors = [
    ...unknownKeys.map((key) => `Unknown configuration key: ${key}`),
    ...validateConfig(merged),
  ];
  if (errors.length > 0 || !isTagGraphConfig(merged)) {
    throw new ConfigError(`Invalid configuration in ${configPath}`, errors);
  }

  return merged;
}

/**
 * Save configuration to a file
 */
export function saveConfig(configPath: string, config: TagGraphConfig): void {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError('Refusing to save invalid configuration', errors);
  }

  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}
