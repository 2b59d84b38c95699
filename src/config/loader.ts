/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (~/.opsguide)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';
import { isRecord } from '../utils/json.js';

export { getAppDir, getConfigPath } from './paths.js';

function isTomlTable(value: unknown): value is TOML.JsonMap {
  return isRecord(value) && !(value instanceof Date);
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Deep merge two records, with source values overriding target.
 * Nested tables are merged; arrays and primitives are replaced.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load and parse the config file.
 * Returns the merged config (defaults + user overrides).
 *
 * @param createIfMissing - Write the commented template on first run
 * @param configPath - Override for tests
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(createIfMissing = true, configPath = getConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return ConfigSchema.parse(DEFAULT_CONFIG);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: TOML.JsonMap;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: opsguide config reset --force`
    );
  }

  const validationResult = PartialConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error.issues)}`,
      'Run: opsguide config reset --force  to restore defaults'
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, validationResult.data));
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(merged.error.issues)}`);
  }
  return merged.data;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('scope.enforce') => true
 */
export function getConfigValue(key: string, config: Config = loadConfig()): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Set a specific config value by dot-notation path.
 * The complete merged config is validated before anything is written.
 */
export function setConfigValue(key: string, value: string, configPath = getConfigPath()): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError(
      'Invalid config key: empty key',
      'Run: opsguide config list  to see available keys'
    );
  }

  let config: TOML.JsonMap = {};
  if (fs.existsSync(configPath)) {
    config = TOML.parse(fs.readFileSync(configPath, 'utf-8'));
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isTomlTable(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  const validationResult = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config));

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validationResult.error.issues)}`,
      'Run: opsguide config list  to see current values and types'
    );
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Parse a CLI string into a boolean, number or string.
 */
export function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['scope.enforce', true]
 */
export function listConfig(config: Config = loadConfig()): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isRecord(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
