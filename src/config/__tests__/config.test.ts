/**
 * Config Module Tests
 *
 * Tests the configuration loading, validation, and merging logic.
 * Every test works on a temp directory, never the real ~/.opsguide.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from '../defaults.js';
import {
  deepMerge,
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  parseValue,
} from '../loader.js';
import { ConfigError } from '../../errors/index.js';

describe('Config Schema', () => {
  it('validates the default config', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects a malformed start date', () => {
    const invalid = {
      ...DEFAULT_CONFIG,
      sources: {
        ...DEFAULT_CONFIG.sources,
        exa: { ...DEFAULT_CONFIG.sources.exa, start_date: '01/01/2024' },
      },
    };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('rejects routing timeout below the minimum', () => {
    const invalid = {
      ...DEFAULT_CONFIG,
      pipeline: { ...DEFAULT_CONFIG.pipeline, routing_timeout_ms: 10 },
    };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('allows deeply partial config', () => {
    const partial = { sources: { exa: { start_days: 30 } } };
    expect(PartialConfigSchema.safeParse(partial).success).toBe(true);
  });
});

describe('Config Defaults', () => {
  it('enforces scope with the LLM check off', () => {
    expect(DEFAULT_CONFIG.scope.enforce).toBe(true);
    expect(DEFAULT_CONFIG.scope.llm_check).toBe(false);
  });

  it('uses an 8 second routing budget', () => {
    expect(DEFAULT_CONFIG.pipeline.routing_timeout_ms).toBe(8000);
  });

  it('lets a source time out inside the routing budget', () => {
    expect(DEFAULT_CONFIG.sources.timeout_ms).toBe(6000);
    expect(DEFAULT_CONFIG.sources.timeout_ms).toBeLessThan(DEFAULT_CONFIG.pipeline.routing_timeout_ms);
  });

  it('keeps the URL allow-list permissive by default', () => {
    expect(DEFAULT_CONFIG.security.enforce_url_allowlist).toBe(false);
    expect(DEFAULT_CONFIG.security.url_allowlist).toContain('learn.microsoft.com');
  });

  it('template parses back to the defaults', () => {
    const parsed = PartialConfigSchema.parse(TOML.parse(CONFIG_TEMPLATE));
    const merged = ConfigSchema.parse(deepMerge(DEFAULT_CONFIG, parsed));
    expect(merged).toEqual(DEFAULT_CONFIG);
  });
});

describe('Deep Merge Logic', () => {
  it('merges nested objects correctly', () => {
    const result = deepMerge(
      { a: 1, nested: { x: 1, y: 2 } },
      { nested: { y: 3 } }
    );
    expect(result).toEqual({ a: 1, nested: { x: 1, y: 3 } });
  });

  it('replaces arrays instead of merging them', () => {
    const result = deepMerge({ list: ['a', 'b'] }, { list: ['c'] });
    expect(result).toEqual({ list: ['c'] });
  });

  it('ignores undefined source values', () => {
    const result = deepMerge({ a: 1 }, { a: undefined });
    expect(result).toEqual({ a: 1 });
  });
});

describe('Config Loading', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'opsguide-config-'));
    configPath = path.join(testDir, 'nested', 'config.toml');
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('returns defaults and writes the template when missing', () => {
    const config = loadConfig(true, configPath);

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(fs.readFileSync(configPath, 'utf-8')).toBe(CONFIG_TEMPLATE);
  });

  it('does not create the file when createIfMissing is false', () => {
    loadConfig(false, configPath);

    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('merges user values over defaults', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, '[scope]\nenforce = false\n');

    const config = loadConfig(false, configPath);

    expect(config.scope.enforce).toBe(false);
    expect(config.scope.allow_career_topics).toBe(true);
  });

  it('throws ConfigError on invalid TOML', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, '[scope\nenforce = ');

    expect(() => loadConfig(false, configPath)).toThrow(ConfigError);
  });

  it('throws ConfigError on schema violations', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, '[pipeline]\nrouting_timeout_ms = "soon"\n');

    expect(() => loadConfig(false, configPath)).toThrow(/pipeline\.routing_timeout_ms/);
  });

  it('sets a nested value and reads it back', () => {
    setConfigValue('sources.exa.start_days', '30', configPath);

    const config = loadConfig(false, configPath);
    expect(config.sources.exa.start_days).toBe(30);
    expect(getConfigValue('sources.exa.start_days', config)).toBe(30);
  });

  it('refuses to write an invalid value', () => {
    expect(() => setConfigValue('scope.enforce', 'maybe', configPath)).toThrow(ConfigError);
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('returns undefined for unknown keys', () => {
    expect(getConfigValue('scope.nope', DEFAULT_CONFIG)).toBeUndefined();
  });

  it('flattens config into dotted keys', () => {
    const entries = new Map(listConfig(DEFAULT_CONFIG));

    expect(entries.get('pipeline.history_messages')).toBe(6);
    expect(entries.get('security.url_allowlist')).toEqual(DEFAULT_CONFIG.security.url_allowlist);
  });
});

describe('parseValue', () => {
  it('converts booleans, numbers and strings', () => {
    expect(parseValue('TRUE')).toBe(true);
    expect(parseValue('false')).toBe(false);
    expect(parseValue('0.5')).toBe(0.5);
    expect(parseValue('openai/gpt-4o')).toBe('openai/gpt-4o');
    expect(parseValue(' ')).toBe(' ');
  });
});
