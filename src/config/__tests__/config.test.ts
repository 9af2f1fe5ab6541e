/**
 * Config Module Tests
 *
 * Tests the configuration loading, validation, and merging logic.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { DEFAULT_CONFIG } from '../defaults.js';
import { applyEnvOverrides, initConfig, listConfig, loadConfig, readConfigFile } from '../loader.js';
import { ConfigError } from '../../errors/index.js';

// Use a temp directory for tests to avoid touching real config
const TEST_DIR = path.join(os.tmpdir(), '.errlens-test-' + process.pid);
const TEST_CONFIG_PATH = path.join(TEST_DIR, 'config.toml');

describe('Config Schema', () => {
  it('validates the defaults', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects an unknown style', () => {
    expect(PartialConfigSchema.safeParse({ style: 'fancy' }).success).toBe(false);
  });

  it('rejects an unknown dispatch policy', () => {
    expect(PartialConfigSchema.safeParse({ dispatch: 'last-match' }).success).toBe(false);
  });

  it('rejects aliases that are not flags', () => {
    expect(
      PartialConfigSchema.safeParse({ parameter_aliases: { vm_name: 'vm-name' } }).success
    ).toBe(false);
  });

  it('rejects unknown keys', () => {
    expect(PartialConfigSchema.safeParse({ colour: 'red' }).success).toBe(false);
  });

  it('allows a partial config', () => {
    expect(PartialConfigSchema.safeParse({ dispatch: 'first-match' }).success).toBe(true);
  });
});

describe('Config Loader', () => {
  beforeEach(() => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('uses defaults when the file is missing', () => {
    expect(loadConfig({ configPath: TEST_CONFIG_PATH, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('merges the file over defaults', () => {
    fs.writeFileSync(
      TEST_CONFIG_PATH,
      'style = "plain"\n\n[parameter_aliases]\nstorage_account_name = "--account-name"\n'
    );

    expect(loadConfig({ configPath: TEST_CONFIG_PATH, env: {} })).toEqual({
      style: 'plain',
      dispatch: 'first-rewrite',
      parameter_aliases: { storage_account_name: '--account-name' },
    });
  });

  it('throws ConfigError on invalid TOML', () => {
    fs.writeFileSync(TEST_CONFIG_PATH, 'style = "plain\n');

    expect(() => readConfigFile(TEST_CONFIG_PATH)).toThrow(ConfigError);
  });

  it('throws ConfigError on invalid values', () => {
    fs.writeFileSync(TEST_CONFIG_PATH, 'dispatch = "sometimes"\n');

    expect(() => readConfigFile(TEST_CONFIG_PATH)).toThrow(/^Invalid configuration in /);
  });

  it('writes a template that loads as the defaults', () => {
    expect(initConfig(TEST_CONFIG_PATH)).toBe(true);
    expect(initConfig(TEST_CONFIG_PATH)).toBe(false);
    expect(loadConfig({ configPath: TEST_CONFIG_PATH, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('lets the environment win over the file', () => {
    fs.writeFileSync(TEST_CONFIG_PATH, 'style = "ansi"\ndispatch = "first-rewrite"\n');

    const config = loadConfig({
      configPath: TEST_CONFIG_PATH,
      env: { ERRLENS_STYLE: 'plain', ERRLENS_DISPATCH: 'first-match' },
    });

    expect(config.style).toBe('plain');
    expect(config.dispatch).toBe('first-match');
  });
});

describe('applyEnvOverrides', () => {
  it('forces plain style when NO_COLOR is set', () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, { NO_COLOR: '1', ERRLENS_STYLE: 'ansi' }).style).toBe(
      'plain'
    );
  });

  it('leaves the config alone with an empty environment', () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });
});

describe('listConfig', () => {
  it('flattens aliases into dot-notation keys', () => {
    const config = { ...DEFAULT_CONFIG, parameter_aliases: { vm: '--vm-name' } };

    expect(listConfig(config)).toEqual([
      ['style', 'ansi'],
      ['dispatch', 'first-rewrite'],
      ['parameter_aliases.vm', '--vm-name'],
    ]);
  });
});
