/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getEnv, _clearEnvCache } from '../env.js';
import { getConfigPath, CONFIG_PATH } from '../paths.js';
import { ConfigError } from '../../errors/index.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.stubEnv('ERRLENS_STYLE', '');
    vi.stubEnv('ERRLENS_DISPATCH', '');
    vi.stubEnv('ERRLENS_CONFIG', '');
    vi.stubEnv('NO_COLOR', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('treats empty values as unset', () => {
    expect(loadEnv()).toEqual({});
  });

  it('loads ERRLENS_STYLE when set', () => {
    vi.stubEnv('ERRLENS_STYLE', 'plain');

    expect(getEnv('ERRLENS_STYLE')).toBe('plain');
  });

  it('loads ERRLENS_DISPATCH when set', () => {
    vi.stubEnv('ERRLENS_DISPATCH', 'first-match');

    expect(getEnv('ERRLENS_DISPATCH')).toBe('first-match');
  });

  it('throws ConfigError on an unknown style', () => {
    vi.stubEnv('ERRLENS_STYLE', 'fancy');

    expect(() => loadEnv()).toThrow(ConfigError);
  });

  it('caches the first load', () => {
    vi.stubEnv('NO_COLOR', '1');
    const first = loadEnv();
    vi.stubEnv('NO_COLOR', '');

    expect(loadEnv()).toBe(first);
    expect(first.NO_COLOR).toBe('1');
  });
});

describe('getConfigPath', () => {
  it('defaults to ~/.errlens/config.toml', () => {
    expect(getConfigPath({})).toBe(CONFIG_PATH);
    expect(CONFIG_PATH.endsWith('config.toml')).toBe(true);
  });

  it('honours ERRLENS_CONFIG', () => {
    expect(getConfigPath({ ERRLENS_CONFIG: '/tmp/errlens.toml' })).toBe('/tmp/errlens.toml');
  });
});
