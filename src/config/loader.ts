/**
 * Configuration Loader
 *
 * 1. Load config.toml if it exists
 * 2. Validate with Zod schema
 * 3. Merge with defaults (user values override defaults)
 * 4. Apply environment overrides
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { loadEnv, type EnvVars } from './env.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

export interface LoadConfigOptions {
  /** Config file to read (default: ERRLENS_CONFIG or ~/.errlens/config.toml) */
  configPath?: string;
  /** Environment to apply (default: loadEnv()) */
  env?: EnvVars;
}

/**
 * Read and validate a config file. Returns an empty partial config when
 * the file does not exist.
 *
 * @throws ConfigError if the file exists but is invalid
 */
export function readConfigFile(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to use defaults`
    );
  }

  const validationResult = PartialConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    const issues = validationResult.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration in ${configPath}:\n${issues}`);
  }

  return validationResult.data;
}

/**
 * Merge a user config over the defaults. Parameter aliases are merged
 * key by key; everything else is replaced.
 */
export function mergeConfig(base: Config, user: PartialConfig): Config {
  return {
    style: user.style ?? base.style,
    dispatch: user.dispatch ?? base.dispatch,
    parameter_aliases: { ...base.parameter_aliases, ...user.parameter_aliases },
  };
}

/**
 * Environment wins over the file. NO_COLOR (any value) forces plain style.
 */
export function applyEnvOverrides(config: Config, env: EnvVars): Config {
  return {
    ...config,
    style: env.NO_COLOR ? 'plain' : env.ERRLENS_STYLE ?? config.style,
    dispatch: env.ERRLENS_DISPATCH ?? config.dispatch,
  };
}

/**
 * Load the effective configuration: defaults, then config.toml, then
 * the environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? loadEnv();
  const configPath = options.configPath ?? getConfigPath(env);
  const merged = mergeConfig(DEFAULT_CONFIG, readConfigFile(configPath));
  return applyEnvOverrides(merged, env);
}

/**
 * Write the commented default config, unless one is already there.
 *
 * @returns true if a file was written
 */
export function initConfig(configPath: string = getConfigPath(loadEnv())): boolean {
  if (fs.existsSync(configPath)) {
    return false;
  }
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return true;
}

/**
 * Flatten a config into dot-notation entries for display.
 * Example: ['parameter_aliases.vm', '--vm-name']
 */
export function listConfig(config: Config): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [
    ['style', config.style],
    ['dispatch', config.dispatch],
  ];
  for (const [name, flag] of Object.entries(config.parameter_aliases)) {
    entries.push([`parameter_aliases.${name}`, flag]);
  }
  return entries;
}
