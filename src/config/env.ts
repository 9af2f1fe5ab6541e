/**
 * Environment Variable Handler
 *
 * Reads the ERRLENS_* overrides (and NO_COLOR) from the process
 * environment. Supports .env files for local development via dotenv.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import { DispatchSchema, StyleSchema } from './schema.js';

// No-op if .env doesn't exist
dotenvConfig();

export const EnvSchema = z.object({
  ERRLENS_STYLE: StyleSchema.optional(),
  ERRLENS_DISPATCH: DispatchSchema.optional(),
  ERRLENS_CONFIG: z.string().optional(),
  NO_COLOR: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/**
 * Cached environment variables (loaded once at first access).
 * Access through loadEnv(); tests reset it with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

/**
 * Load and validate the environment (cached after the first call).
 *
 * Empty strings count as unset, so `ERRLENS_STYLE=` in a .env file does
 * not fail validation.
 *
 * @throws ConfigError when an override holds an unknown value
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const read = (key: keyof EnvVars): string | undefined =>
    process.env[key]?.trim() || undefined;

  const result = EnvSchema.safeParse({
    ERRLENS_STYLE: read('ERRLENS_STYLE'),
    ERRLENS_DISPATCH: read('ERRLENS_DISPATCH'),
    ERRLENS_CONFIG: read('ERRLENS_CONFIG'),
    NO_COLOR: read('NO_COLOR'),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(
      `Invalid environment:\n${issues}`,
      'Unset the variable or use one of the listed values'
    );
  }

  _envCache = result.data;
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
