/**
 * Centralized Path Definitions
 *
 * ~/.errlens/
 * └── config.toml     (User configuration, optional)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const ERRLENS_DIR = join(homedir(), '.errlens');
export const CONFIG_PATH = join(ERRLENS_DIR, 'config.toml');

/**
 * Get the config file path, honouring ERRLENS_CONFIG when it is set.
 */
export function getConfigPath(env: { ERRLENS_CONFIG?: string } = {}): string {
  return env.ERRLENS_CONFIG?.trim() || CONFIG_PATH;
}
