/**
 * Centralized Path Definitions
 *
 * ~/.opsguide/
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const APP_DIR = join(homedir(), '.opsguide');
export const CONFIG_PATH = join(APP_DIR, 'config.toml');

/**
 * Get the application directory path (~/.opsguide)
 */
export function getAppDir(): string {
  return APP_DIR;
}

/**
 * Get the config file path (~/.opsguide/config.toml)
 */
export function getConfigPath(): string {
  return CONFIG_PATH;
}
