/**
 * Config file locations
 *
 * Default: ~/.hipchat-notify/config.yaml
 * Override the directory with HIPCHAT_NOTIFY_CONFIG_DIR.
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export const CONFIG_DIR_ENV_KEY = 'HIPCHAT_NOTIFY_CONFIG_DIR';

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_DIR_ENV_KEY];
  if (override) {
    return resolve(override);
  }
  return join(homedir(), '.hipchat-notify');
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigDir(env), 'config.yaml');
}
