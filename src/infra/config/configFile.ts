/**
 * config.yaml loading
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { NotifyError } from '../../core/models/errors.js';
import { getErrorMessage } from '../../shared/utils/error.js';
import { getConfigPath } from './paths.js';
import { ConfigFileSchema, type ConfigFile } from './schema.js';

/**
 * Load and validate the config file.
 *
 * A missing file yields an empty config. An unreadable, unparsable or
 * invalid file is a config error naming the path.
 */
export function loadConfigFile(configPath: string = getConfigPath()): ConfigFile {
  if (!existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new NotifyError('config', `Failed to read ${configPath}: ${getErrorMessage(err)}`, { cause: err });
  }

  // An empty document parses to null
  if (raw === null || raw === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new NotifyError('config', `Invalid config in ${configPath}: ${issues}`);
  }
  return result.data;
}
