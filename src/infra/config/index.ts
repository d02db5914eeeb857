/**
 * Configuration - barrel exports
 */

export { CONFIG_DIR_ENV_KEY, getConfigDir, getConfigPath } from './paths.js';
export { ConfigFileSchema, RoomIdSchema, type ConfigFile } from './schema.js';
export { loadConfigFile } from './configFile.js';
export {
  ENV_KEYS,
  resolveSendOptions,
  type SendFlags,
  type SendOptions,
} from './sendOptions.js';
