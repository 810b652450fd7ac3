/**
 * Configuration module exports.
 */

export {
  loadConfig,
  validateExternalConfig,
  resolvePath,
  EXTERNAL_DEFAULTS,
  PROJECT_CONFIG_FILE,
  USER_CONFIG_PATH,
} from './loader.js';
export type { ExternalConfig, ResolvedConfig, LoadConfigOptions } from './loader.js';
