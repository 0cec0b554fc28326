/**
 * Config module exports
 */

export {
  configSchema,
  DEFAULT_IGNORED_DIRS,
  MAX_WORKERS_LIMIT,
  type Config,
  type ConfigInput,
} from './schema.js';

export {
  loadConfig,
  validateConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  CONFIG_FILE_NAMES,
  PACKAGE_JSON_KEY,
} from './loader.js';
