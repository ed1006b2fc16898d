/**
 * Configuration module exports.
 */
export {
  loadConfig,
  resolveConfiguration,
  getDefaultConfig,
  DEFAULT_CONFIG_PATH,
  type Configuration,
  type ConfigurationOverrides,
} from './loader.js';
export {
  ConfigSchema,
  DEFAULT_INCLUDE,
  DEFAULT_EXCLUDE,
  DEFAULT_PACKAGE_PATHS,
  DEFAULT_CACHE_DIRECTORY,
  type Config,
} from './schema.js';
