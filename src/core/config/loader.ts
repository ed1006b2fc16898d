/**
 * Loads packwerk.yml and resolves it, together with command line
 * overrides, into the Configuration every command runs with.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { computeChecksum } from '../../utils/checksum.js';

export const DEFAULT_CONFIG_PATH = 'packwerk.yml';

/**
 * Settings for one run.
 */
export interface Configuration {
  /** Absolute project root */
  projectRoot: string;
  include: string[];
  exclude: string[];
  packagePaths: string[];
  cacheEnabled: boolean;
  /** Absolute cache directory */
  cacheDirectory: string;
  /** Checksum of packwerk.yml ('' when absent); a change invalidates the cache */
  configChecksum: string;
  /** Log each file as it starts and finishes processing */
  printFiles: boolean;
  /** Report violations already listed in package_todo.yml files */
  ignoreRecordedViolations: boolean;
  /** Resolve constants from parsed definitions instead of file layout */
  experimentalParser: boolean;
}

export interface ConfigurationOverrides {
  cache?: boolean;
  printFiles?: boolean;
  ignoreRecordedViolations?: boolean;
  experimentalParser?: boolean;
}

/**
 * Default configuration values, used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file, falling back to defaults if it doesn't exist.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Load packwerk.yml under `projectRoot` and apply overrides.
 */
export async function resolveConfiguration(
  projectRoot: string,
  overrides: ConfigurationOverrides = {}
): Promise<Configuration> {
  const root = path.resolve(projectRoot);
  const configFile = path.join(root, DEFAULT_CONFIG_PATH);
  const config = await loadConfig(root);
  const configContent = (await fileExists(configFile)) ? await readFile(configFile) : '';

  return {
    projectRoot: root,
    include: config.include,
    exclude: config.exclude,
    packagePaths: config.package_paths,
    cacheEnabled: overrides.cache ?? config.cache,
    cacheDirectory: path.resolve(root, config.cache_directory),
    configChecksum: configContent ? computeChecksum(configContent) : '',
    printFiles: overrides.printFiles ?? false,
    ignoreRecordedViolations: overrides.ignoreRecordedViolations ?? false,
    experimentalParser: overrides.experimentalParser ?? false,
  };
}
