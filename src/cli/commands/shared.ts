/**
 * Options every command accepts, stdin input, and the error boundary
 * around command actions.
 */
import type { Command } from 'commander';
import {
  resolveConfiguration,
  type Configuration,
  type ConfigurationOverrides,
} from '../../core/config/loader.js';
import { PacksError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Program-level options, as commander parses them.
 */
export type GlobalOptions = {
  projectRoot: string;
  /** False under `--no-cache` */
  cache: boolean;
  debug?: boolean;
  experimentalParser?: boolean;
  printFiles?: boolean;
};

/**
 * Apply the global options and load the configuration for a command.
 */
export async function loadCommandConfiguration(
  command: Command,
  overrides: ConfigurationOverrides = {}
): Promise<Configuration> {
  const options = command.optsWithGlobals<GlobalOptions>();
  if (options.debug) {
    logger.setLevel('debug');
  }
  if (!options.cache) {
    logger.debug('Cache is disabled');
  }

  return resolveConfiguration(options.projectRoot, {
    // Without --no-cache the packwerk.yml setting applies
    cache: options.cache ? undefined : false,
    printFiles: options.printFiles ?? false,
    experimentalParser: options.experimentalParser ?? false,
    ...overrides,
  });
}

/**
 * Run a command action; any error is logged and exits with status 1.
 */
export async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    if (error instanceof PacksError) {
      logger.error(`${error.message} [${error.code}]`);
      logger.debug('Error details', error.toJSON());
    } else {
      logger.error(error instanceof Error ? error.message : 'Unknown error');
    }
    process.exit(1);
  }
}

/**
 * Everything piped to stdin.
 */
export function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    if (process.stdin.isTTY) {
      reject(new Error('No input on stdin. Pipe the file contents in.'));
      return;
    }
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk: string) => { data += chunk; });
    process.stdin.on('end', () => resolve(data));
    process.stdin.on('error', reject);
  });
}
