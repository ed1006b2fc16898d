/**
 * Delete-cache command.
 */
import { Command } from 'commander';
import { removeDir, toRelative } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { loadCommandConfiguration, runAction } from './shared.js';

export function createDeleteCacheCommand(): Command {
  return new Command('delete-cache')
    .description('`rm -rf` on the cache directory, default `tmp/cache/packwerk`')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction(async () => {
        const config = await loadCommandConfiguration(command);
        await removeDir(config.cacheDirectory);
        logger.success(`Deleted ${toRelative(config.projectRoot, config.cacheDirectory)}`);
      });
    });
}
