/**
 * Update command - record the current violations in package_todo.yml files.
 */
import { Command } from 'commander';
import { updatePackageTodos } from '../../core/checker/update.js';
import { logger } from '../../utils/logger.js';
import { loadCommandConfiguration, runAction } from './shared.js';

export function createUpdateCommand(): Command {
  return new Command('update')
    .description('Update package_todo.yml files with the current violations')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction(async () => {
        const config = await loadCommandConfiguration(command);
        const result = await updatePackageTodos(config);
        logger.success(
          `Recorded ${result.violationCount} violation(s) in ${result.packsWithTodos.length} package_todo.yml file(s)`
        );
      });
    });
}
