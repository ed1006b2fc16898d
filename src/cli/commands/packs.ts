/**
 * Commands that inspect or edit pack configuration.
 */
import { Command } from 'commander';
import {
  findUnnecessaryDependencies,
  removeUnnecessaryDependencies,
} from '../../core/checker/dependencies.js';
import { loadPacks } from '../../core/packs/discovery.js';
import { addDependency, createPack, lintPackageYmls, type EditOutcome } from '../../core/packs/editor.js';
import { validatePacks } from '../../core/packs/validator.js';
import { logger } from '../../utils/logger.js';
import { loadCommandConfiguration, runAction } from './shared.js';

interface UnnecessaryDependenciesOptions {
  autoCorrect?: boolean;
}

function reportEdit(outcome: EditOutcome): void {
  switch (outcome.status) {
    case 'changed':
      logger.success(outcome.message);
      return;
    case 'unchanged':
      logger.info(outcome.message);
      return;
    case 'rejected':
      throw new Error(outcome.message);
  }
}

export function createCreateCommand(): Command {
  return new Command('create')
    .description('Create a new pack')
    .argument('<name>', 'Pack directory, relative to the project root')
    .action(async (name: string, _options: Record<string, never>, command: Command) => {
      await runAction(async () => {
        const config = await loadCommandConfiguration(command);
        reportEdit(await createPack(config, name));
      });
    });
}

export function createAddDependencyCommand(): Command {
  return new Command('add-dependency')
    .description('Add a dependency from one pack to another')
    .argument('<from>', 'The pack that depends on another pack')
    .argument('<to>', 'The pack that is depended on')
    .action(async (from: string, to: string, _options: Record<string, never>, command: Command) => {
      await runAction(async () => {
        const config = await loadCommandConfiguration(command);
        reportEdit(await addDependency(config, from, to));
      });
    });
}

export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Look for validation errors in the codebase')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction(async () => {
        const config = await loadCommandConfiguration(command);
        const result = validatePacks(config.projectRoot, await loadPacks(config));
        if (result.valid) {
          logger.success('Packs are valid');
          return;
        }
        console.log(`${result.errors.length} validation error(s) detected:\n`);
        console.log(result.errors.join('\n\n'));
        process.exit(1);
      });
    });
}

export function createCheckUnnecessaryDependenciesCommand(): Command {
  return new Command('check-unnecessary-dependencies')
    .description('Check for dependencies that when removed produce no violations')
    .option('--auto-correct', 'Remove the unnecessary dependencies from package.yml files')
    .action(async (options: UnnecessaryDependenciesOptions, command: Command) => {
      await runAction(async () => {
        const config = await loadCommandConfiguration(command);
        const unnecessary = await findUnnecessaryDependencies(config);
        if (unnecessary.length === 0) {
          logger.success('No unnecessary dependencies');
          return;
        }
        if (options.autoCorrect) {
          await removeUnnecessaryDependencies(unnecessary);
          logger.success(`Removed ${unnecessary.length} unnecessary dependency(ies)`);
          return;
        }
        for (const { pack, dependency } of unnecessary) {
          console.log(`${pack.name} depends on ${dependency} but does not use it`);
        }
        process.exit(1);
      });
    });
}

export function createLintPackageYmlFilesCommand(): Command {
  return new Command('lint-package-yml-files')
    .description('Rewrite package.yml files in canonical key order with sorted pack lists')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction(async () => {
        const config = await loadCommandConfiguration(command);
        const rewritten = await lintPackageYmls(config);
        for (const file of rewritten) {
          console.log(file);
        }
        logger.success(`Formatted ${rewritten.length} package.yml file(s)`);
      });
    });
}
