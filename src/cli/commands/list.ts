/**
 * Debugging commands that print what the configuration selects.
 */
import { Command } from 'commander';
import { loadProjectIndex } from '../../core/checker/engine.js';
import { listIncludedFiles, loadPacks } from '../../core/packs/discovery.js';
import { comparePacks } from '../../core/packs/pack-set.js';
import { toRelative } from '../../utils/file-system.js';
import { loadCommandConfiguration, runAction } from './shared.js';

interface ListDefinitionsOptions {
  ambiguous?: boolean;
}

export function createListPacksCommand(): Command {
  return new Command('list-packs')
    .description('List packs based on configuration in packwerk.yml (for debugging purposes)')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction(async () => {
        const config = await loadCommandConfiguration(command);
        const packs = (await loadPacks(config)).sort(comparePacks);
        for (const pack of packs) {
          console.log(`${pack.name}\t${toRelative(config.projectRoot, pack.yml)}`);
        }
      });
    });
}

export function createListIncludedFilesCommand(): Command {
  return new Command('list-included-files')
    .description('List analyzed files based on configuration in packwerk.yml (for debugging purposes)')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction(async () => {
        const config = await loadCommandConfiguration(command);
        for (const file of await listIncludedFiles(config)) {
          console.log(toRelative(config.projectRoot, file));
        }
      });
    });
}

export function createListDefinitionsCommand(): Command {
  return new Command('list-definitions')
    .description('List the constants packscan sees and where it sees them (for debugging purposes)')
    .option('-a, --ambiguous', 'Show constants with multiple definitions only')
    .action(async (options: ListDefinitionsOptions, command: Command) => {
      await runAction(async () => {
        const config = await loadCommandConfiguration(command);
        const { resolver } = await loadProjectIndex(config);
        for (const { constantName, definitions } of resolver.allDefinitions()) {
          if (options.ambiguous && definitions.length < 2) continue;
          for (const definition of definitions) {
            console.log(`${constantName} is defined at ${definition.relativePath}`);
          }
        }
      });
    });
}
