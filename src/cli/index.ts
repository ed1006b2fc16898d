import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { createCheckCommand, createCheckContentsCommand } from './commands/check.js';
import { createUpdateCommand } from './commands/update.js';
import {
  createListPacksCommand,
  createListIncludedFilesCommand,
  createListDefinitionsCommand,
} from './commands/list.js';
import { createDeleteCacheCommand } from './commands/delete-cache.js';
import {
  createAddDependencyCommand,
  createCheckUnnecessaryDependenciesCommand,
  createCreateCommand,
  createLintPackageYmlFilesCommand,
  createValidateCommand,
} from './commands/packs.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Version from the nearest package.json above this module (src/ or dist/src/). */
function readVersion(): string {
  let directory = __dirname;
  while (!existsSync(join(directory, 'package.json'))) {
    const parent = dirname(directory);
    if (parent === directory) return '0.0.0';
    directory = parent;
  }
  const parsed: unknown = JSON.parse(readFileSync(join(directory, 'package.json'), 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('packscan')
    .description('Finds constant references that cross Ruby pack boundaries')
    .version(readVersion())
    .option('--project-root <path>', 'Path for the root of the project', '.')
    .option('-d, --debug', 'Log debugging output')
    .option('-e, --experimental-parser', 'Resolve constants from the definitions the parser finds')
    .option('--no-cache', 'Run without the cache (good for CI, testing)')
    .option('-p, --print-files', 'Log each file as it begins and finishes processing');

  program.addCommand(createCreateCommand());
  program.addCommand(createCheckCommand());
  program.addCommand(createCheckContentsCommand());
  program.addCommand(createUpdateCommand());
  program.addCommand(createValidateCommand());
  program.addCommand(createAddDependencyCommand());
  program.addCommand(createCheckUnnecessaryDependenciesCommand());
  program.addCommand(createLintPackageYmlFilesCommand());
  program.addCommand(createDeleteCacheCommand());
  program.addCommand(createListPacksCommand());
  program.addCommand(createListIncludedFilesCommand());
  program.addCommand(createListDefinitionsCommand());

  return program;
}
