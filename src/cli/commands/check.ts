/**
 * Check commands - report references that cross pack boundaries, in files
 * on disk or in contents piped to stdin.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { analyzeProject, type AnalysisResult } from '../../core/checker/engine.js';
import { HumanFormatter, JsonFormatter, type IFormatter, type OutputFormat } from '../formatters/index.js';
import { loadCommandConfiguration, readStdin, runAction } from './shared.js';

interface CheckOptions {
  ignoreRecordedViolations?: boolean;
  format: string;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'human' || value === 'json';
}

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new Error(`Unknown format '${value}', expected human or json`);
  }
  return value;
}

/**
 * Print the report; exits with status 1 when violations are reported.
 */
function report(result: AnalysisResult, format: OutputFormat): void {
  const formatter: IFormatter =
    format === 'json' ? new JsonFormatter() : new HumanFormatter({ colors: process.stdout.isTTY === true });
  console.log(formatter.formatCheck(result));

  if (result.reported.length > 0) {
    process.exit(1);
  }
}

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Look for violations in the codebase')
    .argument('[files...]', 'Files to check (default: every included file)')
    .option('--ignore-recorded-violations', 'Also report violations listed in package_todo.yml files')
    .option('--format <format>', 'Output format: human or json', 'human')
    .action(async (files: string[], options: CheckOptions, command: Command) => {
      await runAction(async () => {
        const format = parseFormat(options.format);
        const config = await loadCommandConfiguration(command, {
          ignoreRecordedViolations: options.ignoreRecordedViolations ?? false,
        });
        report(await analyzeProject(config, files), format);
      });
    });
}

export function createCheckContentsCommand(): Command {
  return new Command('check-contents')
    .description('Check file contents piped to stdin')
    .argument('<file>', 'Path the contents are checked as')
    .option('--ignore-recorded-violations', 'Also report violations listed in package_todo.yml files')
    .option('--format <format>', 'Output format: human or json', 'human')
    .action(async (file: string, options: CheckOptions, command: Command) => {
      await runAction(async () => {
        const format = parseFormat(options.format);
        const config = await loadCommandConfiguration(command, {
          ignoreRecordedViolations: options.ignoreRecordedViolations ?? false,
        });
        const contents = await readStdin();
        const absolute = path.resolve(config.projectRoot, file);
        report(await analyzeProject(config, [file], { contents: new Map([[absolute, contents]]) }), format);
      });
    });
}
