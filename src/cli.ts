#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { ListCommand } from './commands/list.command';
import { BaseError } from './errors/base.error';
import { logger, LogLevel } from './utils/logger.service';
import { FALLBACK_VERSION } from './types/config.types';

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'),
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    logger.debug('Could not read package.json for version, using fallback');
  }
  return FALLBACK_VERSION;
}

/**
 * Build the gitmarks command line program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('gitmarks')
    .description('List a directory with git staged and unstaged status markers')
    .version(readVersion(), '-v, --version', 'Output the current version')
    .argument('[directory]', 'Directory to list', '.')
    .option('--git-ignore', 'Hide entries on the git ignore list')
    .option('--no-git', 'Do not look for a git repository')
    .option('--verbose', 'Show verbose output')
    .on('option:verbose', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.debug('Verbose mode enabled');
    })
    .action(
      async (directory: string, options: { gitIgnore?: boolean; git: boolean; verbose?: boolean }) => {
        try {
          const listCommand = new ListCommand(directory);
          const result = await listCommand.execute({
            verbose: options.verbose,
            gitIgnore: options.gitIgnore,
            git: options.git,
          });

          if (result.success) {
            if (result.message) {
              logger.info(result.message);
            }
          } else {
            logger.error(result.message || 'Failed to list directory');
            process.exitCode = result.exitCode;
          }
        } catch (error) {
          handleError(error);
        }
      },
    );

  return program;
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

function handleError(error: unknown): void {
  if (error instanceof BaseError) {
    logger.error(`[${error.code}] ${error.describe()}`);
  } else {
    logger.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
}

if (require.main === module) {
  main().catch(handleError);
}
