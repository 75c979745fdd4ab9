import { Command, InvalidArgumentError } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import { displayVersion } from '@/utils/cli';
import { BranchesOptions, exploreBranches } from './branches.handler';

interface BranchesCommandOptions extends BranchesOptions {
  version?: boolean;
}

/**
 * --path must name an existing directory
 */
export const parseDirectory = (value: string): string => {
  const resolved = path.resolve(value);
  if (!fs.pathExistsSync(resolved)) {
    throw new InvalidArgumentError(`Directory '${value}' does not exist.`);
  }
  if (!fs.statSync(resolved).isDirectory()) {
    throw new InvalidArgumentError(`'${value}' is not a directory.`);
  }
  return resolved;
};

export const createBranchesCommand = (): Command =>
  new Command('branch-picker')
    .description(
      'List git branches sorted by latest commit and interactively explore them.\n\n' +
        'Shows branches in a table sorted by commit date (newest first).\n' +
        'Select a branch to view its last commit details and optionally switch to it.'
    )
    .option('-r, --remote', 'Include remote branches in the list', false)
    .option('-s, --switch', 'Switch to the selected branch without confirmation', false)
    .option(
      '-p, --path <path>',
      'Path to git repository (default: current directory)',
      parseDirectory
    )
    .option('-v, --version', 'Display version information')
    .option('-V, --verbose', 'Enable verbose logging')
    .option('-q, --quiet', 'Suppress log output')
    .option('--config <path>', 'Specify config file path')
    .action(async (options: BranchesCommandOptions) => {
      if (options.version) {
        displayVersion();
        process.exit(0);
      }

      const exitCode = await exploreBranches(options);
      process.exit(exitCode);
    });
