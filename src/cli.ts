#!/usr/bin/env node

import chalk from 'chalk';
import { CommanderError } from 'commander';
import { createBranchesCommand } from './commands';
import { displayCancelledByUser } from './commands/branches/branches.display';
import { ConfigManager, logger, onInterrupt, spinner } from './utils';
import { displayError } from './utils/cli';

const program = createBranchesCommand();

program.hook('preAction', (thisCommand) => {
  const options = thisCommand.opts();

  if (options['quiet']) {
    logger.level = 'silent';
  } else if (options['verbose']) {
    logger.level = 'debug';
  }

  if (typeof options['config'] === 'string') {
    ConfigManager.setConfigPath(options['config']);
  }

  const ui = ConfigManager.getInstance().get('ui');
  if (!ui.colorOutput) {
    chalk.level = 0;
  }
  spinner.enabled = ui.showProgress && logger.level !== 'silent';
});

program.exitOverride();

onInterrupt(() => {
  spinner.stop();
  displayCancelledByUser();
  process.exit(0);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }

  displayError(error instanceof Error ? error : new Error(String(error)));
  process.exit(1);
});
