import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'path';
import { display } from './display';

interface PackageInfo {
  name: string;
  version: string;
  description: string;
  license: string;
}

export const readPackageInfo = (): PackageInfo => {
  return fs.readJsonSync(path.join(__dirname, '../../../package.json'));
};

/**
 * Version panel shown for -v/--version
 */
export const displayVersion = (): void => {
  const pkg = readPackageInfo();
  const systemInfo = [
    `${chalk.bold.blue(pkg.name)} ${chalk.green(`v${pkg.version}`)}`,
    '',
    `${chalk.gray('Runtime Information:')}`,
    `  ${chalk.gray('Node.js:')} ${chalk.cyan(process.version)}`,
    `  ${chalk.gray('Platform:')} ${chalk.cyan(process.platform)} ${chalk.cyan(process.arch)}`,
    '',
    `${chalk.gray('Project Information:')}`,
    `  ${chalk.gray('License:')} ${chalk.yellow(pkg.license)}`,
    `  ${chalk.gray('Description:')} ${chalk.white(pkg.description)}`,
  ].join('\n');

  display.highlight(systemInfo, '🎯 Version Information');
};

/**
 * Panel for failures nobody anticipated
 */
export const displayError = (error: Error): void => {
  const errorContent = [
    `${chalk.red.bold(`Unexpected error: ${error.message}`)}`,
    '',
    `${chalk.gray('Error Type:')} ${chalk.red(error.name || 'Unknown Error')}`,
    '',
    chalk.yellow.bold('🔧 Troubleshooting:'),
    `  ${chalk.blue('💡 Tip:')} Use ${chalk.green('--verbose')} flag for detailed logs`,
    `  ${chalk.blue('📚 Help:')} Run ${chalk.green('branch-picker --help')} for available options`,
  ].join('\n');

  display.error(errorContent, '🚨 Error');
};
