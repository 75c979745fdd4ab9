import chalk from 'chalk';
import {
  BranchRecord,
  NO_CHANGES,
  displayName,
  formatCommitDate,
  localBranchName,
  shortHash,
  truncate,
} from '@/core/branch';
import { RepositoryNotFoundException } from '@/core/exceptions';
import { ConfigManager, display } from '@/utils';
import { createSeparator, formatLabelValue } from '@/utils/cli/display';

export const TABLE_TITLE = 'Git Branches (sorted by latest commit)';

type TableRow = {
  branch: string;
  commit: string;
  date: string;
  message: string;
};

const COLUMNS: ReadonlyArray<{ key: keyof TableRow; header: string }> = [
  { key: 'branch', header: 'Branch' },
  { key: 'commit', header: 'Commit' },
  { key: 'date', header: 'Date' },
  { key: 'message', header: 'Message' },
];

const COLUMN_GAP = '  ';

const styleBranch = (branch: BranchRecord, text: string): string => {
  if (branch.isCurrent) return chalk.bold.green(text);
  if (branch.isRemote) return chalk.dim.cyan(text);
  return chalk.cyan(text);
};

/**
 * Lines of the branch table. Cells are padded before they are coloured so escape codes
 * never skew the column widths.
 */
export const formatBranchTable = (
  branches: readonly BranchRecord[],
  messageWidth: number
): string[] => {
  const rows: TableRow[] = branches.map((branch) => ({
    branch: displayName(branch),
    commit: shortHash(branch),
    date: formatCommitDate(branch),
    message: truncate(branch.summary, messageWidth),
  }));

  const widths = COLUMNS.map(({ key, header }) =>
    Math.max(header.length, ...rows.map((row) => row[key].length))
  );
  const pad = (text: string, column: number): string => text.padEnd(widths[column] ?? 0);
  const totalWidth = widths.reduce((sum, width) => sum + width, 0) + COLUMN_GAP.length * 3;

  const header = COLUMNS.map(({ header }, column) => chalk.bold(pad(header, column)))
    .join(COLUMN_GAP)
    .trimEnd();

  const body = rows.map((row, index) => {
    const branch = branches[index];
    const cells = [
      branch ? styleBranch(branch, pad(row.branch, 0)) : pad(row.branch, 0),
      chalk.magenta(pad(row.commit, 1)),
      chalk.yellow(pad(row.date, 2)),
      chalk.white(row.message),
    ];
    return cells.join(COLUMN_GAP).trimEnd();
  });

  return [chalk.bold.italic(TABLE_TITLE), header, createSeparator(totalWidth), ...body];
};

export const displayBranchTable = (branches: readonly BranchRecord[]): void => {
  const { messageWidth } = ConfigManager.getInstance().get('display');
  formatBranchTable(branches, messageWidth).forEach((line) => console.log(line));
  console.log();
};

const colorDiffLine = (line: string): string => {
  if (
    line.startsWith('diff --git') ||
    line.startsWith('index ') ||
    line.startsWith('--- ') ||
    line.startsWith('+++ ')
  ) {
    return chalk.bold(line);
  }
  if (line.startsWith('@@')) return chalk.cyan(line);
  if (line.startsWith('+')) return chalk.green(line);
  if (line.startsWith('-')) return chalk.red(line);
  return line;
};

/**
 * Colour a unified diff line by line, optionally with a line-number gutter.
 */
export const formatDiff = (diff: string, lineNumbers: boolean): string[] => {
  const lines = diff.replace(/\n+$/, '').split('\n');
  const gutterWidth = String(lines.length).length;

  return lines.map((line, index) => {
    const colored = colorDiffLine(line);
    if (!lineNumbers) return colored;
    return `${chalk.gray(`${String(index + 1).padStart(gutterWidth)} │`)} ${colored}`;
  });
};

/**
 * Branch panel followed by the patch of its last commit
 */
export const displayBranchDetails = (branch: BranchRecord, diff: string): void => {
  const details = [
    formatLabelValue('Branch', branch.name),
    formatLabelValue('Commit', branch.sha),
    formatLabelValue('Date', formatCommitDate(branch)),
    formatLabelValue('Message', branch.summary),
    formatLabelValue('Type', branch.isRemote ? 'Remote' : 'Local'),
  ].join('\n');

  display.info(details, 'Branch Details');

  if (diff.trim().length === 0 || diff === NO_CHANGES) {
    console.log(chalk.dim(NO_CHANGES));
  } else {
    const { lineNumbers } = ConfigManager.getInstance().get('display');
    console.log(chalk.bold.yellow('Commit Diff:'));
    formatDiff(diff, lineNumbers).forEach((line) => console.log(line));
  }
  console.log();
};

export const formatCheckoutCommand = (branch: BranchRecord): string => {
  if (branch.isRemote && branch.remote) {
    return `git checkout -b ${localBranchName(branch)} ${branch.name}`;
  }
  return `git checkout ${branch.name}`;
};

export const displayCheckoutCommand = (branch: BranchRecord): void => {
  console.log(`${chalk.bold.green('To switch to this branch, run:')} ${formatCheckoutCommand(branch)}`);
  console.log();
};

export const displayAlreadyOnBranch = (): void => {
  console.log(chalk.yellow('You are already on this branch.'));
};

export const displaySwitchCancelled = (): void => {
  console.log(chalk.dim('Branch switch cancelled.'));
};

export const displayCancelledByUser = (): void => {
  console.log(`\n${chalk.yellow('Cancelled by user.')}`);
};

export const displaySuccess = (message: string): void => {
  display.success(chalk.bold.green(message), 'Success');
};

export const displayBranchError = (message: string): void => {
  display.error(chalk.bold.red(message), 'Error');
};

export const displayRepositoryNotFound = (error: RepositoryNotFoundException): void => {
  displayBranchError(error.message);
  console.log(
    chalk.yellow("Make sure you're in a git repository or provide a valid path with --path")
  );
};
