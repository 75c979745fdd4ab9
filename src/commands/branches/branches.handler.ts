import { BranchManager, BranchRecord } from '@/core/branch';
import { BranchException, OperationFailedException, isBranchException } from '@/core/exceptions';
import { logger, spinner } from '@/utils';
import { displayError } from '@/utils/cli';
import {
  displayAlreadyOnBranch,
  displayBranchDetails,
  displayBranchError,
  displayBranchTable,
  displayCancelledByUser,
  displayCheckoutCommand,
  displayRepositoryNotFound,
  displaySuccess,
  displaySwitchCancelled,
} from './branches.display';
import { confirmCheckout, selectBranch } from './branches.prompt';

export interface BranchesOptions {
  remote?: boolean;
  switch?: boolean;
  path?: string;
}

export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

const assertNever = (value: never): never => {
  throw new Error(`Unhandled failure: ${JSON.stringify(value)}`);
};

/**
 * List, pick, inspect and optionally switch to a branch. Resolves to the process exit code.
 */
export const exploreBranches = async (options: BranchesOptions): Promise<ExitCode> => {
  try {
    const manager = await BranchManager.open(options.path);
    const branches = await loadBranches(manager, options.remote ?? false);

    displayBranchTable(branches);

    const selection = await selectBranch(branches);
    if (selection.status === 'cancelled') {
      if (selection.reason === 'interrupt') displayCancelledByUser();
      return ExitCode.SUCCESS;
    }
    const branch = selection.value;

    displayBranchDetails(branch, await loadDiff(manager, branch));

    if (branch.isCurrent) {
      displayAlreadyOnBranch();
      return ExitCode.SUCCESS;
    }

    displayCheckoutCommand(branch);

    if (!options.switch) {
      const confirmation = await confirmCheckout(branch.name);
      if (confirmation.status === 'cancelled') {
        displayCancelledByUser();
        return ExitCode.SUCCESS;
      }
      if (!confirmation.value) {
        displaySwitchCancelled();
        return ExitCode.SUCCESS;
      }
    }

    return await switchTo(manager, branch);
  } catch (error) {
    return reportFailure(error);
  }
};

const loadBranches = async (
  manager: BranchManager,
  includeRemote: boolean
): Promise<BranchRecord[]> => {
  spinner.start({ text: 'Reading branches...' });
  try {
    const branches = await manager.listBranches({ includeRemote });
    logger.debug(`Found ${branches.length} branches in ${manager.workingDirectory()}`);
    return branches;
  } finally {
    spinner.stop();
  }
};

/**
 * A failed diff is shown as an error and replaced by an empty diff.
 */
const loadDiff = async (manager: BranchManager, branch: BranchRecord): Promise<string> => {
  try {
    return await manager.lastCommitDiff(branch.name);
  } catch (error) {
    if (!(error instanceof OperationFailedException)) throw error;
    displayBranchError(`Could not get diff: ${error.message}`);
    return '';
  }
};

const switchTo = async (manager: BranchManager, branch: BranchRecord): Promise<ExitCode> => {
  try {
    await manager.checkout(branch.name);
  } catch (error) {
    if (!(error instanceof OperationFailedException)) throw error;
    displayBranchError(`Failed to switch branch: ${error.message}`);
    return ExitCode.FAILURE;
  }

  displaySuccess(`Successfully switched to branch: ${branch.name}`);
  return ExitCode.SUCCESS;
};

const reportBranchException = (error: BranchException): ExitCode => {
  switch (error.kind) {
    case 'repository-not-found':
      displayRepositoryNotFound(error);
      return ExitCode.FAILURE;
    case 'no-branches-found':
      displayBranchError(error.message);
      return ExitCode.FAILURE;
    case 'operation-failed':
      displayBranchError(`Git operation failed: ${error.message}`);
      return ExitCode.FAILURE;
    default:
      return assertNever(error);
  }
};

const reportFailure = (error: unknown): ExitCode => {
  if (isBranchException(error)) {
    return reportBranchException(error);
  }

  const unexpected = error instanceof Error ? error : new Error(String(error));
  logger.debug(unexpected.stack ?? unexpected.message);
  displayError(unexpected);
  return ExitCode.FAILURE;
};
