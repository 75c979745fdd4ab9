import { exploreBranches } from '../../../commands/branches/branches.handler';
import * as branchesDisplay from '../../../commands/branches/branches.display';
import * as branchesPrompt from '../../../commands/branches/branches.prompt';
import { BranchManager, createBranchRecord } from '../../../core/branch';
import {
  NoBranchesFoundException,
  OperationFailedException,
  RepositoryNotFoundException,
} from '../../../core/exceptions';
import { spinner } from '../../../utils';
import * as cliDisplay from '../../../utils/cli';

jest.mock('../../../commands/branches/branches.display');
jest.mock('../../../commands/branches/branches.prompt');
jest.mock('../../../utils/cli');

const mockedDisplay = jest.mocked(branchesDisplay);
const mockedPrompt = jest.mocked(branchesPrompt);
const mockedCliDisplay = jest.mocked(cliDisplay);

const main = createBranchRecord({
  name: 'main',
  sha: 'a1b2c3d4e5f60718293a4b5c6d7e8f9012345678',
  committedAt: new Date('2024-02-01T10:00:00Z'),
  utcOffset: '+00:00',
  summary: 'Release 2.0',
  isCurrent: true,
  isRemote: false,
});

const feature = createBranchRecord({
  name: 'feature/x',
  sha: 'f00dfeed0123456789abcdef0123456789abcdef',
  committedAt: new Date('2024-01-01T09:30:00Z'),
  utcOffset: '+00:00',
  summary: 'Add feature X',
  isCurrent: false,
  isRemote: false,
});

const PATCH = 'diff --git a/x b/x\n+new\n';

describe('exploreBranches', () => {
  let manager: {
    workingDirectory: jest.Mock;
    listBranches: jest.Mock;
    lastCommitDiff: jest.Mock;
    checkout: jest.Mock;
  };
  let openSpy: jest.SpyInstance;

  beforeEach(() => {
    spinner.enabled = false;
    manager = {
      workingDirectory: jest.fn().mockReturnValue('/work/repo'),
      listBranches: jest.fn().mockResolvedValue([main, feature]),
      lastCommitDiff: jest.fn().mockResolvedValue(PATCH),
      checkout: jest.fn().mockResolvedValue(undefined),
    };
    openSpy = jest
      .spyOn(BranchManager, 'open')
      .mockResolvedValue(manager as unknown as BranchManager);

    mockedPrompt.selectBranch.mockResolvedValue({ status: 'answered', value: feature });
    mockedPrompt.confirmCheckout.mockResolvedValue({ status: 'answered', value: true });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    jest.clearAllMocks();
  });

  test('opens the repository at the requested path', async () => {
    await exploreBranches({ path: '/work/repo', remote: true });

    expect(openSpy).toHaveBeenCalledWith('/work/repo');
    expect(manager.listBranches).toHaveBeenCalledWith({ includeRemote: true });
  });

  test('shows, confirms and switches to the selected branch', async () => {
    const exitCode = await exploreBranches({});

    expect(exitCode).toBe(0);
    expect(mockedDisplay.displayBranchTable).toHaveBeenCalledWith([main, feature]);
    expect(manager.lastCommitDiff).toHaveBeenCalledWith('feature/x');
    expect(mockedDisplay.displayBranchDetails).toHaveBeenCalledWith(feature, PATCH);
    expect(mockedDisplay.displayCheckoutCommand).toHaveBeenCalledWith(feature);
    expect(mockedPrompt.confirmCheckout).toHaveBeenCalledWith('feature/x');
    expect(manager.checkout).toHaveBeenCalledWith('feature/x');
    expect(mockedDisplay.displaySuccess).toHaveBeenCalledWith(
      'Successfully switched to branch: feature/x'
    );
  });

  test('exits with 1 and guidance outside a repository', async () => {
    const error = new RepositoryNotFoundException('/tmp/plain');
    openSpy.mockRejectedValue(error);

    const exitCode = await exploreBranches({ path: '/tmp/plain' });

    expect(exitCode).toBe(1);
    expect(mockedDisplay.displayRepositoryNotFound).toHaveBeenCalledWith(error);
    expect(manager.listBranches).not.toHaveBeenCalled();
  });

  test('exits with 1 when there are no branches', async () => {
    manager.listBranches.mockRejectedValue(new NoBranchesFoundException());

    const exitCode = await exploreBranches({});

    expect(exitCode).toBe(1);
    expect(mockedDisplay.displayBranchError).toHaveBeenCalledWith('No branches found in repository');
    expect(mockedDisplay.displayBranchTable).not.toHaveBeenCalled();
  });

  test('exits with 1 when listing fails inside git', async () => {
    manager.listBranches.mockRejectedValue(
      new OperationFailedException('listBranches', 'Failed to fetch branches: fatal: bad object')
    );

    const exitCode = await exploreBranches({});

    expect(exitCode).toBe(1);
    expect(mockedDisplay.displayBranchError).toHaveBeenCalledWith(
      'Git operation failed: Failed to fetch branches: fatal: bad object'
    );
  });

  test('exits silently with 0 when Cancel is chosen', async () => {
    mockedPrompt.selectBranch.mockResolvedValue({ status: 'cancelled', reason: 'choice' });

    const exitCode = await exploreBranches({});

    expect(exitCode).toBe(0);
    expect(manager.lastCommitDiff).not.toHaveBeenCalled();
    expect(mockedDisplay.displayBranchDetails).not.toHaveBeenCalled();
    expect(mockedDisplay.displayCancelledByUser).not.toHaveBeenCalled();
  });

  test('reports an interrupt during selection and exits with 0', async () => {
    mockedPrompt.selectBranch.mockResolvedValue({ status: 'cancelled', reason: 'interrupt' });

    const exitCode = await exploreBranches({});

    expect(exitCode).toBe(0);
    expect(mockedDisplay.displayCancelledByUser).toHaveBeenCalledTimes(1);
    expect(manager.lastCommitDiff).not.toHaveBeenCalled();
  });

  test('carries on with an empty diff when the diff fails', async () => {
    manager.lastCommitDiff.mockRejectedValue(
      new OperationFailedException('diff', 'Failed to get diff for feature/x: boom')
    );

    const exitCode = await exploreBranches({});

    expect(exitCode).toBe(0);
    expect(mockedDisplay.displayBranchError).toHaveBeenCalledWith(
      'Could not get diff: Failed to get diff for feature/x: boom'
    );
    expect(mockedDisplay.displayBranchDetails).toHaveBeenCalledWith(feature, '');
    expect(manager.checkout).toHaveBeenCalledWith('feature/x');
  });

  test('offers no checkout for the current branch', async () => {
    mockedPrompt.selectBranch.mockResolvedValue({ status: 'answered', value: main });

    const exitCode = await exploreBranches({});

    expect(exitCode).toBe(0);
    expect(mockedDisplay.displayAlreadyOnBranch).toHaveBeenCalledTimes(1);
    expect(mockedDisplay.displayCheckoutCommand).not.toHaveBeenCalled();
    expect(mockedPrompt.confirmCheckout).not.toHaveBeenCalled();
    expect(manager.checkout).not.toHaveBeenCalled();
  });

  test('switches without asking when --switch is given', async () => {
    const exitCode = await exploreBranches({ switch: true });

    expect(exitCode).toBe(0);
    expect(mockedPrompt.confirmCheckout).not.toHaveBeenCalled();
    expect(manager.checkout).toHaveBeenCalledWith('feature/x');
  });

  test('leaves the branch alone when the confirmation is declined', async () => {
    mockedPrompt.confirmCheckout.mockResolvedValue({ status: 'answered', value: false });

    const exitCode = await exploreBranches({});

    expect(exitCode).toBe(0);
    expect(mockedDisplay.displaySwitchCancelled).toHaveBeenCalledTimes(1);
    expect(manager.checkout).not.toHaveBeenCalled();
  });

  test('reports a cancelled confirmation and exits with 0', async () => {
    mockedPrompt.confirmCheckout.mockResolvedValue({ status: 'cancelled', reason: 'interrupt' });

    const exitCode = await exploreBranches({});

    expect(exitCode).toBe(0);
    expect(mockedDisplay.displayCancelledByUser).toHaveBeenCalledTimes(1);
    expect(manager.checkout).not.toHaveBeenCalled();
  });

  test('exits with 1 when the checkout fails', async () => {
    manager.checkout.mockRejectedValue(
      new OperationFailedException('checkout', 'Failed to checkout feature/x: conflict')
    );

    const exitCode = await exploreBranches({});

    expect(exitCode).toBe(1);
    expect(mockedDisplay.displayBranchError).toHaveBeenCalledWith(
      'Failed to switch branch: Failed to checkout feature/x: conflict'
    );
    expect(mockedDisplay.displaySuccess).not.toHaveBeenCalled();
  });

  test('reports unexpected failures generically', async () => {
    const error = new TypeError('boom');
    manager.listBranches.mockRejectedValue(error);

    const exitCode = await exploreBranches({});

    expect(exitCode).toBe(1);
    expect(mockedCliDisplay.displayError).toHaveBeenCalledWith(error);
  });
});
