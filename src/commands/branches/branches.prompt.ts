import chalk from 'chalk';
import inquirer from 'inquirer';
import { BranchRecord, displayName, shortHash, truncate } from '@/core/branch';
import { ConfigManager, onInterrupt } from '@/utils';

/**
 * Result of an interactive prompt. Cancelling is an ordinary outcome, not an error: either
 * the user picked the Cancel entry or interrupted while the prompt was open.
 */
export type PromptOutcome<T> =
  | { status: 'answered'; value: T }
  | { status: 'cancelled'; reason: CancelReason };

export type CancelReason = 'choice' | 'interrupt';

const CANCEL_CHOICE = '__cancel__';

/**
 * Run a prompt, resolving to `cancelled` if the user interrupts while it is open.
 */
export const runPrompt = async <T>(ask: () => Promise<T>): Promise<PromptOutcome<T>> => {
  let release: () => void = () => undefined;
  const interrupted = new Promise<PromptOutcome<T>>((resolve) => {
    release = onInterrupt(() => resolve({ status: 'cancelled', reason: 'interrupt' }));
  });

  try {
    const answered = ask().then((value): PromptOutcome<T> => ({ status: 'answered', value }));
    return await Promise.race([answered, interrupted]);
  } finally {
    release();
  }
};

export const formatBranchChoice = (branch: BranchRecord, messageWidth: number): string =>
  `${displayName(branch)} (${shortHash(branch)}) - ${truncate(branch.summary, messageWidth)}`;

export const selectBranch = async (
  branches: readonly BranchRecord[]
): Promise<PromptOutcome<BranchRecord>> => {
  const { choiceMessageWidth, pageSize } = ConfigManager.getInstance().get('display');

  const outcome = await runPrompt(() =>
    inquirer.prompt<{ branch: BranchRecord | typeof CANCEL_CHOICE }>([
      {
        type: 'list',
        name: 'branch',
        message: 'Select a branch to view details:',
        pageSize,
        choices: [
          ...branches.map((branch) => ({
            name: formatBranchChoice(branch, choiceMessageWidth),
            value: branch,
            short: branch.name,
          })),
          new inquirer.Separator(),
          { name: chalk.dim('Cancel'), value: CANCEL_CHOICE, short: 'Cancel' },
        ],
      },
    ])
  );

  if (outcome.status === 'cancelled') return outcome;
  if (outcome.value.branch === CANCEL_CHOICE) {
    return { status: 'cancelled', reason: 'choice' };
  }
  return { status: 'answered', value: outcome.value.branch };
};

export const confirmCheckout = async (branchName: string): Promise<PromptOutcome<boolean>> => {
  const outcome = await runPrompt(() =>
    inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message: `Do you want to switch to '${branchName}' now?`,
        default: false,
      },
    ])
  );

  if (outcome.status === 'cancelled') return outcome;
  return { status: 'answered', value: outcome.value.confirmed };
};
