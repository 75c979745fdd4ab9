import { GitRepository } from '@/core/repo';
import { OperationFailedException } from '@/core/exceptions';
import { logger } from '@/utils';
import { NO_CHANGES } from '../types';

const PATCH_FLAGS = ['--no-color', '--no-ext-diff'];

/**
 * Patch of the tip commit of a branch.
 */
export class BranchDiffService {
  constructor(private repository: GitRepository) {}

  /**
   * Diff of the branch's tip against its first parent, or against the empty tree when
   * the tip is a root commit. Returns {@link NO_CHANGES} for an empty patch.
   */
  public async lastCommitDiff(branchName: string): Promise<string> {
    const sha = await this.resolveTip(branchName);

    let patch: string;
    try {
      const parent = await this.firstParent(sha);
      patch = parent
        ? await this.repository.git.diff([...PATCH_FLAGS, parent, sha])
        : await this.repository.git.raw([
            'diff-tree',
            '--patch',
            '--root',
            '--no-commit-id',
            ...PATCH_FLAGS,
            sha,
          ]);
    } catch (error) {
      throw OperationFailedException.wrap('diff', error, `Failed to get diff for ${branchName}`);
    }

    return patch.trim().length > 0 ? patch : NO_CHANGES;
  }

  /**
   * Local heads win over remote-tracking refs, which win over anything else git accepts.
   */
  private async resolveTip(branchName: string): Promise<string> {
    const candidates = [`refs/heads/${branchName}`, `refs/remotes/${branchName}`, branchName];

    for (const candidate of candidates) {
      try {
        const sha = (await this.repository.git.revparse(['--verify', `${candidate}^{commit}`])).trim();
        if (sha) return sha;
      } catch (error) {
        logger.debug(`${candidate} does not name a commit`, error instanceof Error ? error.message : error);
      }
    }

    throw new OperationFailedException(
      'diff',
      `Failed to get diff for ${branchName}: not a branch or commit`
    );
  }

  private async firstParent(sha: string): Promise<string | undefined> {
    const line = await this.repository.git.raw(['rev-list', '--parents', '-n', '1', sha]);
    const [, parent] = line.trim().split(/\s+/);
    return parent;
  }
}
