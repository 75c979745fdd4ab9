import type { BranchSummary } from 'simple-git';
import { GitRepository } from '@/core/repo';
import { OperationFailedException } from '@/core/exceptions';
import { DETACHED_HEAD } from '../types';

/**
 * Reads HEAD, local branch names and configured remotes.
 */
export class BranchRefService {
  constructor(private repository: GitRepository) {}

  /**
   * Name of the checked-out branch, or {@link DETACHED_HEAD} when HEAD points at a commit.
   */
  public async currentBranchName(): Promise<string> {
    let summary: BranchSummary;
    try {
      summary = await this.repository.git.branchLocal();
    } catch (error) {
      throw OperationFailedException.wrap('currentBranch', error, 'Failed to get current branch');
    }

    if (summary.detached) return DETACHED_HEAD;
    if (!summary.current) {
      throw new OperationFailedException(
        'currentBranch',
        'Failed to get current branch: HEAD is neither a branch nor a commit'
      );
    }
    return summary.current;
  }

  public async localBranchNames(): Promise<string[]> {
    try {
      const summary = await this.repository.git.branchLocal();
      return summary.all;
    } catch (error) {
      throw OperationFailedException.wrap('listLocalBranches', error, 'Failed to list local branches');
    }
  }

  /**
   * Whether `refs/remotes/<name>` exists.
   */
  public async hasRemoteRef(name: string): Promise<boolean> {
    const ref = `refs/remotes/${name}`;
    try {
      const output = await this.repository.git.raw(['for-each-ref', '--format=%(refname)', ref]);
      return output.split('\n').some((line) => line.trim() === ref);
    } catch (error) {
      throw OperationFailedException.wrap('readRemoteRef', error, `Failed to read ${ref}`);
    }
  }

  public async remoteNames(): Promise<string[]> {
    try {
      const remotes = await this.repository.git.getRemotes();
      return remotes.map((remote) => remote.name);
    } catch (error) {
      throw OperationFailedException.wrap('listRemotes', error, 'Failed to list remotes');
    }
  }
}

/**
 * The remote a ref name belongs to, picking the longest matching remote name so that
 * "upstream/x" is not claimed by a remote called "up".
 */
export const matchRemote = (refName: string, remotes: readonly string[]): string | undefined => {
  return remotes
    .filter((remote) => refName.length > remote.length + 1 && refName.startsWith(`${remote}/`))
    .reduce<string | undefined>(
      (best, remote) => (best === undefined || remote.length > best.length ? remote : best),
      undefined
    );
};

/**
 * Remote of a remote-tracking name: the configured remote it belongs to, otherwise its first
 * path segment, which covers refs left behind by a remote that is no longer configured.
 */
export const remoteOf = (refName: string, remotes: readonly string[]): string | undefined => {
  const configured = matchRemote(refName, remotes);
  if (configured) return configured;

  const slash = refName.indexOf('/');
  return slash > 0 && slash < refName.length - 1 ? refName.slice(0, slash) : undefined;
};
