import { GitRepository } from '@/core/repo';
import { OperationFailedException } from '@/core/exceptions';
import { logger } from '@/utils';
import { BranchRefService, remoteOf } from './branch-ref';

export class BranchCheckout {
  constructor(
    private repository: GitRepository,
    private refService: BranchRefService
  ) {}

  /**
   * Switch to a branch.
   *
   * A remote-tracking name such as `origin/feature` switches to the local `feature`,
   * creating it to track the remote ref when it does not exist yet. Remote-tracking names
   * are recognised by their ref, so refs of a remote removed from the config still count. git refuses the
   * switch and leaves the working tree alone when local changes would be overwritten.
   */
  public async checkout(branchName: string): Promise<void> {
    const localBranches = await this.refService.localBranchNames();
    const remote = localBranches.includes(branchName)
      ? undefined
      : await this.remoteFor(branchName);

    try {
      if (!remote) {
        logger.debug(`Switching to local branch ${branchName}`);
        await this.repository.git.checkout(branchName);
        return;
      }

      const localName = branchName.slice(remote.length + 1);
      if (localBranches.includes(localName)) {
        logger.debug(`Reusing local branch ${localName} for ${branchName}`);
        await this.repository.git.checkout(localName);
      } else {
        logger.debug(`Creating ${localName} to track ${branchName}`);
        await this.repository.git.checkout(['--track', '-b', localName, branchName]);
      }
    } catch (error) {
      throw OperationFailedException.wrap('checkout', error, `Failed to checkout ${branchName}`);
    }
  }

  private async remoteFor(branchName: string): Promise<string | undefined> {
    if (!(await this.refService.hasRemoteRef(branchName))) return undefined;
    return remoteOf(branchName, await this.refService.remoteNames());
  }
}
