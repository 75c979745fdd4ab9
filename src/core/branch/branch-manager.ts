import { GitRepository } from '@/core/repo';
import { BranchRecord, ListBranchesOptions } from './types';
import { BranchCheckout, BranchDiffService, BranchInfoService, BranchRefService } from './services';

/**
 * BranchManager is the single entry point for everything the CLI asks of git:
 * - Current branch lookup (with detached HEAD detection)
 * - Branch listing, newest commit first
 * - The patch of a branch's last commit
 * - Switching branches, including remote-tracking ones
 */
export class BranchManager {
  private refService: BranchRefService;
  private infoService: BranchInfoService;
  private diffService: BranchDiffService;
  private checkoutService: BranchCheckout;

  constructor(private repository: GitRepository) {
    this.refService = new BranchRefService(repository);
    this.infoService = new BranchInfoService(repository, this.refService);
    this.diffService = new BranchDiffService(repository);
    this.checkoutService = new BranchCheckout(repository, this.refService);
  }

  /**
   * Open the repository enclosing `searchPath` and wrap it.
   */
  public static async open(searchPath?: string): Promise<BranchManager> {
    return new BranchManager(await GitRepository.open(searchPath));
  }

  public workingDirectory(): string {
    return this.repository.workingDirectory();
  }

  public async currentBranchName(): Promise<string> {
    return await this.refService.currentBranchName();
  }

  public async listBranches(options: ListBranchesOptions = {}): Promise<BranchRecord[]> {
    return await this.infoService.listBranches(options);
  }

  public async lastCommitDiff(branchName: string): Promise<string> {
    return await this.diffService.lastCommitDiff(branchName);
  }

  public async checkout(branchName: string): Promise<void> {
    await this.checkoutService.checkout(branchName);
  }
}
