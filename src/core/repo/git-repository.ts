import path from 'path';
import simpleGit, { SimpleGit } from 'simple-git';
import { logger } from '@/utils';
import { OperationFailedException, RepositoryNotFoundException } from '@/core/exceptions';

/**
 * Handle on a git working tree, backed by the git executable through simple-git.
 *
 * Opening searches upwards from the given directory the same way git does, and roots
 * the handle at the working tree's top level. Every other git call in the project goes
 * through `git` on an instance of this class.
 */
export class GitRepository {
  private constructor(
    private readonly _workingDirectory: string,
    readonly git: SimpleGit
  ) {}

  /**
   * Open the repository enclosing `searchPath` (the current directory by default).
   */
  static async open(searchPath: string = process.cwd()): Promise<GitRepository> {
    const resolved = path.resolve(searchPath);

    let probe: SimpleGit;
    try {
      probe = simpleGit({ baseDir: resolved });
    } catch (error) {
      // simple-git refuses to start in a directory that does not exist
      throw new RepositoryNotFoundException(resolved, error);
    }

    let insideWorkTree: boolean;
    try {
      insideWorkTree = await probe.checkIsRepo();
    } catch (error) {
      throw OperationFailedException.wrap('open', error, `Unable to inspect ${resolved}`);
    }
    if (!insideWorkTree) {
      throw new RepositoryNotFoundException(resolved);
    }

    let topLevel: string;
    try {
      topLevel = (await probe.revparse(['--show-toplevel'])).trim();
    } catch (error) {
      throw OperationFailedException.wrap('open', error, `Unable to locate the top level of ${resolved}`);
    }

    logger.debug(`Opened repository at ${topLevel}`);
    return new GitRepository(topLevel, simpleGit({ baseDir: topLevel }));
  }

  /**
   * Wrap an existing simple-git instance, e.g. one already pointed at a working tree.
   */
  static fromGit(workingDirectory: string, git: SimpleGit): GitRepository {
    return new GitRepository(workingDirectory, git);
  }

  workingDirectory(): string {
    return this._workingDirectory;
  }
}
