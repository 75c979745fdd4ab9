import { GitRepository } from '@/core/repo';
import { NoBranchesFoundException, OperationFailedException } from '@/core/exceptions';
import { logger } from '@/utils';
import { createBranchRecord, sortByRecency } from '../branch-record';
import { BranchRecord, ListBranchesOptions } from '../types';
import { BranchRefService, remoteOf } from './branch-ref';

const FIELD_SEPARATOR = '\u0000';
const RECORD_SEPARATOR = '\u001e';

// The full message goes last; it may span lines, so records end in %1e rather than at a newline.
const REF_FORMAT =
  [
    '%(refname)',
    '%(symref)',
    '%(objecttype)',
    '%(objectname)',
    '%(committerdate:iso-strict)',
    '%(contents)',
  ].join('%00') + '%1e';

const LOCAL_PREFIX = 'refs/heads/';
const REMOTE_PREFIX = 'refs/remotes/';
const HASH_PATTERN = /^[0-9a-f]{40}([0-9a-f]{24})?$/;
const OFFSET_SUFFIX = /(Z|[+-]\d{2}:\d{2})$/;

const firstLine = (message: string): string => (message.trim().split('\n')[0] ?? '').trimEnd();

type BranchDraft = Omit<BranchRecord, 'isCurrent'>;

/**
 * Outcome of reading one `for-each-ref` record.
 */
export type RefParseResult =
  | { status: 'parsed'; branch: BranchDraft }
  | { status: 'ignored'; ref: string }
  | { status: 'unreadable'; ref: string; reason: string };

/**
 * Turn one record of `for-each-ref` output into a branch draft.
 *
 * Symbolic refs such as `origin/HEAD` are ignored. Refs whose metadata does not describe
 * a commit are reported as unreadable rather than thrown, so one broken ref never hides
 * the others.
 */
export const parseRefRecord = (record: string, remotes: readonly string[]): RefParseResult => {
  const [refName = '', symref = '', objectType, sha, committerDate, ...message] =
    record.split(FIELD_SEPARATOR);

  if (symref || refName.endsWith('/HEAD')) {
    return { status: 'ignored', ref: refName };
  }

  const isRemote = refName.startsWith(REMOTE_PREFIX);
  if (!isRemote && !refName.startsWith(LOCAL_PREFIX)) {
    return { status: 'unreadable', ref: refName, reason: 'not a branch ref' };
  }
  if (objectType !== 'commit') {
    return { status: 'unreadable', ref: refName, reason: `points at a ${objectType || 'missing'} object` };
  }
  if (!sha || !HASH_PATTERN.test(sha)) {
    return { status: 'unreadable', ref: refName, reason: `malformed object name "${sha ?? ''}"` };
  }

  const committedAt = new Date(committerDate ?? '');
  const offset = OFFSET_SUFFIX.exec(committerDate ?? '');
  if (Number.isNaN(committedAt.getTime()) || !offset || !offset[1]) {
    return { status: 'unreadable', ref: refName, reason: `malformed commit date "${committerDate ?? ''}"` };
  }

  const name = refName.slice(isRemote ? REMOTE_PREFIX.length : LOCAL_PREFIX.length);
  const remote = isRemote ? remoteOf(name, remotes) : undefined;

  return {
    status: 'parsed',
    branch: {
      name,
      sha,
      committedAt,
      utcOffset: offset[1],
      summary: firstLine(message.join(FIELD_SEPARATOR)),
      isRemote,
      ...(remote ? { remote } : {}),
    },
  };
};

export class BranchInfoService {
  constructor(
    private repository: GitRepository,
    private refService: BranchRefService
  ) {}

  /**
   * All branches, newest commit first.
   */
  public async listBranches(options: ListBranchesOptions = {}): Promise<BranchRecord[]> {
    const includeRemote = options.includeRemote ?? false;
    const drafts: BranchDraft[] = [];

    for (const result of await this.readRefs(includeRemote)) {
      switch (result.status) {
        case 'parsed':
          drafts.push(result.branch);
          break;
        case 'ignored':
          logger.debug(`Skipping symbolic ref ${result.ref}`);
          break;
        case 'unreadable':
          logger.debug(`Skipping ${result.ref}: ${result.reason}`);
          break;
      }
    }

    if (drafts.length === 0) {
      throw new NoBranchesFoundException();
    }

    const current = await this.refService.currentBranchName();
    const records = drafts.map((draft) =>
      createBranchRecord({ ...draft, isCurrent: !draft.isRemote && draft.name === current })
    );

    return sortByRecency(records);
  }

  private async readRefs(includeRemote: boolean): Promise<RefParseResult[]> {
    const namespaces = includeRemote ? ['refs/heads', 'refs/remotes'] : ['refs/heads'];
    const remotes = includeRemote ? await this.refService.remoteNames() : [];

    let output: string;
    try {
      output = await this.repository.git.raw([
        'for-each-ref',
        `--format=${REF_FORMAT}`,
        ...namespaces,
      ]);
    } catch (error) {
      throw OperationFailedException.wrap('listBranches', error, 'Failed to fetch branches');
    }

    return output
      .split(RECORD_SEPARATOR)
      .map((record) => record.replace(/^\n/, ''))
      .filter((record) => record.trim().length > 0)
      .map((record) => parseRefRecord(record, remotes));
  }
}
