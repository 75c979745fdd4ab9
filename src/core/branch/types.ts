/**
 * One branch as listed to the user. Built fresh from live repository state on every
 * listing and frozen once built.
 */
export type BranchRecord = Readonly<{
  name: string;
  sha: string;
  committedAt: Date;
  utcOffset: string; // committer timezone, "+HH:MM" or "-HH:MM"
  summary: string;
  isCurrent: boolean;
  isRemote: boolean;
  remote?: string; // only set for remote-tracking refs
}>;

export type ListBranchesOptions = {
  includeRemote?: boolean;
};

/**
 * Name shown when HEAD points straight at a commit. Display-only.
 */
export const DETACHED_HEAD = 'HEAD (detached)';

/**
 * Returned by the diff lookup when the tip commit changes nothing.
 */
export const NO_CHANGES = 'No changes in this commit';
