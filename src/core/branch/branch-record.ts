import { BranchRecord } from './types';

export const SHORT_HASH_LENGTH = 7;

const OFFSET_PATTERN = /^([+-])(\d{2}):?(\d{2})$/;

export const createBranchRecord = (fields: BranchRecord): BranchRecord => {
  return Object.freeze({ ...fields });
};

export const shortHash = (record: Pick<BranchRecord, 'sha'>): string =>
  record.sha.substring(0, SHORT_HASH_LENGTH);

export const displayName = (record: Pick<BranchRecord, 'name' | 'isCurrent'>): string =>
  `${record.isCurrent ? '* ' : '  '}${record.name}`;

/**
 * Minutes east of UTC for an offset like "+05:30", "-0800" or "Z".
 */
export const parseUtcOffset = (offset: string): number => {
  if (offset === 'Z') return 0;
  const match = OFFSET_PATTERN.exec(offset);
  if (!match) {
    throw new Error(`Invalid UTC offset: ${offset}`);
  }
  const [, sign, hours, minutes] = match;
  const total = Number(hours) * 60 + Number(minutes);
  return sign === '-' ? -total : total;
};

const pad = (value: number): string => value.toString().padStart(2, '0');

/**
 * "YYYY-MM-DD HH:mm:ss" in the committer's own timezone, independent of the machine's.
 */
export const formatCommitDate = (record: Pick<BranchRecord, 'committedAt' | 'utcOffset'>): string => {
  const shifted = new Date(record.committedAt.getTime() + parseUtcOffset(record.utcOffset) * 60_000);
  const date = `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
  const time = `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}`;
  return `${date} ${time}`;
};

/**
 * Name of the local branch a record checks out as: "origin/feature/x" becomes "feature/x".
 */
export const localBranchName = (record: Pick<BranchRecord, 'name' | 'remote'>): string => {
  if (record.remote && record.name.startsWith(`${record.remote}/`)) {
    return record.name.slice(record.remote.length + 1);
  }
  return record.name;
};

/**
 * Newest first. Array#sort is stable, so records with equal timestamps keep their order.
 */
export const sortByRecency = (records: readonly BranchRecord[]): BranchRecord[] =>
  [...records].sort((a, b) => b.committedAt.getTime() - a.committedAt.getTime());

export const truncate = (text: string, width: number): string =>
  text.length > width ? `${text.substring(0, width)}...` : text;
