import { BranchManager } from './branch-manager';
import type { BranchRecord, ListBranchesOptions } from './types';
import { DETACHED_HEAD, NO_CHANGES } from './types';
import {
  createBranchRecord,
  shortHash,
  displayName,
  formatCommitDate,
  localBranchName,
  sortByRecency,
  truncate,
} from './branch-record';

export {
  BranchManager,
  BranchRecord,
  ListBranchesOptions,
  DETACHED_HEAD,
  NO_CHANGES,
  createBranchRecord,
  shortHash,
  displayName,
  formatCommitDate,
  localBranchName,
  sortByRecency,
  truncate,
};
