import { BranchRefService, matchRemote, remoteOf } from './branch-ref';
import { BranchInfoService, parseRefRecord } from './branch-info';
import type { RefParseResult } from './branch-info';
import { BranchDiffService } from './branch-diff';
import { BranchCheckout } from './branch-checkout';

export {
  BranchRefService,
  matchRemote,
  remoteOf,
  BranchInfoService,
  parseRefRecord,
  RefParseResult,
  BranchDiffService,
  BranchCheckout,
};
