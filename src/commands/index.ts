import { createBranchesCommand } from './branches/branches';

export { createBranchesCommand };
