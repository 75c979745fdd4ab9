import { GitRepository } from './git-repository';

export { GitRepository };
