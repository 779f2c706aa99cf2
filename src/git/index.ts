import { BranchManager } from './branch-manager.js';
import { CommitManager } from './commit-manager.js';
import { RemoteManager } from './remote-manager.js';
import type { GitRunner } from './runner.js';
import { SubtreeManager } from './subtree-manager.js';
import { RepositoryValidator } from './validator.js';

export { SimpleGitRunner, type GitRunner, type RunOptions } from './runner.js';
export { RepositoryValidator } from './validator.js';
export { RemoteManager } from './remote-manager.js';
export { BranchManager, parseBranchListing } from './branch-manager.js';
export { SubtreeManager } from './subtree-manager.js';
export { CommitManager } from './commit-manager.js';

/** Every git primitive the workflows use, sharing one runner. */
export interface GitToolkit {
  runner: GitRunner;
  validator: RepositoryValidator;
  remotes: RemoteManager;
  branches: BranchManager;
  subtrees: SubtreeManager;
  commits: CommitManager;
}

export function createGitToolkit(runner: GitRunner): GitToolkit {
  const validator = new RepositoryValidator(runner);
  return {
    runner,
    validator,
    remotes: new RemoteManager(runner, validator),
    branches: new BranchManager(runner, validator),
    subtrees: new SubtreeManager(runner),
    commits: new CommitManager(runner),
  };
}
