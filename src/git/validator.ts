import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { SyncError } from '../core/errors.js';
import type { GitRunner } from './runner.js';

/**
 * Precondition checks run before any workflow mutates the repository.
 */
export class RepositoryValidator {
  constructor(private readonly runner: GitRunner) {}

  /** Both the `.git` entry on disk and git's own detection must agree. */
  async validateGitRepository(path: string = this.runner.workingDir): Promise<void> {
    if (!existsSync(join(path, '.git'))) {
      throw SyncError.notGitRepository();
    }
    const recognised = await this.succeeds(['rev-parse', '--git-dir']);
    if (!recognised) throw SyncError.notGitRepository();
  }

  async validateHasCommits(): Promise<void> {
    const resolved = await this.succeeds(['rev-parse', '--verify', 'HEAD']);
    if (!resolved) throw SyncError.noCommits();
  }

  async checkExistingRemote(name: string): Promise<boolean> {
    return this.succeeds(['remote', 'get-url', name]);
  }

  async checkExistingBranch(name: string): Promise<boolean> {
    return this.succeeds(['show-ref', '--verify', '--quiet', `refs/heads/${name}`]);
  }

  /** Untracked files do not count: checkout and subtree merges leave them alone. */
  async isWorkingTreeClean(): Promise<boolean> {
    const status = await this.runner.run(['status', '--porcelain', '--untracked-files=no']);
    return status.trim().length === 0;
  }

  async validateCleanWorkingTree(): Promise<void> {
    if (!(await this.isWorkingTreeClean())) throw SyncError.dirtyWorkingTree();
  }

  /**
   * True when the command exits zero, false when git ran and said no.
   * Failing to run git at all (missing binary, timeout) still throws.
   */
  private async succeeds(args: string[]): Promise<boolean> {
    try {
      await this.runner.run(args);
      return true;
    } catch (err) {
      if (err instanceof SyncError && err.code === 'COMMAND_FAILED') return false;
      throw err;
    }
  }
}
