import { SyncError } from '../core/errors.js';
import type { Branch } from '../config/schema.js';
import type { GitRunner } from './runner.js';
import type { RepositoryValidator } from './validator.js';

export class BranchManager {
  constructor(
    private readonly runner: GitRunner,
    private readonly validator: RepositoryValidator,
  ) {}

  async createBranch(name: string, source: string): Promise<void> {
    if (await this.validator.checkExistingBranch(name)) {
      throw new SyncError({
        category: 'git-operation',
        code: 'BRANCH_EXISTS',
        message: `Branch '${name}' already exists`,
        suggestion: 'Delete the branch first or pick another name',
      });
    }
    await this.runner.run(['branch', name, source]);
  }

  /** Point `name` at `source`, creating or rewriting the ref. */
  async forceCreateBranch(name: string, source: string): Promise<void> {
    await this.runner.run(['branch', '-f', name, source]);
  }

  async checkoutBranch(name: string): Promise<void> {
    await this.runner.run(['checkout', name]);
  }

  async deleteBranch(name: string): Promise<void> {
    await this.runner.run(['branch', '-D', name]);
  }

  /** Move the checked-out branch and the working tree to `ref`, discarding local drift. */
  async resetHard(ref: string): Promise<void> {
    await this.runner.run(['reset', '--hard', ref]);
  }

  async currentBranch(): Promise<string> {
    const current = (await this.listBranches()).find((b) => b.isCurrent);
    if (!current || current.name.startsWith('(')) throw SyncError.detachedHead();
    return current.name;
  }

  async listBranches(): Promise<Branch[]> {
    const output = await this.runner.run(['branch', '-vv', '--no-color']);
    return parseBranchListing(output);
  }
}

/**
 * Parse `git branch -vv`:
 *
 *   * main        1a2b3c4 [origin/main: ahead 1] Fix build
 *     claude-main 5d6e7f8 Sync upstream
 *   + feature     9a8b7c6 (checked out in another worktree)
 */
export function parseBranchListing(output: string): Branch[] {
  const branches: Branch[] = [];

  for (const raw of output.split('\n')) {
    if (raw.trim().length === 0) continue;
    const isCurrent = raw.startsWith('*');
    const line = raw.replace(/^[*+]?\s*/, '');

    // "(HEAD detached at 1a2b3c4) 1a2b3c4 msg" keeps its parenthesised name whole.
    const detached = /^(\([^)]*\))/.exec(line);
    const name = detached ? detached[1] : line.split(/\s+/)[0];
    if (!name) continue;

    const rest = line.slice(name.length);
    const tracking = /^\s+\S+\s+\[([^\]:]+)(?::[^\]]*)?\]/.exec(rest);
    branches.push({
      name,
      isCurrent,
      ...(tracking ? { upstream: tracking[1] } : {}),
    });
  }
  return branches;
}
