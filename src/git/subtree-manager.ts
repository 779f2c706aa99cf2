import { existsSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { SyncError } from '../core/errors.js';
import type { GitRunner } from './runner.js';

/**
 * `git subtree` operations on one directory of the working tree.
 */
export class SubtreeManager {
  constructor(private readonly runner: GitRunner) {}

  /** Extract the history of `prefix` on the checked-out branch into `branch`. */
  async splitSubtree(prefix: string, branch: string): Promise<void> {
    await this.runner.run(['subtree', 'split', `--prefix=${prefix}`, '-b', branch]);
  }

  async addSubtree(prefix: string, branch: string, squash: boolean): Promise<void> {
    const args = ['subtree', 'add', `--prefix=${prefix}`];
    if (squash) args.push('--squash');
    args.push(branch);
    await this.runner.run(args);
  }

  /** Merge the latest state of `branch` into an existing `prefix` as one squashed commit. */
  async updateSubtree(prefix: string, branch: string): Promise<void> {
    await this.runner.run(['subtree', 'merge', `--prefix=${prefix}`, '--squash', branch]);
  }

  /**
   * git has no `subtree remove`: delete the directory and stage the deletion.
   * The caller commits. Does nothing when `prefix` is absent.
   */
  async removeSubtree(prefix: string): Promise<void> {
    const path = join(this.runner.workingDir, prefix);
    if (!existsSync(path)) return;

    try {
      await rm(path, { recursive: true, force: true });
    } catch (err) {
      throw SyncError.filesystem(
        `Failed to remove subtree directory '${prefix}'`,
        err,
        'Check file permissions and ensure the directory is not in use',
      );
    }
    await this.runner.run(['rm', '-r', '-q', '--cached', '--ignore-unmatch', '--', prefix]);
  }
}
