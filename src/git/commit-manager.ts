import { SyncError } from '../core/errors.js';
import type { GitRunner } from './runner.js';

export class CommitManager {
  constructor(private readonly runner: GitRunner) {}

  async stage(path: string): Promise<void> {
    await this.runner.run(['add', '--', path]);
  }

  /** `git diff --cached --quiet` exits 1 when something is staged. */
  async hasStagedChanges(): Promise<boolean> {
    try {
      await this.runner.run(['diff', '--cached', '--quiet']);
      return false;
    } catch (err) {
      if (err instanceof SyncError && err.code === 'COMMAND_FAILED') return true;
      throw err;
    }
  }

  async commit(message: string): Promise<void> {
    await this.runner.run(['commit', '-m', message]);
  }
}
