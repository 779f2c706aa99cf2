import { SyncError } from '../core/errors.js';
import type { Remote } from '../config/schema.js';
import type { GitRunner, RunOptions } from './runner.js';
import type { RepositoryValidator } from './validator.js';

export class RemoteManager {
  constructor(
    private readonly runner: GitRunner,
    private readonly validator: RepositoryValidator,
  ) {}

  /** Add a remote and read its URL back, so a silent no-op cannot pass for success. */
  async addRemote(name: string, url: string): Promise<void> {
    await this.runner.run(['remote', 'add', name, url]);
    if (!(await this.validator.checkExistingRemote(name))) {
      throw new SyncError({
        category: 'git-operation',
        code: 'COMMAND_FAILED',
        message: `Failed to add remote '${name}' with URL '${url}'`,
        suggestion: 'Check that the remote name is valid and the URL is accessible',
      });
    }
  }

  async removeRemote(name: string): Promise<void> {
    if (!(await this.validator.checkExistingRemote(name))) {
      throw SyncError.remoteMissing(name, "Use 'git remote -v' to list existing remotes");
    }
    await this.runner.run(['remote', 'remove', name]);
  }

  async fetchRemote(name: string, options?: RunOptions): Promise<void> {
    if (!(await this.validator.checkExistingRemote(name))) {
      throw SyncError.remoteMissing(name, "Add the remote first using 'git remote add'");
    }
    await this.runner.run(['fetch', name], options);
  }

  async getRemoteUrl(name: string): Promise<string | undefined> {
    const remote = (await this.listRemotes()).find((r) => r.name === name);
    return remote?.url;
  }

  /** `git remote -v` prints a fetch and a push line per remote; keep the first. */
  async listRemotes(): Promise<Remote[]> {
    const output = await this.runner.run(['remote', '-v']);
    const remotes: Remote[] = [];
    const seen = new Set<string>();

    for (const line of output.split('\n')) {
      const [name, url] = line.trim().split(/\s+/);
      if (!name || !url || seen.has(name)) continue;
      seen.add(name);
      remotes.push({ name, url });
    }
    return remotes;
  }
}
