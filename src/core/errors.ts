export type ErrorCategory = 'repository' | 'network' | 'git-operation' | 'filesystem';

export type SyncErrorCode =
  | 'NOT_A_REPOSITORY'
  | 'NO_COMMITS'
  | 'CANCELLED'
  | 'DETACHED_HEAD'
  | 'DIRTY_WORKING_TREE'
  | 'INVALID_SETTINGS'
  | 'INVALID_MANIFEST'
  | 'NETWORK'
  | 'COMMAND_FAILED'
  | 'GIT_UNAVAILABLE'
  | 'TIMEOUT'
  | 'REMOTE_MISSING'
  | 'REMOTE_CONFLICT'
  | 'BRANCH_EXISTS'
  | 'BRANCH_MISSING'
  | 'IO';

const EXIT_CODES: Record<ErrorCategory, number> = {
  repository: 1,
  network: 2,
  'git-operation': 3,
  filesystem: 4,
};

const CATEGORY_LABELS: Record<ErrorCategory, string> = {
  repository: 'Repository',
  network: 'Network',
  'git-operation': 'Git operation',
  filesystem: 'File system',
};

interface SyncErrorInit {
  category: ErrorCategory;
  code: SyncErrorCode;
  message: string;
  suggestion: string;
  command?: string;
  stderr?: string;
  cause?: unknown;
}

/**
 * The single error type of the tool. The category decides the process exit
 * code; the suggestion is shown in verbose mode only.
 */
export class SyncError extends Error {
  readonly category: ErrorCategory;
  readonly code: SyncErrorCode;
  readonly suggestion: string;
  readonly command?: string;
  readonly stderr?: string;

  constructor(init: SyncErrorInit) {
    super(init.message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = 'SyncError';
    this.category = init.category;
    this.code = init.code;
    this.suggestion = init.suggestion;
    this.command = init.command;
    this.stderr = init.stderr;
  }

  get exitCode(): number {
    return EXIT_CODES[this.category];
  }

  /** "Repository error: Current directory is not a git repository" */
  describe(): string {
    return `${CATEGORY_LABELS[this.category]} error: ${this.message}`;
  }

  // ─── Repository ───────────────────────────────────────────────────

  static notGitRepository(): SyncError {
    return new SyncError({
      category: 'repository',
      code: 'NOT_A_REPOSITORY',
      message: 'Current directory is not a git repository',
      suggestion: "Run this command from within a git repository or initialize one with 'git init'",
    });
  }

  static noCommits(): SyncError {
    return new SyncError({
      category: 'repository',
      code: 'NO_COMMITS',
      message: 'Git repository has no commits found',
      suggestion: 'Make at least one commit before running this command',
    });
  }

  static cancelled(): SyncError {
    return new SyncError({
      category: 'repository',
      code: 'CANCELLED',
      message: 'Operation cancelled by user',
      suggestion: 'Use --force to skip confirmation or back up the existing files first',
    });
  }

  static detachedHead(): SyncError {
    return new SyncError({
      category: 'repository',
      code: 'DETACHED_HEAD',
      message: 'HEAD is detached; cannot tell which branch should receive the devcontainer',
      suggestion: 'Check out a branch, or set base_branch in the settings file',
    });
  }

  static dirtyWorkingTree(): SyncError {
    return new SyncError({
      category: 'repository',
      code: 'DIRTY_WORKING_TREE',
      message: 'Working tree has uncommitted changes',
      suggestion: 'Commit or stash your changes before syncing the devcontainer',
    });
  }

  static invalidSettings(path: string, detail: string): SyncError {
    return new SyncError({
      category: 'repository',
      code: 'INVALID_SETTINGS',
      message: `Invalid settings in ${path}: ${detail}`,
      suggestion: 'Fix or remove the settings file',
    });
  }

  static invalidManifest(path: string, cause: unknown): SyncError {
    return new SyncError({
      category: 'repository',
      code: 'INVALID_MANIFEST',
      message: `Invalid JSON in ${path}: ${errorMessage(cause)}`,
      suggestion: 'Fix JSON syntax errors in devcontainer.json',
      cause,
    });
  }

  // ─── Git ──────────────────────────────────────────────────────────

  static commandFailed(args: readonly string[], stderr: string): SyncError {
    const command = formatCommand(args);
    return new SyncError({
      category: 'git-operation',
      code: 'COMMAND_FAILED',
      message: `Git command failed: ${command}\nError: ${stderr.trim()}`,
      suggestion: `Check the git command syntax and repository state. Command: ${command}`,
      command,
      stderr,
    });
  }

  static network(args: readonly string[], stderr: string): SyncError {
    const command = formatCommand(args);
    return new SyncError({
      category: 'network',
      code: 'NETWORK',
      message: `Could not reach the upstream repository: ${command}\nError: ${stderr.trim()}`,
      suggestion: 'Check your network connection and proxy settings, then try again',
      command,
      stderr,
    });
  }

  static gitUnavailable(cause: unknown): SyncError {
    return new SyncError({
      category: 'git-operation',
      code: 'GIT_UNAVAILABLE',
      message: `Failed to execute git command: ${errorMessage(cause)}`,
      suggestion: 'Make sure git is installed and available in PATH',
      cause,
    });
  }

  static timeout(args: readonly string[], timeoutMs: number): SyncError {
    const command = formatCommand(args);
    return new SyncError({
      category: 'git-operation',
      code: 'TIMEOUT',
      message: `Git command timed out after ${timeoutMs}ms: ${command}`,
      suggestion: 'Raise timeout_ms (or network_timeout_ms for fetches) in the settings file',
      command,
    });
  }

  static remoteMissing(name: string, suggestion: string): SyncError {
    return new SyncError({
      category: 'git-operation',
      code: 'REMOTE_MISSING',
      message: `Remote '${name}' does not exist`,
      suggestion,
    });
  }

  static branchMissing(name: string, suggestion: string): SyncError {
    return new SyncError({
      category: 'git-operation',
      code: 'BRANCH_MISSING',
      message: `Branch '${name}' does not exist`,
      suggestion,
    });
  }

  // ─── File System ──────────────────────────────────────────────────

  static filesystem(message: string, cause: unknown, suggestion = 'Check file permissions and try again'): SyncError {
    return new SyncError({
      category: 'filesystem',
      code: 'IO',
      message: `${message}: ${errorMessage(cause)}`,
      suggestion,
      cause,
    });
  }
}

export function formatCommand(args: readonly string[]): string {
  return ['git', ...args].join(' ');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
