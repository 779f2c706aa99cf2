import simpleGit, { GitPluginError } from 'simple-git';
import { DEFAULT_TIMEOUT_MS } from '../config/schema.js';
import { SyncError } from '../core/errors.js';

export interface RunOptions {
  /** Kill the git process when it has not finished within this many ms. */
  timeoutMs?: number;
}

/**
 * The narrow seam between the tool and the git executable.
 * Resolves with stdout; rejects with a SyncError for any non-zero exit.
 */
export interface GitRunner {
  readonly workingDir: string;
  run(args: readonly string[], options?: RunOptions): Promise<string>;
}

/**
 * Variables passed through to git. Editor, pager and askpass variables are
 * never among them: simple-git rejects a spawn that carries them.
 */
const INHERITED_ENV = [
  'PATH',
  'Path',
  'HOME',
  'USERPROFILE',
  'HOMEDRIVE',
  'HOMEPATH',
  'SYSTEMROOT',
  'SystemRoot',
  'TMPDIR',
  'TEMP',
  'TMP',
  'LANG',
  'LC_ALL',
  'XDG_CONFIG_HOME',
  'SSH_AUTH_SOCK',
  'HTTP_PROXY',
  'HTTPS_PROXY',
  'NO_PROXY',
  'http_proxy',
  'https_proxy',
  'no_proxy',
] as const;

/** The environment git is spawned with: the allowlisted variables, and no terminal prompts. */
export function buildGitEnv(source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {};
  for (const name of INHERITED_ENV) {
    const value = source[name];
    if (value !== undefined) env[name] = value;
  }
  env.GIT_TERMINAL_PROMPT = '0';
  return env;
}

const NETWORK_FAILURE = [
  /could not resolve host/i,
  /unable to access/i,
  /connection (refused|timed out|reset)/i,
  /network is unreachable/i,
];

/**
 * GitRunner backed by simple-git. A fresh instance per call carries its own
 * abort signal, so the timeout kills exactly the process it was set for.
 */
export class SimpleGitRunner implements GitRunner {
  readonly workingDir: string;
  private readonly defaultTimeoutMs: number;

  constructor(workingDir: string, defaultTimeoutMs = DEFAULT_TIMEOUT_MS) {
    this.workingDir = workingDir;
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  async run(args: readonly string[], options: RunOptions = {}): Promise<string> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const git = simpleGit({
      baseDir: this.workingDir,
      maxConcurrentProcesses: 1,
      abort: AbortSignal.timeout(timeoutMs),
      // Any non-zero exit is a failure, even when git wrote nothing to stderr.
      errors(error, result) {
        if (error) return error;
        if (result.exitCode === 0) return undefined;
        const stderr = Buffer.concat(result.stdErr).toString('utf-8');
        return Buffer.from(stderr.length > 0 ? stderr : `exit code ${result.exitCode}`, 'utf-8');
      },
    }).env(buildGitEnv());

    try {
      return await git.raw([...args]);
    } catch (err) {
      throw classifyFailure(args, err, timeoutMs);
    }
  }
}

export function classifyFailure(args: readonly string[], err: unknown, timeoutMs: number): SyncError {
  if (err instanceof GitPluginError && err.plugin === 'abort') {
    return SyncError.timeout(args, timeoutMs);
  }
  if (!(err instanceof Error)) return SyncError.commandFailed(args, String(err));

  if (('code' in err && err.code === 'ENOENT') || /spawn git ENOENT/.test(err.message)) {
    return SyncError.gitUnavailable(err);
  }
  if (NETWORK_FAILURE.some((pattern) => pattern.test(err.message))) {
    return SyncError.network(args, err.message);
  }
  return SyncError.commandFailed(args, err.message);
}
