import { z } from 'zod';

// ─── Upstream ──────────────────────────────────────────────────────

/** Where the devcontainer comes from and the refs used to carry it across. */
export interface UpstreamConfig {
  remoteName: string;
  url: string;
  /** Branch on the remote, e.g. "main" (remote ref "claude/main"). */
  remoteBranch: string;
  /** Local branch kept in lockstep with the remote branch by hard reset. */
  trackingBranch: string;
  /** Ephemeral branch holding the split of the prefix during init. */
  extractionBranch: string;
  /** Ephemeral branch holding the split of the prefix during update. */
  updatedExtractionBranch: string;
  /** Directory synced into the working tree. */
  prefix: string;
}

export const UPSTREAM: Readonly<UpstreamConfig> = Object.freeze({
  remoteName: 'claude',
  url: 'https://github.com/anthropics/claude-code.git',
  remoteBranch: 'main',
  trackingBranch: 'claude-main',
  extractionBranch: 'devcontainer',
  updatedExtractionBranch: 'devcontainer-updated',
  prefix: '.devcontainer',
});

/** "claude/main" */
export function remoteRef(upstream: UpstreamConfig): string {
  return `${upstream.remoteName}/${upstream.remoteBranch}`;
}

export const MANIFEST_FILE = 'devcontainer.json';
export const BUILD_SCRIPT_FILE = 'Dockerfile';
export const BACKUP_SUFFIX = '.backup';

// ─── Settings File ─────────────────────────────────────────────────

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_NETWORK_TIMEOUT_MS = 300_000;

export const SettingsFileSchema = z
  .object({
    base_branch: z.string().min(1).optional(),
    timeout_ms: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    network_timeout_ms: z.number().int().positive().default(DEFAULT_NETWORK_TIMEOUT_MS),
    strip_firewall: z.boolean().default(false),
    backup: z.boolean().default(false),
  })
  .strict();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

// ─── Command Context ───────────────────────────────────────────────

/** Everything a workflow needs to know about one invocation. Frozen once built. */
export interface CommandContext {
  readonly workingDir: string;
  readonly verbose: boolean;
  readonly dryRun: boolean;
  readonly stripFirewall: boolean;
  readonly backup: boolean;
  readonly force: boolean;
  readonly keepFiles: boolean;
  readonly timeoutMs: number;
  readonly networkTimeoutMs: number;
  /** Branch the subtree lands on; resolved from HEAD when unset. */
  readonly baseBranch?: string;
}

export type ContextOverrides = Partial<Omit<CommandContext, 'workingDir'>>;

// ─── Workflow Types ────────────────────────────────────────────────

export type WorkflowName = 'init' | 'update' | 'remove';

export interface Remote {
  name: string;
  url: string;
}

export interface Branch {
  name: string;
  isCurrent: boolean;
  upstream?: string;
}
