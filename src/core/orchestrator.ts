import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { APP_NAME } from '../config/branding.js';
import { UPSTREAM, remoteRef } from '../config/schema.js';
import type { CommandContext, UpstreamConfig, WorkflowName } from '../config/schema.js';
import type { DevcontainerCustomizer } from '../customize/customizer.js';
import type { FirewallRemovalResult } from '../customize/result.js';
import type { GitToolkit } from '../git/index.js';
import { createBackup } from './backup.js';
import { SyncError, errorMessage } from './errors.js';
import { STEP_LABELS } from './progress.js';
import type { ProgressReporter, SyncStep } from './progress.js';

export const INIT_STRIP_COMMIT = 'Strip firewall configurations from devcontainer';
export const UPDATE_STRIP_COMMIT = 'Strip firewall configurations from updated devcontainer';
export const REMOVE_COMMIT = 'Remove devcontainer configuration';
export const CLEAR_EXISTING_COMMIT = 'Remove existing devcontainer before re-initializing';

/** Asked before `init` overwrites an existing prefix directory. */
export type ConfirmOverwrite = (prefix: string) => Promise<boolean>;

export interface OrchestratorDeps {
  git: GitToolkit;
  customizer: DevcontainerCustomizer;
  reporter: ProgressReporter;
  confirmOverwrite: ConfirmOverwrite;
  upstream?: UpstreamConfig;
}

export interface CustomizationOutcome {
  result: FirewallRemovalResult;
  committed: boolean;
}

export interface WorkflowReport {
  workflow: WorkflowName;
  dryRun: boolean;
  upstream: UpstreamConfig;
  baseBranch?: string;
  /** Optional steps that failed, downgraded from errors. */
  warnings: string[];
  customization?: CustomizationOutcome;
  backupPath?: string;
  /** remove: whether the prefix was deleted and committed. */
  filesRemoved: boolean;
}

/**
 * Runs the init / update / remove workflows as fixed sequences of git
 * steps. A required step that fails stops the workflow and leaves the
 * earlier steps' effects in place; optional steps (backup, firewall
 * stripping) turn their failure into a warning.
 */
export class SyncOrchestrator {
  private readonly git: GitToolkit;
  private readonly customizer: DevcontainerCustomizer;
  private readonly reporter: ProgressReporter;
  private readonly confirmOverwrite: ConfirmOverwrite;
  private readonly upstream: UpstreamConfig;

  constructor(deps: OrchestratorDeps) {
    this.git = deps.git;
    this.customizer = deps.customizer;
    this.reporter = deps.reporter;
    this.confirmOverwrite = deps.confirmOverwrite;
    this.upstream = deps.upstream ?? UPSTREAM;
  }

  // ─── Initialize ───────────────────────────────────────────────────

  async initialize(context: CommandContext): Promise<WorkflowReport> {
    const { remoteName, trackingBranch, extractionBranch, prefix } = this.upstream;
    const { branches, remotes, subtrees, validator } = this.git;
    const report = this.newReport('init', context);

    const baseBranch = await this.required('validate-repository', async () => {
      await validator.validateGitRepository(context.workingDir);
      await validator.validateHasCommits();
      await validator.validateCleanWorkingTree();
      return context.baseBranch ?? (await branches.currentBranch());
    });
    report.baseBranch = baseBranch;

    if (existsSync(join(context.workingDir, prefix))) {
      await this.confirmReplace(context);
      await this.mutating(context, 'clear-existing', async () => {
        await branches.checkoutBranch(baseBranch);
        await this.removePrefixAndCommit(CLEAR_EXISTING_COMMIT);
      });
    }

    await this.mutating(context, 'add-remote', () => this.ensureRemote());
    await this.mutating(context, 'fetch-remote', () =>
      remotes.fetchRemote(remoteName, { timeoutMs: context.networkTimeoutMs }),
    );
    await this.mutating(context, 'create-tracking-branch', () =>
      branches.forceCreateBranch(trackingBranch, remoteRef(this.upstream)),
    );
    await this.mutating(context, 'checkout-tracking-branch', () => branches.checkoutBranch(trackingBranch));
    await this.mutating(context, 'split-subtree', () => subtrees.splitSubtree(prefix, extractionBranch));
    await this.mutating(context, 'checkout-base-branch', () => branches.checkoutBranch(baseBranch));
    await this.mutating(context, 'add-subtree', () => subtrees.addSubtree(prefix, extractionBranch, true));

    if (context.stripFirewall) {
      report.customization = await this.customize(context, INIT_STRIP_COMMIT, report.warnings);
    }
    return report;
  }

  // ─── Update ───────────────────────────────────────────────────────

  async update(context: CommandContext): Promise<WorkflowReport> {
    const { remoteName, trackingBranch, updatedExtractionBranch, prefix } = this.upstream;
    const { branches, remotes, subtrees, validator } = this.git;
    const report = this.newReport('update', context);

    const baseBranch = await this.required('validate-repository', async () => {
      await validator.validateGitRepository(context.workingDir);
      await validator.validateCleanWorkingTree();
      return context.baseBranch ?? (await branches.currentBranch());
    });
    report.baseBranch = baseBranch;

    if (context.backup) {
      if (context.dryRun) {
        this.reporter.stepSkipped('create-backup', 'dry run');
      } else {
        report.backupPath = await this.optional('create-backup', report.warnings, () =>
          createBackup(context.workingDir, prefix),
        );
      }
    }

    await this.mutating(context, 'fetch-remote', () =>
      remotes.fetchRemote(remoteName, { timeoutMs: context.networkTimeoutMs }),
    );
    await this.mutating(context, 'reset-tracking-branch', () => this.resetTrackingBranch(context));
    // A separate branch, so the one init split stays around for inspection.
    await this.mutating(context, 'split-subtree', () => subtrees.splitSubtree(prefix, updatedExtractionBranch));
    await this.mutating(context, 'checkout-base-branch', () => branches.checkoutBranch(baseBranch));
    await this.mutating(context, 'merge-subtree', () => subtrees.updateSubtree(prefix, updatedExtractionBranch));

    if (context.stripFirewall) {
      report.customization = await this.customize(context, UPDATE_STRIP_COMMIT, report.warnings);
    }
    return report;
  }

  // ─── Remove ───────────────────────────────────────────────────────

  async remove(context: CommandContext): Promise<WorkflowReport> {
    const { remoteName, trackingBranch, extractionBranch, updatedExtractionBranch } = this.upstream;
    const { branches, remotes, validator } = this.git;
    const report = this.newReport('remove', context);

    await this.required('validate-repository', () => validator.validateGitRepository(context.workingDir));

    await this.mutating(context, 'remove-remote', () => remotes.removeRemote(remoteName));
    await this.mutating(context, 'delete-tracking-branch', async () => {
      if (!(await validator.checkExistingBranch(trackingBranch))) {
        throw SyncError.branchMissing(trackingBranch, `Nothing to clean up; run '${APP_NAME} init' to start tracking`);
      }
      await branches.deleteBranch(trackingBranch);
    });
    // Extraction branches are scratch space: they may never have existed.
    await this.mutating(context, 'delete-extraction-branches', async () => {
      for (const branch of [extractionBranch, updatedExtractionBranch]) {
        try {
          await branches.deleteBranch(branch);
        } catch (err) {
          this.reporter.detail(`Skipped branch '${branch}': ${errorMessage(err)}`);
        }
      }
    });

    if (context.keepFiles) {
      this.reporter.stepSkipped('remove-files', '--keep-files');
    } else {
      await this.mutating(context, 'remove-files', async () => {
        const committed = await this.removePrefixAndCommit(REMOVE_COMMIT);
        if (!committed) report.warnings.push(`Nothing to commit: ${this.upstream.prefix} was not tracked`);
        report.filesRemoved = committed;
      });
    }
    return report;
  }

  // ─── Workflow pieces ──────────────────────────────────────────────

  private async confirmReplace(context: CommandContext): Promise<void> {
    const { prefix } = this.upstream;
    if (context.force) {
      this.reporter.detail(`--force given: replacing existing ${prefix}`);
      return;
    }
    if (context.dryRun) {
      this.reporter.detail(`${prefix} exists; a real run would ask before replacing it`);
      return;
    }
    if (!(await this.confirmOverwrite(prefix))) throw SyncError.cancelled();
  }

  /** Add the upstream remote, or reuse it when a previous init left it behind. */
  private async ensureRemote(): Promise<void> {
    const { remoteName, url } = this.upstream;
    const existing = await this.git.remotes.getRemoteUrl(remoteName);
    if (existing === undefined) {
      await this.git.remotes.addRemote(remoteName, url);
      return;
    }
    if (existing !== url) {
      throw new SyncError({
        category: 'git-operation',
        code: 'REMOTE_CONFLICT',
        message: `Remote '${remoteName}' already exists and points to ${existing}`,
        suggestion: `Remove or rename it with 'git remote remove ${remoteName}', then run init again`,
      });
    }
    this.reporter.detail(`Reusing existing remote '${remoteName}'`);
  }

  /** Check out the tracking branch and move it to the upstream tip, dropping local drift. */
  private async resetTrackingBranch(context: CommandContext): Promise<void> {
    const { trackingBranch } = this.upstream;
    const ref = remoteRef(this.upstream);
    const { branches, validator } = this.git;

    if (!(await validator.checkExistingBranch(trackingBranch))) {
      if (!context.force) {
        throw SyncError.branchMissing(
          trackingBranch,
          `Run '${APP_NAME} init' first, or pass --force to recreate it from ${ref}`,
        );
      }
      this.reporter.detail(`Recreating '${trackingBranch}' from ${ref}`);
      await branches.forceCreateBranch(trackingBranch, ref);
    }
    await branches.checkoutBranch(trackingBranch);
    await branches.resetHard(ref);
  }

  /** Returns false when nothing ended up staged (the prefix was untracked). */
  private async removePrefixAndCommit(message: string): Promise<boolean> {
    const { subtrees, commits } = this.git;
    await subtrees.removeSubtree(this.upstream.prefix);
    if (!(await commits.hasStagedChanges())) return false;
    await commits.commit(message);
    return true;
  }

  private async customize(
    context: CommandContext,
    summary: string,
    warnings: string[],
  ): Promise<CustomizationOutcome | undefined> {
    const { prefix } = this.upstream;
    return this.optional('strip-firewall', warnings, async () => {
      const result = await this.customizer.stripFirewallFeatures(prefix, { write: !context.dryRun });
      for (const change of result.describeChanges()) this.reporter.detail(change);

      // Never commit an empty changeset.
      if (!result.hasChanges() || context.dryRun) return { result, committed: false };
      await this.customizer.commitCustomizations(prefix, result, summary);
      return { result, committed: true };
    });
  }

  // ─── Step runners ─────────────────────────────────────────────────

  private async required<T>(step: SyncStep, action: () => Promise<T>): Promise<T> {
    this.reporter.stepStarted(step);
    try {
      const value = await action();
      this.reporter.stepFinished(step);
      return value;
    } catch (err) {
      this.reporter.stepFailed(step, err);
      throw err;
    }
  }

  /** A required step that changes the repository; reported and skipped on a dry run. */
  private async mutating(context: CommandContext, step: SyncStep, action: () => Promise<void>): Promise<void> {
    if (context.dryRun) {
      this.reporter.stepSkipped(step, 'dry run');
      return;
    }
    await this.required(step, action);
  }

  private async optional<T>(step: SyncStep, warnings: string[], action: () => Promise<T>): Promise<T | undefined> {
    this.reporter.stepStarted(step);
    try {
      const value = await action();
      this.reporter.stepFinished(step);
      return value;
    } catch (err) {
      const message = `${STEP_LABELS[step]} failed: ${errorMessage(err)}`;
      warnings.push(message);
      this.reporter.stepWarned(step, message);
      return undefined;
    }
  }

  private newReport(workflow: WorkflowName, context: CommandContext): WorkflowReport {
    return { workflow, dryRun: context.dryRun, upstream: this.upstream, warnings: [], filesRemoved: false };
  }
}
