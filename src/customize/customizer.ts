import { join } from 'node:path';
import { BUILD_SCRIPT_FILE, MANIFEST_FILE } from '../config/schema.js';
import type { CommitManager } from '../git/commit-manager.js';
import { stripDockerfileFile } from './dockerfile.js';
import { stripManifestFile } from './manifest.js';
import { FirewallRemovalResult } from './result.js';
import { removeFirewallScripts } from './scripts.js';

export const NO_SCRIPTS_WARNING = 'No firewall scripts were found to remove';
export const NO_DOCKERFILE_CHANGES_WARNING = 'No firewall configurations found in Dockerfile';
export const NO_MANIFEST_CHANGES_WARNING = 'No firewall configurations found in devcontainer.json';

export interface StripOptions {
  /** When false, report what would change without touching any file. */
  write?: boolean;
}

/**
 * Strips the upstream firewall feature from a synced devcontainer directory
 * and commits the result.
 */
export class DevcontainerCustomizer {
  constructor(
    private readonly workingDir: string,
    private readonly commits: CommitManager,
  ) {}

  async stripFirewallFeatures(prefix: string, options: StripOptions = {}): Promise<FirewallRemovalResult> {
    const write = options.write ?? true;
    const dir = join(this.workingDir, prefix);

    const scripts = await removeFirewallScripts(dir, prefix, { write });
    const manifest = await stripManifestFile(join(dir, MANIFEST_FILE), `${prefix}/${MANIFEST_FILE}`, { write });
    const dockerfile = await stripDockerfileFile(join(dir, BUILD_SCRIPT_FILE), `${prefix}/${BUILD_SCRIPT_FILE}`, { write });

    const result = FirewallRemovalResult.empty().merge(scripts).merge(manifest).merge(dockerfile);
    return result.merge({ warnings: this.validateFirewallRemoval(result) });
  }

  /** Informational only: say which parts of the footprint were not found. */
  validateFirewallRemoval(result: FirewallRemovalResult): string[] {
    const warnings: string[] = [];
    if (result.filesRemoved.length === 0) warnings.push(NO_SCRIPTS_WARNING);
    if (result.dockerfileChanges.length === 0) warnings.push(NO_DOCKERFILE_CHANGES_WARNING);
    if (result.jsonChanges.length === 0) warnings.push(NO_MANIFEST_CHANGES_WARNING);
    return warnings;
  }

  /** Stage the whole prefix and commit it. Callers only get here when `result.hasChanges()`. */
  async commitCustomizations(prefix: string, result: FirewallRemovalResult, summary: string): Promise<void> {
    await this.commits.stage(prefix);
    await this.commits.commit(formatCommitMessage(summary, result.describeChanges()));
  }
}

export function formatCommitMessage(summary: string, changes: readonly string[]): string {
  if (changes.length === 0) return summary;
  return [summary, '', 'Changes made:', ...changes.map((change) => `- ${change}`)].join('\n');
}
