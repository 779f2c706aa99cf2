import chalk from 'chalk';
import { APP_NAME } from '../config/branding.js';
import { remoteRef } from '../config/schema.js';
import type { WorkflowReport } from '../core/orchestrator.js';

/** Lines printed after a workflow completes. */
export function renderSummary(report: WorkflowReport, verbose: boolean): string[] {
  const { upstream } = report;
  const lines: string[] = [''];

  if (report.dryRun) {
    lines.push(chalk.cyan(`Dry run: no changes were made by '${report.workflow}'.`));
  } else {
    switch (report.workflow) {
      case 'init':
        lines.push(chalk.green(`✓ Synced ${upstream.prefix} from ${upstream.url}`));
        lines.push(chalk.dim(`  Tracking ${remoteRef(upstream)} on '${upstream.trackingBranch}'`));
        lines.push(chalk.dim(`  Run '${APP_NAME} update' to pull later changes.`));
        break;
      case 'update':
        lines.push(chalk.green(`✓ Updated ${upstream.prefix} from ${remoteRef(upstream)}`));
        if (report.backupPath) lines.push(chalk.dim(`  Backup saved to ${report.backupPath}`));
        break;
      case 'remove':
        lines.push(chalk.green('✓ Removed upstream tracking'));
        if (report.filesRemoved) lines.push(chalk.dim(`  Deleted ${upstream.prefix}`));
        else lines.push(chalk.dim(`  Kept ${upstream.prefix} in the working tree`));
        break;
    }
  }

  const customization = report.customization;
  if (customization) {
    const changes = customization.result.describeChanges();
    if (changes.length === 0) {
      lines.push(chalk.dim('  No firewall configuration to strip'));
    } else if (customization.committed) {
      lines.push(chalk.green(`✓ Stripped firewall configuration (${changes.length} change(s) committed)`));
    } else {
      lines.push(chalk.cyan(`Firewall stripping would make ${changes.length} change(s)`));
    }
    if (verbose) {
      for (const change of changes) lines.push(chalk.dim(`    - ${change}`));
      for (const warning of customization.result.warnings) lines.push(chalk.yellow(`    ! ${warning}`));
      for (const missing of customization.result.patternsNotFound) lines.push(chalk.dim(`    ? not found: ${missing}`));
    }
  }

  for (const warning of report.warnings) lines.push(chalk.yellow(`⚠ ${warning}`));
  return lines;
}
