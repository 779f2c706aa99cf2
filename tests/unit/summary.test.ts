import { describe, it, expect } from 'vitest';
import { UPSTREAM } from '../../src/config/schema.js';
import type { WorkflowReport } from '../../src/core/orchestrator.js';
import { FirewallRemovalResult } from '../../src/customize/result.js';
import { renderSummary } from '../../src/ui/summary.js';

const ANSI = /\u001b\[[0-9;]*m/g;

function plain(report: WorkflowReport, verbose = false): string[] {
  return renderSummary(report, verbose).map((line) => line.replace(ANSI, ''));
}

function report(overrides: Partial<WorkflowReport>): WorkflowReport {
  return { workflow: 'init', dryRun: false, upstream: UPSTREAM, warnings: [], filesRemoved: false, ...overrides };
}

describe('renderSummary', () => {
  it('says nothing changed on a dry run', () => {
    expect(plain(report({ dryRun: true, workflow: 'update' }))).toEqual([
      '',
      "Dry run: no changes were made by 'update'.",
    ]);
  });

  it('mentions the backup after an update', () => {
    expect(plain(report({ workflow: 'update', backupPath: '.devcontainer.backup' }))).toContain(
      '  Backup saved to .devcontainer.backup',
    );
  });

  it('lists customization changes and warnings only when verbose', () => {
    const result = new FirewallRemovalResult({
      filesRemoved: ['.devcontainer/init-firewall.sh'],
      warnings: ['Dockerfile not found'],
    });
    const input = report({ customization: { result, committed: true }, warnings: ['Creating backup failed: x'] });

    expect(plain(input)).toEqual([
      '',
      '✓ Synced .devcontainer from https://github.com/anthropics/claude-code.git',
      "  Tracking claude/main on 'claude-main'",
      "  Run 'devcontainer-sync update' to pull later changes.",
      '✓ Stripped firewall configuration (1 change(s) committed)',
      '⚠ Creating backup failed: x',
    ]);
    expect(plain(input, true).slice(5, 7)).toEqual([
      '    - Removed firewall script .devcontainer/init-firewall.sh',
      '    ! Dockerfile not found',
    ]);
  });

  it('reports kept files after remove', () => {
    expect(plain(report({ workflow: 'remove' }))).toEqual([
      '',
      '✓ Removed upstream tracking',
      '  Kept .devcontainer in the working tree',
    ]);
  });
});
