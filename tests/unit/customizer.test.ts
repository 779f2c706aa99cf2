import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DevcontainerCustomizer,
  NO_DOCKERFILE_CHANGES_WARNING,
  NO_MANIFEST_CHANGES_WARNING,
  NO_SCRIPTS_WARNING,
  formatCommitMessage,
} from '../../src/customize/customizer.js';
import { FirewallRemovalResult } from '../../src/customize/result.js';
import { detectFirewallScripts, removeFirewallScripts } from '../../src/customize/scripts.js';
import { CommitManager } from '../../src/git/commit-manager.js';
import { FakeGitRunner } from '../helpers/fake-runner.js';

const MANIFEST = {
  name: 'Sandbox',
  runArgs: ['--cap-add=NET_ADMIN', '--cap-add=NET_RAW'],
  postStartCommand: 'sudo /usr/local/bin/init-firewall.sh',
  waitFor: 'postStartCommand',
};

const DOCKERFILE = [
  'FROM node:20',
  'RUN apt-get install -y git iptables',
  '# Copy and set up firewall script',
  'COPY init-firewall.sh /usr/local/bin/',
  'USER node',
  '',
].join('\n');

describe('firewall scripts', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'dcsync-scripts-'));
    writeFileSync(join(dir, 'firewall.sh'), '');
    writeFileSync(join(dir, 'net.sh'), '#!/bin/bash\niptables -A OUTPUT -j DROP\n');
    writeFileSync(join(dir, 'build.sh'), '#!/bin/bash\nnpm ci\n');
    writeFileSync(join(dir, 'notes.txt'), 'iptables is gone\n');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('detects canonical names and scripts with firewall content', async () => {
    expect(await detectFirewallScripts(dir)).toEqual(['firewall.sh', 'net.sh']);
  });

  it('returns nothing for a missing directory', async () => {
    expect(await detectFirewallScripts(join(dir, 'absent'))).toEqual([]);
  });

  it('removes detected scripts and reports them under the prefix', async () => {
    const parts = await removeFirewallScripts(dir, '.devcontainer', { write: true });
    expect(parts.filesRemoved).toEqual(['.devcontainer/firewall.sh', '.devcontainer/net.sh']);
    expect(existsSync(join(dir, 'net.sh'))).toBe(false);
    expect(existsSync(join(dir, 'build.sh'))).toBe(true);
  });

  it('only reports without write', async () => {
    await removeFirewallScripts(dir, '.devcontainer', { write: false });
    expect(existsSync(join(dir, 'firewall.sh'))).toBe(true);
  });
});

describe('DevcontainerCustomizer', () => {
  let workingDir: string;
  let prefixDir: string;

  beforeEach(() => {
    workingDir = mkdtempSync(join(tmpdir(), 'dcsync-customizer-'));
    prefixDir = join(workingDir, '.devcontainer');
    mkdirSync(prefixDir);
  });

  afterEach(() => {
    rmSync(workingDir, { recursive: true, force: true });
  });

  it('strips scripts, manifest and Dockerfile', async () => {
    writeFileSync(join(prefixDir, 'init-firewall.sh'), '#!/bin/bash\n');
    writeFileSync(join(prefixDir, 'devcontainer.json'), JSON.stringify(MANIFEST));
    writeFileSync(join(prefixDir, 'Dockerfile'), DOCKERFILE);

    const customizer = new DevcontainerCustomizer(workingDir, new CommitManager(new FakeGitRunner(workingDir)));
    const result = await customizer.stripFirewallFeatures('.devcontainer');

    expect(result.hasChanges()).toBe(true);
    expect(result.warnings).toEqual([]);
    expect(result.patternsNotFound).toEqual([]);
    expect(result.filesModified).toEqual(['.devcontainer/devcontainer.json', '.devcontainer/Dockerfile']);
    expect(result.describeChanges()).toEqual([
      'Removed firewall script .devcontainer/init-firewall.sh',
      'Dockerfile: Removed firewall packages from apt install',
      'Dockerfile: Removed firewall setup section',
      'devcontainer.json: Removed NET_ADMIN and NET_RAW capabilities from runArgs',
      'devcontainer.json: Removed postStartCommand referencing firewall',
      'devcontainer.json: Removed waitFor since postStartCommand was removed',
    ]);
    expect(readFileSync(join(prefixDir, 'Dockerfile'), 'utf-8')).toBe('FROM node:20\nRUN apt-get install -y git\n');
    expect(existsSync(join(prefixDir, 'init-firewall.sh'))).toBe(false);
  });

  it('warns once per untouched area when there is no firewall', async () => {
    writeFileSync(join(prefixDir, 'devcontainer.json'), '{"name":"Plain"}');
    writeFileSync(join(prefixDir, 'Dockerfile'), 'FROM node:20\n');

    const customizer = new DevcontainerCustomizer(workingDir, new CommitManager(new FakeGitRunner(workingDir)));
    const result = await customizer.stripFirewallFeatures('.devcontainer');

    expect(result.hasChanges()).toBe(false);
    expect(result.warnings).toEqual([NO_SCRIPTS_WARNING, NO_DOCKERFILE_CHANGES_WARNING, NO_MANIFEST_CHANGES_WARNING]);
    expect(result.patternsNotFound).toEqual([
      '.devcontainer/devcontainer.json: runArgs capabilities',
      '.devcontainer/devcontainer.json: postStartCommand',
      '.devcontainer/Dockerfile: # Copy and set up firewall script',
      '.devcontainer/Dockerfile: firewall packages',
    ]);
  });

  it('reports missing files alongside the validation warnings', async () => {
    const customizer = new DevcontainerCustomizer(workingDir, new CommitManager(new FakeGitRunner(workingDir)));
    const result = await customizer.stripFirewallFeatures('.devcontainer');
    expect(result.warnings).toEqual([
      'devcontainer.json not found',
      'Dockerfile not found',
      NO_SCRIPTS_WARNING,
      NO_DOCKERFILE_CHANGES_WARNING,
      NO_MANIFEST_CHANGES_WARNING,
    ]);
  });

  it('writes nothing in preview mode', async () => {
    writeFileSync(join(prefixDir, 'Dockerfile'), DOCKERFILE);
    const customizer = new DevcontainerCustomizer(workingDir, new CommitManager(new FakeGitRunner(workingDir)));
    const result = await customizer.stripFirewallFeatures('.devcontainer', { write: false });
    expect(result.dockerfileChanges).toHaveLength(2);
    expect(readFileSync(join(prefixDir, 'Dockerfile'), 'utf-8')).toBe(DOCKERFILE);
  });

  it('stages the prefix and commits an itemised message', async () => {
    const runner = new FakeGitRunner(workingDir);
    const customizer = new DevcontainerCustomizer(workingDir, new CommitManager(runner));
    const result = new FirewallRemovalResult({ filesRemoved: ['.devcontainer/init-firewall.sh'] });

    await customizer.commitCustomizations('.devcontainer', result, 'Strip firewall configurations from devcontainer');

    expect(runner.calls.map((c) => c.args)).toEqual([
      ['add', '--', '.devcontainer'],
      [
        'commit',
        '-m',
        'Strip firewall configurations from devcontainer\n\nChanges made:\n- Removed firewall script .devcontainer/init-firewall.sh',
      ],
    ]);
  });
});

describe('FirewallRemovalResult', () => {
  it('merges without mutating either side', () => {
    const a = new FirewallRemovalResult({ filesRemoved: ['a.sh'] });
    const b = a.merge({ warnings: ['careful'] });
    expect(a.warnings).toEqual([]);
    expect(b.filesRemoved).toEqual(['a.sh']);
    expect(b.hasWarnings()).toBe(true);
    expect(Object.isFrozen(b)).toBe(true);
  });

  it('counts only file effects as changes', () => {
    expect(new FirewallRemovalResult({ warnings: ['x'] }).hasChanges()).toBe(false);
  });
});

describe('formatCommitMessage', () => {
  it('returns the summary alone when there is nothing to list', () => {
    expect(formatCommitMessage('Summary', [])).toBe('Summary');
  });
});
