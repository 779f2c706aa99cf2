import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createContext, loadSettings, withOverrides } from '../../src/config/settings.js';
import { SyncError } from '../../src/core/errors.js';

describe('loadSettings', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'dcsync-settings-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults when no settings file exists', () => {
    const settings = loadSettings(dir);
    expect(settings).toEqual({
      timeout_ms: 30_000,
      network_timeout_ms: 300_000,
      strip_firewall: false,
      backup: false,
    });
  });

  it('reads values from .devcontainer-sync.yaml', () => {
    writeFileSync(join(dir, '.devcontainer-sync.yaml'), 'base_branch: develop\nstrip_firewall: true\n');
    const settings = loadSettings(dir);
    expect(settings.base_branch).toBe('develop');
    expect(settings.strip_firewall).toBe(true);
    expect(settings.timeout_ms).toBe(30_000);
  });

  it('treats an empty file as defaults', () => {
    writeFileSync(join(dir, '.devcontainer-sync.yaml'), '');
    expect(loadSettings(dir).backup).toBe(false);
  });

  it('reports schema violations with the key path', () => {
    writeFileSync(join(dir, '.devcontainer-sync.yaml'), 'timeout_ms: fast\n');
    try {
      loadSettings(dir);
      expect.unreachable('loadSettings should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(SyncError);
      if (err instanceof SyncError) {
        expect(err.code).toBe('INVALID_SETTINGS');
        expect(err.exitCode).toBe(1);
        expect(err.message).toMatch(/^Invalid settings in \.devcontainer-sync\.yaml: timeout_ms: /);
      }
    }
  });

  it('reports YAML syntax errors', () => {
    writeFileSync(join(dir, '.devcontainer-sync.yaml'), 'backup: [unclosed\n');
    expect(() => loadSettings(dir)).toThrow(/Invalid settings in \.devcontainer-sync\.yaml/);
  });
});

describe('createContext', () => {
  const settings = {
    timeout_ms: 1_000,
    network_timeout_ms: 2_000,
    strip_firewall: true,
    backup: false,
  };

  it('starts from the settings file', () => {
    const context = createContext('/repo', settings);
    expect(context).toEqual({
      workingDir: '/repo',
      verbose: false,
      dryRun: false,
      stripFirewall: true,
      backup: false,
      force: false,
      keepFiles: false,
      timeoutMs: 1_000,
      networkTimeoutMs: 2_000,
      baseBranch: undefined,
    });
    expect(Object.isFrozen(context)).toBe(true);
  });

  it('lets flags win and ignores undefined flags', () => {
    const context = createContext('/repo', settings, { stripFirewall: undefined, backup: true, verbose: true });
    expect(context.stripFirewall).toBe(true);
    expect(context.backup).toBe(true);
    expect(context.verbose).toBe(true);
  });

  it('returns a new context from withOverrides', () => {
    const context = createContext('/repo', settings);
    const forced = withOverrides(context, { force: true });
    expect(forced.force).toBe(true);
    expect(context.force).toBe(false);
  });
});
