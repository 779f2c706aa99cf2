import { describe, it, expect } from 'vitest';
import {
  SettingsFileSchema,
  UPSTREAM,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_NETWORK_TIMEOUT_MS,
  remoteRef,
} from '../../src/config/schema.js';

describe('Settings file schema', () => {
  it('applies defaults', () => {
    const result = SettingsFileSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.timeout_ms).toBe(DEFAULT_TIMEOUT_MS);
      expect(result.data.network_timeout_ms).toBe(DEFAULT_NETWORK_TIMEOUT_MS);
      expect(result.data.strip_firewall).toBe(false);
      expect(result.data.backup).toBe(false);
      expect(result.data.base_branch).toBeUndefined();
    }
  });

  it('validates a full settings file', () => {
    const result = SettingsFileSchema.safeParse({
      base_branch: 'develop',
      timeout_ms: 10_000,
      network_timeout_ms: 60_000,
      strip_firewall: true,
      backup: true,
    });
    expect(result.success).toBe(true);
  });

  it('rejects unknown keys', () => {
    expect(SettingsFileSchema.safeParse({ stripFirewall: true }).success).toBe(false);
  });

  it('rejects non-positive timeouts', () => {
    expect(SettingsFileSchema.safeParse({ timeout_ms: 0 }).success).toBe(false);
    expect(SettingsFileSchema.safeParse({ network_timeout_ms: -5 }).success).toBe(false);
  });

  it('rejects an empty base branch', () => {
    expect(SettingsFileSchema.safeParse({ base_branch: '' }).success).toBe(false);
  });
});

describe('Upstream constants', () => {
  it('tracks claude/main into .devcontainer', () => {
    expect(remoteRef(UPSTREAM)).toBe('claude/main');
    expect(UPSTREAM.prefix).toBe('.devcontainer');
    expect(UPSTREAM.trackingBranch).toBe('claude-main');
    expect(Object.isFrozen(UPSTREAM)).toBe(true);
  });
});
