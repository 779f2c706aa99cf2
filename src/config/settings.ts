import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import yaml from 'js-yaml';
import { SETTINGS_FILENAME } from './branding.js';
import { SettingsFileSchema } from './schema.js';
import type { CommandContext, ContextOverrides, SettingsFile } from './schema.js';
import { SyncError, errorMessage } from '../core/errors.js';

/**
 * Load `.devcontainer-sync.yaml` from the repository root.
 * A missing file yields the defaults; a malformed one is a repository error.
 */
export function loadSettings(workingDir: string): SettingsFile {
  const filePath = join(workingDir, SETTINGS_FILENAME);
  if (!existsSync(filePath)) return SettingsFileSchema.parse({});

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw SyncError.invalidSettings(SETTINGS_FILENAME, errorMessage(err));
  }

  const result = SettingsFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw SyncError.invalidSettings(SETTINGS_FILENAME, detail);
  }
  return result.data;
}

/** Build the frozen context for one invocation: settings file first, CLI flags on top. */
export function createContext(
  workingDir: string,
  settings: SettingsFile,
  overrides: ContextOverrides = {},
): CommandContext {
  const base: CommandContext = {
    workingDir,
    verbose: false,
    dryRun: false,
    stripFirewall: settings.strip_firewall,
    backup: settings.backup,
    force: false,
    keepFiles: false,
    timeoutMs: settings.timeout_ms,
    networkTimeoutMs: settings.network_timeout_ms,
    baseBranch: settings.base_branch,
  };
  return withOverrides(base, overrides);
}

/** Returns a new frozen context; `undefined` overrides leave the value untouched. */
export function withOverrides(context: CommandContext, overrides: ContextOverrides): CommandContext {
  const next: { -readonly [K in keyof CommandContext]: CommandContext[K] } = { ...context };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(next, { [key]: value });
  }
  return Object.freeze(next);
}
