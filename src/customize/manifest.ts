import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { SyncError } from '../core/errors.js';
import {
  FEATURE_NAME,
  FIREWALL_CAPABILITIES,
  POST_START_FIELD,
  RUN_ARGS_FIELD,
  WAIT_FOR_FIELD,
} from './patterns.js';
import type { FirewallRemovalParts } from './result.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const CAPABILITIES_REMOVED = 'Removed NET_ADMIN and NET_RAW capabilities from runArgs';
export const POST_START_REMOVED = 'Removed postStartCommand referencing firewall';
export const WAIT_FOR_REMOVED = 'Removed waitFor since postStartCommand was removed';

export interface ManifestStripResult {
  document: JsonObject;
  changes: string[];
}

/**
 * Remove the firewall footprint from a parsed devcontainer.json. The input is
 * not modified; fields this function does not touch are carried over as-is.
 */
export function stripManifestFirewall(input: JsonObject): ManifestStripResult {
  const document: JsonObject = { ...input };
  const changes: string[] = [];

  const runArgs = document[RUN_ARGS_FIELD];
  if (Array.isArray(runArgs)) {
    const kept = runArgs.filter((arg) => typeof arg !== 'string' || !grantsFirewallCapability(arg));
    if (kept.length < runArgs.length) {
      document[RUN_ARGS_FIELD] = kept;
      changes.push(CAPABILITIES_REMOVED);
    }
  }

  const postStart = document[POST_START_FIELD];
  if (typeof postStart === 'string' && postStart.includes(FEATURE_NAME)) {
    delete document[POST_START_FIELD];
    changes.push(POST_START_REMOVED);
  }

  // Must run after the postStartCommand removal: that is what makes waitFor dangle.
  if (document[WAIT_FOR_FIELD] === POST_START_FIELD && !(POST_START_FIELD in document)) {
    delete document[WAIT_FOR_FIELD];
    changes.push(WAIT_FOR_REMOVED);
  }

  return { document, changes };
}

function grantsFirewallCapability(arg: string): boolean {
  return FIREWALL_CAPABILITIES.some((cap) => arg.includes(cap));
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strip devcontainer.json on disk. Writes only when something changed and
 * `write` is set; a missing file is reported as a warning.
 */
export async function stripManifestFile(
  path: string,
  displayPath: string,
  options: { write: boolean },
): Promise<FirewallRemovalParts> {
  if (!existsSync(path)) return { warnings: ['devcontainer.json not found'] };

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw SyncError.filesystem('Failed to read devcontainer.json', err, 'Check file permissions and ensure the file exists');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw SyncError.invalidManifest(displayPath, err);
  }
  if (!isJsonObject(parsed)) {
    throw SyncError.invalidManifest(displayPath, new Error('top-level value is not an object'));
  }

  const { document, changes } = stripManifestFirewall(parsed);
  const patternsNotFound: string[] = [];
  if (!changes.includes(CAPABILITIES_REMOVED)) patternsNotFound.push(`${displayPath}: ${RUN_ARGS_FIELD} capabilities`);
  if (!changes.includes(POST_START_REMOVED)) patternsNotFound.push(`${displayPath}: ${POST_START_FIELD}`);
  if (changes.length === 0) return { patternsNotFound };

  if (options.write) {
    try {
      await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
    } catch (err) {
      throw SyncError.filesystem('Failed to write modified devcontainer.json', err, 'Check file permissions and available disk space');
    }
  }
  return { filesModified: [displayPath], jsonChanges: changes, patternsNotFound };
}
