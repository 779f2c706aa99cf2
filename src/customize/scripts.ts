import { existsSync } from 'node:fs';
import { readdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { SyncError } from '../core/errors.js';
import { FIREWALL_SCRIPT_NAMES, matchFirewallPatterns } from './patterns.js';
import type { FirewallRemovalParts } from './result.js';

/**
 * Shell scripts in `dir` that belong to the firewall: the canonical names,
 * plus any other `*.sh` whose content matches a firewall pattern (a renamed
 * copy of the canonical script still gets caught). Sorted by name.
 */
export async function detectFirewallScripts(dir: string): Promise<string[]> {
  if (!existsSync(dir)) return [];

  let entries: string[];
  try {
    entries = (await readdir(dir, { withFileTypes: true }))
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name);
  } catch (err) {
    throw SyncError.filesystem(`Failed to read ${dir}`, err);
  }

  const scripts: string[] = [];
  for (const name of entries.sort()) {
    if (FIREWALL_SCRIPT_NAMES.includes(name)) {
      scripts.push(name);
      continue;
    }
    if (!name.endsWith('.sh')) continue;
    let content: string;
    try {
      content = await readFile(join(dir, name), 'utf-8');
    } catch (err) {
      throw SyncError.filesystem(`Failed to read ${name}`, err);
    }
    if (matchFirewallPatterns(content).length > 0) scripts.push(name);
  }
  return scripts;
}

/** Remove the detected scripts; names are reported relative to the repository as `<prefix>/<name>`. */
export async function removeFirewallScripts(
  dir: string,
  prefix: string,
  options: { write: boolean },
): Promise<FirewallRemovalParts> {
  const scripts = await detectFirewallScripts(dir);
  const removed: string[] = [];

  for (const name of scripts) {
    if (options.write) {
      try {
        await rm(join(dir, name));
      } catch (err) {
        throw SyncError.filesystem(`Failed to remove firewall script ${prefix}/${name}`, err);
      }
    }
    removed.push(`${prefix}/${name}`);
  }
  return { filesRemoved: removed };
}
