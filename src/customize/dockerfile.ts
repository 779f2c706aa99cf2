import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { SyncError } from '../core/errors.js';
import { FIREWALL_PACKAGES, INSTALL_COMMANDS, SECTION_MARKER, SECTION_SENTINEL } from './patterns.js';
import type { FirewallRemovalParts } from './result.js';

/**
 * Where the single forward pass over the Dockerfile stands:
 * - normal: lines pass through verbatim
 * - firewall-section: from the marker comment through the sentinel, all dropped
 * - package-install: inside a continued `apt-get install`, firewall packages dropped
 */
export type DockerfileState = 'normal' | 'firewall-section' | 'package-install';

export const SECTION_REMOVED = 'Removed firewall setup section';
export const PACKAGES_REMOVED = 'Removed firewall packages from apt install';

export interface DockerfileStripResult {
  content: string;
  changes: string[];
}

export function stripDockerfileFirewall(content: string): DockerfileStripResult {
  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  const lines = content.split(/\r?\n/);
  const trailingNewline = lines.length > 1 && lines[lines.length - 1] === '';
  if (trailingNewline) lines.pop();

  const output: string[] = [];
  const changes: string[] = [];
  const record = (change: string): void => {
    if (!changes.includes(change)) changes.push(change);
  };
  let state: DockerfileState = 'normal';

  for (const line of lines) {
    if (state === 'firewall-section') {
      if (line.trim() === SECTION_SENTINEL) state = 'normal';
      continue;
    }

    if (line.includes(SECTION_MARKER)) {
      state = 'firewall-section';
      record(SECTION_REMOVED);
      continue;
    }

    if (state === 'normal' && !opensInstall(line)) {
      output.push(line);
      continue;
    }

    const continued = hasContinuation(line);
    const stripped = removePackages(line);
    if (stripped.removed) record(PACKAGES_REMOVED);

    if (stripped.text !== null) {
      output.push(stripped.text);
    } else if (!continued) {
      // The invocation's last line vanished: the line before must stop continuing.
      endContinuation(output);
    }
    state = continued ? 'package-install' : 'normal';
  }

  if (trailingNewline) output.push('');
  return { content: output.join(eol), changes };
}

function opensInstall(line: string): boolean {
  return INSTALL_COMMANDS.some((command) => line.includes(command));
}

function hasContinuation(line: string): boolean {
  return /\\\s*$/.test(line);
}

function endContinuation(output: string[]): void {
  const last = output.length - 1;
  if (last >= 0 && hasContinuation(output[last])) {
    output[last] = output[last].replace(/\s*\\\s*$/, '');
  }
}

/** `iptables`, `iptables=1.8.9-2`, `iptables:amd64`; a glued continuation `iptables\` too. */
function isFirewallPackage(token: string): boolean {
  return FIREWALL_PACKAGES.has(token.replace(/\\$/, '').split(/[=:]/)[0]);
}

interface Token {
  text: string;
  start: number;
  end: number;
}

/**
 * Drop firewall packages from one line of an install invocation, matching
 * whole whitespace-separated tokens only. Each removed token takes the
 * whitespace on one side with it; every other character stays as it was.
 * `text` is null when nothing but firewall packages was on the line.
 */
export function removePackages(line: string): { text: string | null; removed: boolean } {
  const tokens: Token[] = [...line.matchAll(/\S+/g)].map((match) => {
    const start = match.index ?? 0;
    return { text: match[0], start, end: start + match[0].length };
  });

  const cuts: Array<[number, number]> = [];
  let keptBefore = false;
  let keptWords = 0;
  tokens.forEach((token, i) => {
    if (!isFirewallPackage(token.text)) {
      keptBefore = true;
      if (token.text !== '\\') keptWords++;
      return;
    }
    // A glued trailing backslash is not part of the package.
    const end = token.text.endsWith('\\') ? token.end - 1 : token.end;
    if (keptBefore) {
      cuts.push([tokens[i - 1].end, end]);
    } else {
      const next = tokens[i + 1];
      cuts.push([token.start, next && end === token.end ? next.start : end]);
    }
  });

  if (cuts.length === 0) return { text: line, removed: false };
  if (keptWords === 0) return { text: null, removed: true };

  let text = '';
  let cursor = 0;
  for (const [from, to] of cuts) {
    if (from > cursor) text += line.slice(cursor, from);
    cursor = Math.max(cursor, to);
  }
  text += line.slice(cursor);
  return { text, removed: true };
}

export async function stripDockerfileFile(
  path: string,
  displayPath: string,
  options: { write: boolean },
): Promise<FirewallRemovalParts> {
  if (!existsSync(path)) return { warnings: ['Dockerfile not found'] };

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw SyncError.filesystem('Failed to read Dockerfile', err, 'Check file permissions and ensure the file exists');
  }

  const stripped = stripDockerfileFirewall(content);
  const patternsNotFound: string[] = [];
  if (!stripped.changes.includes(SECTION_REMOVED)) patternsNotFound.push(`${displayPath}: ${SECTION_MARKER}`);
  if (!stripped.changes.includes(PACKAGES_REMOVED)) patternsNotFound.push(`${displayPath}: firewall packages`);
  if (stripped.changes.length === 0) return { patternsNotFound };

  if (options.write) {
    try {
      await writeFile(path, stripped.content, 'utf-8');
    } catch (err) {
      throw SyncError.filesystem('Failed to write modified Dockerfile', err, 'Check file permissions and available disk space');
    }
  }
  return { filesModified: [displayPath], dockerfileChanges: stripped.changes, patternsNotFound };
}
