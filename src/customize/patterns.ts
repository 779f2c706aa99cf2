/**
 * Fragments that identify the upstream firewall feature. Substring and regex
 * matching only, so reformatting upstream does not defeat detection; when
 * upstream renames something, this is the file to update.
 */
export const FIREWALL_PATTERNS: readonly RegExp[] = [
  /iptables\s*\\?/,
  /ipset\s*\\?/,
  /iproute2\s*\\?/,
  /dnsutils\s*\\?/,
  /aggregate\s*\\?/,
  /--cap-add=NET_ADMIN/,
  /--cap-add=NET_RAW/,
  /init-firewall\.sh/,
  /firewall.*\.sh/,
  /postStartCommand.*firewall/,
  /waitFor.*postStartCommand/,
];

/** Removed whenever present, whatever they contain. */
export const FIREWALL_SCRIPT_NAMES: readonly string[] = ['init-firewall.sh', 'firewall.sh', 'iptables.sh'];

/** Packages installed only for the firewall. */
export const FIREWALL_PACKAGES: ReadonlySet<string> = new Set([
  'iptables',
  'ipset',
  'iproute2',
  'dnsutils',
  'aggregate',
]);

export const FIREWALL_CAPABILITIES: readonly string[] = ['--cap-add=NET_ADMIN', '--cap-add=NET_RAW'];

// ─── devcontainer.json ─────────────────────────────────────────────

export const RUN_ARGS_FIELD = 'runArgs';
export const POST_START_FIELD = 'postStartCommand';
export const WAIT_FOR_FIELD = 'waitFor';
export const FEATURE_NAME = 'firewall';

// ─── Dockerfile ────────────────────────────────────────────────────

export const SECTION_MARKER = '# Copy and set up firewall script';
export const SECTION_SENTINEL = 'USER node';
export const INSTALL_COMMANDS: readonly string[] = ['apt-get install', 'apt install'];

/** Every pattern that matches somewhere in `content`, as the matched text. */
export function matchFirewallPatterns(content: string): string[] {
  const matches: string[] = [];
  for (const pattern of FIREWALL_PATTERNS) {
    const match = pattern.exec(content);
    if (match) matches.push(match[0]);
  }
  return matches;
}
