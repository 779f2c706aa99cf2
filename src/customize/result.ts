export interface FirewallRemovalParts {
  filesModified?: readonly string[];
  filesRemoved?: readonly string[];
  dockerfileChanges?: readonly string[];
  jsonChanges?: readonly string[];
  warnings?: readonly string[];
  /** Parts of the expected firewall footprint that were not present. */
  patternsNotFound?: readonly string[];
}

/**
 * Outcome of one stripping pass. Immutable: each stripping routine returns
 * its own partial result and the caller merges them.
 */
export class FirewallRemovalResult {
  readonly filesModified: readonly string[];
  readonly filesRemoved: readonly string[];
  readonly dockerfileChanges: readonly string[];
  readonly jsonChanges: readonly string[];
  readonly warnings: readonly string[];
  readonly patternsNotFound: readonly string[];

  constructor(parts: FirewallRemovalParts = {}) {
    this.filesModified = Object.freeze([...(parts.filesModified ?? [])]);
    this.filesRemoved = Object.freeze([...(parts.filesRemoved ?? [])]);
    this.dockerfileChanges = Object.freeze([...(parts.dockerfileChanges ?? [])]);
    this.jsonChanges = Object.freeze([...(parts.jsonChanges ?? [])]);
    this.warnings = Object.freeze([...(parts.warnings ?? [])]);
    this.patternsNotFound = Object.freeze([...(parts.patternsNotFound ?? [])]);
    Object.freeze(this);
  }

  static empty(): FirewallRemovalResult {
    return new FirewallRemovalResult();
  }

  merge(other: FirewallRemovalParts): FirewallRemovalResult {
    return new FirewallRemovalResult({
      filesModified: [...this.filesModified, ...(other.filesModified ?? [])],
      filesRemoved: [...this.filesRemoved, ...(other.filesRemoved ?? [])],
      dockerfileChanges: [...this.dockerfileChanges, ...(other.dockerfileChanges ?? [])],
      jsonChanges: [...this.jsonChanges, ...(other.jsonChanges ?? [])],
      warnings: [...this.warnings, ...(other.warnings ?? [])],
      patternsNotFound: [...this.patternsNotFound, ...(other.patternsNotFound ?? [])],
    });
  }

  hasChanges(): boolean {
    return this.filesModified.length > 0 || this.filesRemoved.length > 0;
  }

  hasWarnings(): boolean {
    return this.warnings.length > 0 || this.patternsNotFound.length > 0;
  }

  /** One line per recorded change, for commit messages and summaries. */
  describeChanges(): string[] {
    return [
      ...this.filesRemoved.map((file) => `Removed firewall script ${file}`),
      ...this.dockerfileChanges.map((change) => `Dockerfile: ${change}`),
      ...this.jsonChanges.map((change) => `devcontainer.json: ${change}`),
    ];
  }
}
