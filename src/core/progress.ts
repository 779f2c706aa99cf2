export const STEP_LABELS = {
  'validate-repository': 'Validating repository',
  'clear-existing': 'Removing existing devcontainer',
  'add-remote': 'Adding upstream remote',
  'fetch-remote': 'Fetching upstream repository',
  'create-tracking-branch': 'Creating tracking branch',
  'checkout-tracking-branch': 'Switching to tracking branch',
  'reset-tracking-branch': 'Updating tracking branch',
  'split-subtree': 'Extracting devcontainer subtree',
  'checkout-base-branch': 'Returning to base branch',
  'add-subtree': 'Adding devcontainer files',
  'merge-subtree': 'Applying devcontainer updates',
  'create-backup': 'Creating backup',
  'strip-firewall': 'Stripping firewall configurations',
  'remove-remote': 'Removing upstream remote',
  'delete-tracking-branch': 'Deleting tracking branch',
  'delete-extraction-branches': 'Cleaning up subtree branches',
  'remove-files': 'Removing devcontainer files',
} as const satisfies Record<string, string>;

export type SyncStep = keyof typeof STEP_LABELS;

/**
 * Receives workflow progress. The orchestrator reports through this and
 * never prints on its own.
 */
export interface ProgressReporter {
  stepStarted(step: SyncStep): void;
  stepFinished(step: SyncStep): void;
  /** An optional step failed; the workflow carries on. */
  stepWarned(step: SyncStep, message: string): void;
  /** A required step failed; the workflow stops after this. */
  stepFailed(step: SyncStep, error: unknown): void;
  stepSkipped(step: SyncStep, reason: string): void;
  /** Extra information, shown in verbose mode. */
  detail(message: string): void;
}
