import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';
import { SyncError, errorMessage } from '../core/errors.js';
import { STEP_LABELS } from '../core/progress.js';
import type { ProgressReporter, SyncStep } from '../core/progress.js';

/** One spinner per workflow step; details only in verbose mode. */
export class OraProgressReporter implements ProgressReporter {
  private spinner: Ora | undefined;

  constructor(private readonly verbose: boolean) {}

  stepStarted(step: SyncStep): void {
    this.spinner = ora(`${STEP_LABELS[step]}...`).start();
  }

  stepFinished(step: SyncStep): void {
    this.settle().succeed(STEP_LABELS[step]);
  }

  stepWarned(_step: SyncStep, message: string): void {
    this.settle().warn(chalk.yellow(message));
  }

  stepFailed(step: SyncStep, error: unknown): void {
    const reason = error instanceof SyncError ? error.message.split('\n')[0] : errorMessage(error);
    this.settle().fail(`${STEP_LABELS[step]}: ${chalk.red(reason)}`);
  }

  stepSkipped(step: SyncStep, reason: string): void {
    console.log(chalk.dim(`  - ${STEP_LABELS[step]} (skipped: ${reason})`));
  }

  detail(message: string): void {
    if (!this.verbose) return;
    const line = chalk.dim(`    ${message}`);
    if (this.spinner?.isSpinning) {
      // Keep the spinner line intact below the detail.
      this.spinner.clear();
      console.log(line);
      this.spinner.render();
      return;
    }
    console.log(line);
  }

  private settle(): Ora {
    const spinner = this.spinner ?? ora();
    this.spinner = undefined;
    return spinner;
  }
}
