import chalk from 'chalk';
import { createContext, loadSettings } from '../config/settings.js';
import type { CommandContext, ContextOverrides, WorkflowName } from '../config/schema.js';
import { SyncError, errorMessage } from '../core/errors.js';
import { SyncOrchestrator } from '../core/orchestrator.js';
import type { ConfirmOverwrite, WorkflowReport } from '../core/orchestrator.js';
import type { ProgressReporter } from '../core/progress.js';
import { DevcontainerCustomizer } from '../customize/customizer.js';
import { SimpleGitRunner, createGitToolkit } from '../git/index.js';
import type { GitRunner } from '../git/index.js';
import { OraProgressReporter } from '../ui/progress.js';
import { confirmOverwrite } from '../ui/prompts.js';
import { renderSummary } from '../ui/summary.js';

/** Seams swapped out by tests; the defaults talk to git and the terminal. */
export interface RunDeps {
  workingDir?: string;
  createRunner?: (context: CommandContext) => GitRunner;
  createReporter?: (context: CommandContext) => ProgressReporter;
  confirmOverwrite?: ConfirmOverwrite;
  print?: (line: string) => void;
  printError?: (line: string) => void;
}

/**
 * Run one workflow end to end and return the process exit code:
 * 0 on success, the error category's code on a SyncError, 1 otherwise.
 */
export async function runSyncCommand(
  workflow: WorkflowName,
  overrides: ContextOverrides,
  deps: RunDeps = {},
): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const printError = deps.printError ?? ((line: string) => console.error(line));
  const verbose = overrides.verbose ?? false;

  try {
    const workingDir = deps.workingDir ?? process.cwd();
    const context = createContext(workingDir, loadSettings(workingDir), overrides);
    const runner = deps.createRunner?.(context) ?? new SimpleGitRunner(workingDir, context.timeoutMs);
    const git = createGitToolkit(runner);

    const orchestrator = new SyncOrchestrator({
      git,
      customizer: new DevcontainerCustomizer(workingDir, git.commits),
      reporter: deps.createReporter?.(context) ?? new OraProgressReporter(context.verbose),
      confirmOverwrite: deps.confirmOverwrite ?? confirmOverwrite,
    });

    const report = await runWorkflow(orchestrator, workflow, context);
    for (const line of renderSummary(report, context.verbose)) print(line);
    return 0;
  } catch (err) {
    if (err instanceof SyncError) {
      printError(chalk.red(`Error: ${err.describe()}`));
      if (verbose) printError(chalk.dim(`Suggestion: ${err.suggestion}`));
      return err.exitCode;
    }
    printError(chalk.red(`Error: ${errorMessage(err)}`));
    if (verbose && err instanceof Error && err.stack) printError(chalk.dim(err.stack));
    return 1;
  }
}

function runWorkflow(
  orchestrator: SyncOrchestrator,
  workflow: WorkflowName,
  context: CommandContext,
): Promise<WorkflowReport> {
  switch (workflow) {
    case 'init':
      return orchestrator.initialize(context);
    case 'update':
      return orchestrator.update(context);
    case 'remove':
      return orchestrator.remove(context);
  }
}
