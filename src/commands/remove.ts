import type { Command } from 'commander';
import { UPSTREAM } from '../config/schema.js';
import { globalFlags } from './options.js';
import { runSyncCommand } from './run.js';

export function registerRemove(program: Command): void {
  program
    .command('remove')
    .description('Stop tracking the upstream devcontainer and clean up its remote and branches')
    .option('--keep-files', `Leave ${UPSTREAM.prefix} in the working tree`)
    .action(async (opts: { keepFiles?: boolean }, command: Command) => {
      process.exitCode = await runSyncCommand('remove', {
        ...globalFlags(command),
        keepFiles: opts.keepFiles,
      });
    });
}
