import type { Command } from 'commander';
import { UPSTREAM } from '../config/schema.js';
import { globalFlags } from './options.js';
import { runSyncCommand } from './run.js';

export function registerUpdate(program: Command): void {
  program
    .command('update')
    .description(`Pull the latest upstream ${UPSTREAM.prefix} into this repository`)
    .option('--backup', `Copy ${UPSTREAM.prefix} aside before merging`)
    .option('-f, --force', 'Recreate the tracking branch if it is missing')
    .option('--strip-firewall', 'Remove the firewall scripts and settings after merging')
    .action(async (opts: { backup?: boolean; force?: boolean; stripFirewall?: boolean }, command: Command) => {
      process.exitCode = await runSyncCommand('update', {
        ...globalFlags(command),
        backup: opts.backup,
        force: opts.force,
        stripFirewall: opts.stripFirewall,
      });
    });
}
