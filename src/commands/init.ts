import type { Command } from 'commander';
import { UPSTREAM } from '../config/schema.js';
import { globalFlags } from './options.js';
import { runSyncCommand } from './run.js';

export function registerInit(program: Command): void {
  program
    .command('init')
    .description(`Add ${UPSTREAM.prefix} from ${UPSTREAM.url} as a git subtree`)
    .option('--strip-firewall', 'Remove the firewall scripts and settings after syncing')
    .option('-f, --force', `Replace an existing ${UPSTREAM.prefix} without asking`)
    .action(async (opts: { stripFirewall?: boolean; force?: boolean }, command: Command) => {
      process.exitCode = await runSyncCommand('init', {
        ...globalFlags(command),
        stripFirewall: opts.stripFirewall,
        force: opts.force,
      });
    });
}
