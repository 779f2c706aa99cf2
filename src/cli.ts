#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, APP_VERSION } from './config/branding.js';
import { registerInit } from './commands/init.js';
import { registerUpdate } from './commands/update.js';
import { registerRemove } from './commands/remove.js';

const program = new Command();

program
  .name(APP_NAME)
  .description('Keep a repository\'s .devcontainer in sync with upstream via git subtree')
  .version(APP_VERSION)
  .option('-v, --verbose', 'Show detailed progress and error suggestions')
  .option('--dry-run', 'Show what would happen without changing anything');

registerInit(program);
registerUpdate(program);
registerRemove(program);

await program.parseAsync(process.argv);
