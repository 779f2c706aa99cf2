import type { Command } from 'commander';
import type { ContextOverrides } from '../config/schema.js';

/** `-v/--verbose` and `--dry-run` are declared on the root program. */
export function globalFlags(command: Command): Pick<ContextOverrides, 'verbose' | 'dryRun'> {
  const opts = command.optsWithGlobals<{ verbose?: boolean; dryRun?: boolean }>();
  return { verbose: opts.verbose, dryRun: opts.dryRun };
}
