import { existsSync } from 'node:fs';
import { cp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { APP_NAME } from '../config/branding.js';
import { BACKUP_SUFFIX } from '../config/schema.js';
import { SyncError } from './errors.js';

/**
 * Copy `<prefix>` to `<prefix>.backup`, replacing any earlier backup.
 * Returns the backup directory relative to the working directory.
 */
export async function createBackup(workingDir: string, prefix: string): Promise<string> {
  const source = join(workingDir, prefix);
  const backup = `${prefix}${BACKUP_SUFFIX}`;
  const target = join(workingDir, backup);

  if (!existsSync(source)) {
    throw new SyncError({
      category: 'filesystem',
      code: 'IO',
      message: `No ${prefix} directory found to backup`,
      suggestion: `Run '${APP_NAME} init' first to create the devcontainer configuration`,
    });
  }

  try {
    await rm(target, { recursive: true, force: true });
  } catch (err) {
    throw SyncError.filesystem('Failed to remove existing backup directory', err);
  }
  try {
    await cp(source, target, { recursive: true });
  } catch (err) {
    throw SyncError.filesystem('Failed to create backup', err, 'Check file permissions and available disk space');
  }
  return backup;
}
