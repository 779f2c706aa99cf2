import { confirm } from '@inquirer/prompts';

/**
 * Ask before replacing an existing devcontainer directory. Ctrl+C at the
 * prompt counts as "no".
 */
export async function confirmOverwrite(prefix: string): Promise<boolean> {
  try {
    return await confirm({
      message: `${prefix} already exists. Replace it with the upstream version?`,
      default: false,
    });
  } catch (err) {
    if (err instanceof Error && err.name === 'ExitPromptError') return false;
    throw err;
  }
}
