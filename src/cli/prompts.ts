import fs from 'fs/promises';
import inquirer from 'inquirer';
import chalk from 'chalk';

/**
 * Prompt for yes/no confirmation
 */
export async function promptConfirm(message: string): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message: chalk.yellow(message),
      default: false,
    },
  ]);
  return confirmed;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Decide whether an output file may be written. An existing file is only
 * questioned on an interactive terminal, when confirmation is enabled and
 * --force was not given.
 */
export async function confirmOverwrite(
  filePath: string,
  options: { force?: boolean; confirm: boolean; interactive?: boolean }
): Promise<boolean> {
  const interactive = options.interactive ?? Boolean(process.stdin.isTTY);
  if (options.force || !options.confirm || !interactive) {
    return true;
  }
  if (!(await fileExists(filePath))) {
    return true;
  }
  return promptConfirm(`${filePath} already exists. Overwrite?`);
}
