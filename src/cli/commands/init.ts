/**
 * init command - Write a default config file
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { CONFIG_FILE_NAMES, getDefaultConfig } from '../../config/index.js';
import { errorMessage } from '../config.js';

interface InitOptions {
  force?: boolean;
  gitignore?: boolean;
}

// ANSI colors for terminal output
const colors = {
  reset: '\x1b[0m',
  green: '\x1b[32m',
  blue: '\x1b[34m',
};

function logSuccess(message: string): void {
  console.log(`${colors.green}✓${colors.reset} ${message}`);
}

function logInfo(message: string): void {
  console.log(`${colors.blue}ℹ${colors.reset} ${message}`);
}

export const DEFAULT_CONFIG_FILE = CONFIG_FILE_NAMES[0] ?? 'routescribe.config.json';

/**
 * Write the default config; refuses to replace an existing file unless forced
 */
export async function writeDefaultConfig(projectPath: string, force = false): Promise<string> {
  const configPath = path.join(projectPath, DEFAULT_CONFIG_FILE);

  if (fs.existsSync(configPath) && !force) {
    throw new Error(`${DEFAULT_CONFIG_FILE} already exists (use --force to overwrite)`);
  }

  await fs.promises.writeFile(configPath, JSON.stringify(getDefaultConfig(), null, 2) + '\n');
  return configPath;
}

/**
 * Add the inventory cache directory to .gitignore
 */
export async function updateGitignore(projectPath: string, cacheDirName: string): Promise<boolean> {
  const gitignorePath = path.join(projectPath, '.gitignore');
  const entry = `${cacheDirName}/`;

  if (fs.existsSync(gitignorePath)) {
    const content = await fs.promises.readFile(gitignorePath, 'utf-8');
    if (content.split(/\r?\n/).some(line => line.trim() === entry || line.trim() === cacheDirName)) {
      return false;
    }
    await fs.promises.writeFile(gitignorePath, content.trimEnd() + '\n\n# routescribe inventory cache\n' + entry + '\n');
    return true;
  }

  await fs.promises.writeFile(gitignorePath, '# routescribe inventory cache\n' + entry + '\n');
  return true;
}

export const initCommand = new Command('init')
  .description('Create a default routescribe.config.json')
  .argument('[directory]', 'Project directory', '.')
  .option('-f, --force', 'Overwrite an existing config file', false)
  .option('--no-gitignore', 'Leave .gitignore untouched')
  .action(async (directory: string, options: InitOptions) => {
    const projectPath = path.resolve(directory);

    try {
      const configPath = await writeDefaultConfig(projectPath, options.force);
      logSuccess(`Created ${path.relative(process.cwd(), configPath) || configPath}`);

      if (options.gitignore !== false) {
        const { cacheDirName } = getDefaultConfig();
        if (await updateGitignore(projectPath, cacheDirName)) {
          logSuccess(`Added ${cacheDirName}/ to .gitignore`);
        } else {
          logInfo(`${cacheDirName}/ already in .gitignore`);
        }
      }
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
