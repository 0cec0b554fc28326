/**
 * generate command - Build an OpenAPI document for a source tree
 */

import { Command } from 'commander';
import path from 'node:path';
import { generateOpenApi } from '../../pipeline/index.js';
import { errorMessage, resolveConfig, withOverrides } from '../config.js';

interface GenerateCommandOptions {
  config?: string;
  host?: string;
  title?: string;
  workers?: string;
  quiet?: boolean;
}

export function progressMessage(completed: number, elapsedMs: number): string {
  return `Completed generating endpoint information for ${completed} endpoints in ${Math.floor(elapsedMs / 1000)} seconds`;
}

export const generateCommand = new Command('generate')
  .description('Detect endpoints and print an OpenAPI document')
  .argument('[directory]', 'Directory to scan', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('--host <url>', 'Server URL for the document')
  .option('--title <title>', 'Document title (defaults to the directory name)')
  .option('--workers <n>', 'Concurrent endpoint jobs (1-5)')
  .option('--quiet', 'Suppress progress output', false)
  .action(async (directory: string, options: GenerateCommandOptions) => {
    const rootDirectory = path.resolve(directory);

    try {
      const baseConfig = await resolveConfig(rootDirectory, options.config);
      const config = withOverrides(baseConfig, {
        host: options.host,
        title: options.title,
        maxWorkers: options.workers === undefined ? undefined : Number(options.workers),
      });

      const progress = { latest: '' };
      const document = await generateOpenApi(rootDirectory, config, {
        onProgress: (completed, _total, elapsedMs) => {
          progress.latest = progressMessage(completed, elapsedMs);
        },
      });

      // stdout carries the document
      if (progress.latest && !options.quiet) {
        console.error(progress.latest);
      }
      console.log(JSON.stringify(document, null, 2));
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
