/**
 * endpoints command - List detected HTTP endpoints
 */

import { Command } from 'commander';
import path from 'node:path';
import { findSourceFiles } from '../../indexer/walker.js';
import { discoverEndpoints } from '../../pipeline/index.js';
import type { EndpointRecord } from '../../types/index.js';
import { errorMessage, resolveConfig } from '../config.js';

interface EndpointsCommandOptions {
  config?: string;
  json?: boolean;
}

export function formatEndpointLine(endpoint: EndpointRecord, rootDirectory: string): string {
  const location = `${path.relative(rootDirectory, endpoint.filePath)}:${endpoint.startLine}-${endpoint.endLine}`;
  return `${endpoint.method.padEnd(7)} ${endpoint.route ?? '(unknown route)'}  ${location} [${endpoint.tier}]`;
}

export const endpointsCommand = new Command('endpoints')
  .description('List HTTP endpoints found in a source tree')
  .argument('[directory]', 'Directory to scan', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Output as JSON', false)
  .action(async (directory: string, options: EndpointsCommandOptions) => {
    const rootDirectory = path.resolve(directory);

    try {
      const config = await resolveConfig(rootDirectory, options.config);
      const files = await findSourceFiles(rootDirectory, [...config.ignoredDirs, config.cacheDirName]);
      const endpoints = await discoverEndpoints(files);

      if (options.json) {
        console.log(JSON.stringify(endpoints, null, 2));
        return;
      }

      for (const endpoint of endpoints) {
        console.log(formatEndpointLine(endpoint, rootDirectory));
      }
      console.log(`\n${endpoints.length} endpoint(s) found`);
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
