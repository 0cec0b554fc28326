#!/usr/bin/env node

/**
 * routescribe CLI
 */

import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { endpointsCommand } from './commands/endpoints.js';
import { inventoryCommand } from './commands/inventory.js';
import { initCommand } from './commands/init.js';

const program = new Command();

program
  .name('routescribe')
  .description('Static HTTP endpoint discovery and OpenAPI generation for JavaScript and TypeScript services')
  .version('0.1.0');

// Register commands
program.addCommand(initCommand);
program.addCommand(generateCommand);
program.addCommand(endpointsCommand);
program.addCommand(inventoryCommand);

await program.parseAsync(process.argv);
