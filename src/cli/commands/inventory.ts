/**
 * inventory command - Print one file's symbol inventory
 */

import { Command } from 'commander';
import path from 'node:path';
import { extractInventory } from '../../indexer/parsers/symbol-extractor.js';
import { errorMessage } from '../config.js';

interface InventoryCommandOptions {
  base?: string;
}

export const inventoryCommand = new Command('inventory')
  .description('Print the symbol inventory of a source file as JSON')
  .argument('<file>', 'Source file')
  .option('--base <dir>', 'Directory relative imports resolve against (defaults to the file\'s directory)')
  .action(async (file: string, options: InventoryCommandOptions) => {
    const filePath = path.resolve(file);

    try {
      const inventory = await extractInventory(
        filePath,
        options.base ? path.resolve(options.base) : undefined
      );
      console.log(JSON.stringify(inventory, null, 2));
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
