/**
 * Transient on-disk inventory cache and the read-only snapshot built from it
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import type { FileInventory, InventorySnapshot } from '../types/index.js';

/**
 * Replaces path separators in cache file names
 */
export const CACHE_PATH_SENTINEL = '_q_';

const spanSchema = z.object({
  name: z.string(),
  startLine: z.number().int().min(1),
  endLine: z.number().int().min(1),
});

const fileInventorySchema: z.ZodType<FileInventory> = z.object({
  filePath: z.string(),
  dialect: z.enum(['javascript', 'typescript', 'tsx']),
  classes: z.array(spanSchema),
  functions: z.array(spanSchema),
  variables: z.array(spanSchema),
  functionCalls: z.array(spanSchema.extend({ kind: z.enum(['function_call', 'method_call']) })),
  imports: z.array(z.object({
    importedName: z.string(),
    localName: z.string().nullable(),
    source: z.string(),
    kind: z.enum(['import', 'require']),
    origin: z.string().nullable(),
    line: z.number().int().min(1),
    pathExists: z.boolean(),
    usageLines: z.array(z.number().int().min(1)),
  })),
});

/**
 * `/src/routes/users.ts` → `_q_src_q_routes_q_users.json`
 */
export function cacheFileName(filePath: string): string {
  const sanitized = filePath.replace(/[\\/]/g, CACHE_PATH_SENTINEL);
  const ext = path.extname(sanitized);
  const stem = ext ? sanitized.slice(0, -ext.length) : sanitized;
  return `${stem}.json`;
}

class FrozenSnapshot implements InventorySnapshot {
  constructor(private readonly entries: ReadonlyMap<string, FileInventory>) {}

  get(filePath: string): FileInventory | undefined {
    return this.entries.get(filePath);
  }

  get size(): number {
    return this.entries.size;
  }
}

export function createSnapshot(inventories: Iterable<FileInventory>): InventorySnapshot {
  const entries = new Map<string, FileInventory>();
  for (const inventory of inventories) {
    entries.set(inventory.filePath, Object.freeze(inventory));
  }
  return new FrozenSnapshot(entries);
}

export class InventoryCache {
  readonly directory: string;

  constructor(rootDirectory: string, cacheDirName: string) {
    this.directory = path.join(rootDirectory, cacheDirName);
  }

  async prepare(): Promise<void> {
    await fs.promises.mkdir(this.directory, { recursive: true });
  }

  pathFor(filePath: string): string {
    return path.join(this.directory, cacheFileName(filePath));
  }

  async write(inventory: FileInventory): Promise<void> {
    await fs.promises.writeFile(this.pathFor(inventory.filePath), JSON.stringify(inventory, null, 2), 'utf-8');
  }

  /**
   * Load one cached inventory; null when absent or unreadable
   */
  async read(filePath: string): Promise<FileInventory | null> {
    return this.readEntry(this.pathFor(filePath));
  }

  /**
   * Load every cached inventory into a frozen lookup
   */
  async snapshot(): Promise<InventorySnapshot> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.directory);
    } catch {
      return createSnapshot([]);
    }

    const inventories: FileInventory[] = [];
    for (const name of names.sort()) {
      if (!name.endsWith('.json')) continue;
      const inventory = await this.readEntry(path.join(this.directory, name));
      if (inventory) inventories.push(inventory);
    }
    return createSnapshot(inventories);
  }

  /**
   * Remove the cache directory (best effort)
   */
  dispose(): void {
    try {
      fs.rmSync(this.directory, { recursive: true, force: true });
    } catch (error) {
      console.warn(`Could not remove inventory cache ${this.directory}: ${error instanceof Error ? error.message : error}`);
    }
  }

  private async readEntry(entryPath: string): Promise<FileInventory | null> {
    let content: string;
    try {
      content = await fs.promises.readFile(entryPath, 'utf-8');
    } catch {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      console.warn(`Ignoring malformed inventory cache entry: ${entryPath}`);
      return null;
    }

    const result = fileInventorySchema.safeParse(raw);
    if (!result.success) {
      console.warn(`Ignoring invalid inventory cache entry: ${entryPath}`);
      return null;
    }
    return result.data;
  }
}
