import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { InventoryCache, cacheFileName, createSnapshot } from '../../../src/indexer/cache.js';
import type { FileInventory } from '../../../src/types/index.js';
import { createTempProject, type TempProjectResult } from '../../helpers/fixtures.js';

function inventoryFor(filePath: string): FileInventory {
  return {
    filePath,
    dialect: 'typescript',
    classes: [],
    functions: [{ name: 'listUsers', startLine: 3, endLine: 7 }],
    variables: [],
    functionCalls: [{ name: 'fetchAll', startLine: 4, endLine: 4, kind: 'function_call' }],
    imports: [
      {
        importedName: 'fetchAll',
        localName: 'fetchAll',
        source: './store',
        kind: 'import',
        origin: null,
        line: 1,
        pathExists: false,
        usageLines: [4],
      },
    ],
  };
}

describe('cacheFileName', () => {
  it('should replace separators and swap the extension', () => {
    expect(cacheFileName('/src/routes/users.ts')).toBe('_q_src_q_routes_q_users.json');
    expect(cacheFileName('C:\\app\\index.js')).toBe('C:_q_app_q_index.json');
  });
});

describe('createSnapshot', () => {
  it('should look inventories up by path and freeze them', () => {
    const snapshot = createSnapshot([inventoryFor('/a.ts'), inventoryFor('/b.ts')]);

    expect(snapshot.size).toBe(2);
    expect(snapshot.get('/a.ts')?.functions[0]?.name).toBe('listUsers');
    expect(snapshot.get('/c.ts')).toBeUndefined();
    expect(Object.isFrozen(snapshot.get('/b.ts'))).toBe(true);
  });
});

describe('InventoryCache', () => {
  let project: TempProjectResult;
  let cache: InventoryCache;

  beforeEach(async () => {
    project = createTempProject();
    cache = new InventoryCache(project.rootDir, '.cache');
    await cache.prepare();
  });

  afterEach(() => {
    project.cleanup();
    vi.restoreAllMocks();
  });

  it('should write and read an inventory', async () => {
    const filePath = project.getFilePath('src/users.ts');
    await cache.write(inventoryFor(filePath));

    expect(fs.existsSync(cache.pathFor(filePath))).toBe(true);
    expect(await cache.read(filePath)).toEqual(inventoryFor(filePath));
  });

  it('should return null for an absent entry', async () => {
    expect(await cache.read(project.getFilePath('nothing.ts'))).toBeNull();
  });

  it('should build a snapshot of every entry', async () => {
    const users = project.getFilePath('src/users.ts');
    const orders = project.getFilePath('src/orders.ts');
    await cache.write(inventoryFor(users));
    await cache.write(inventoryFor(orders));

    const snapshot = await cache.snapshot();

    expect(snapshot.size).toBe(2);
    expect(snapshot.get(users)?.filePath).toBe(users);
    expect(snapshot.get(orders)?.imports[0]?.usageLines).toEqual([4]);
  });

  it('should skip malformed and invalid entries with a warning', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const malformed = path.join(cache.directory, 'broken.json');
    const invalid = path.join(cache.directory, 'invalid.json');
    fs.writeFileSync(malformed, '{ nope');
    fs.writeFileSync(invalid, JSON.stringify({ filePath: '/x.ts', dialect: 'ruby' }));
    fs.writeFileSync(path.join(cache.directory, 'notes.txt'), 'ignored');
    await cache.write(inventoryFor('/ok.ts'));

    const snapshot = await cache.snapshot();

    expect(snapshot.size).toBe(1);
    expect(snapshot.get('/ok.ts')).toBeDefined();
    expect(warn).toHaveBeenCalledWith(`Ignoring malformed inventory cache entry: ${malformed}`);
    expect(warn).toHaveBeenCalledWith(`Ignoring invalid inventory cache entry: ${invalid}`);
  });

  it('should give an empty snapshot when the directory is missing', async () => {
    cache.dispose();

    const snapshot = await cache.snapshot();

    expect(snapshot.size).toBe(0);
  });

  it('should remove the directory on dispose', async () => {
    await cache.write(inventoryFor('/ok.ts'));

    cache.dispose();

    expect(fs.existsSync(cache.directory)).toBe(false);
  });
});
