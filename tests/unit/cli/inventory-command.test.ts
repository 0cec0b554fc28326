import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { printed, spyOnOutput, type OutputSpies } from '../../helpers/console.js';
import { createTempProject, SAMPLE_DB, SAMPLE_ROUTES, type TempProjectResult } from '../../helpers/fixtures.js';

describe('CLI inventory command', () => {
  let project: TempProjectResult;
  let output: OutputSpies;

  beforeEach(() => {
    vi.resetModules();
    output = spyOnOutput();
    project = createTempProject({ 'src/routes.ts': SAMPLE_ROUTES, 'src/db.ts': SAMPLE_DB });
  });

  afterEach(() => {
    project.cleanup();
    vi.restoreAllMocks();
  });

  it('prints the inventory of a file as JSON', async () => {
    const { inventoryCommand } = await import('../../../src/cli/commands/inventory.js');
    await inventoryCommand.parseAsync([project.getFilePath('src/routes.ts')], { from: 'user' });

    const inventory = JSON.parse(printed(output.log).join('\n'));
    expect(inventory.filePath).toBe(project.getFilePath('src/routes.ts'));
    expect(inventory.dialect).toBe('typescript');
    expect(inventory.functions).toEqual([
      { name: 'loadWidget', startLine: 6, endLine: 8 },
      { name: 'handler', startLine: 10, endLine: 13 },
    ]);
    expect(inventory.imports[1]).toMatchObject({ localName: 'db', origin: project.getFilePath('src/db.ts') });
  });

  it('resolves relative imports against --base', async () => {
    const { inventoryCommand } = await import('../../../src/cli/commands/inventory.js');
    await inventoryCommand.parseAsync([project.getFilePath('src/routes.ts'), '--base', project.rootDir], {
      from: 'user',
    });

    const inventory = JSON.parse(printed(output.log).join('\n'));
    expect(inventory.imports[1]).toMatchObject({ localName: 'db', origin: null, pathExists: false });
  });

  it('exits with an error for a missing file', async () => {
    const { inventoryCommand } = await import('../../../src/cli/commands/inventory.js');

    await expect(
      inventoryCommand.parseAsync([project.getFilePath('src/none.ts')], { from: 'user' })
    ).rejects.toThrow('process.exit(1)');
    expect(printed(output.error)).toEqual(['Error:']);
  });
});
