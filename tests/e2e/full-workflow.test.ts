/**
 * E2E: source tree → inventories → endpoints → context → OpenAPI document
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import { getDefaultConfig } from '../../src/config/loader.js';
import type { FragmentGenerator, FragmentRequest } from '../../src/openapi/generator.js';
import { SkeletonFragmentGenerator } from '../../src/openapi/generator.js';
import { generateOpenApi } from '../../src/pipeline/index.js';
import type { OpenApiFragment } from '../../src/types/index.js';
import {
  createTempProject,
  SAMPLE_CONTROLLER,
  SAMPLE_DB,
  SAMPLE_ROUTES,
  type TempProjectResult,
} from '../helpers/fixtures.js';

const NO_GIT = { commit: null, repositoryUrl: null };
const GENERATED_AT = new Date('2024-05-06T07:08:09.000Z');

class CapturingGenerator implements FragmentGenerator {
  readonly requests: FragmentRequest[] = [];
  private inner = new SkeletonFragmentGenerator();

  async generate(request: FragmentRequest): Promise<OpenApiFragment> {
    this.requests.push(request);
    return this.inner.generate(request);
  }
}

describe('E2E: Full Workflow', () => {
  let project: TempProjectResult;

  beforeEach(() => {
    project = createTempProject({ 'src/routes.ts': SAMPLE_ROUTES, 'src/db.ts': SAMPLE_DB });
  });

  afterEach(() => {
    project.cleanup();
    vi.restoreAllMocks();
  });

  it('should generate a document for an Express-style router', async () => {
    const config = { ...getDefaultConfig(), title: 'Widgets' };

    const document = await generateOpenApi(project.rootDir, config, { git: NO_GIT, generatedAt: GENERATED_AT });

    expect(document).toEqual({
      openapi: '3.0.0',
      info: {
        title: 'Widgets',
        version: '1.0.0',
        description: 'Generated from static analysis of the source tree.',
        'x-generated-at': '2024-05-06T07:08:09.000Z',
        'x-commit-reference': null,
        'x-repository-url': null,
      },
      servers: [{ url: 'https://api.example.com' }],
      paths: {
        '/widgets/{id}': {
          get: {
            summary: 'GET /widgets/{id}',
            responses: { '200': { description: 'Successful response' } },
            parameters: [{ name: 'id', in: 'path', required: true, schema: { type: 'string' } }],
          },
        },
      },
    });
  });

  it('should hand the generator the handler and its context blocks', async () => {
    const generator = new CapturingGenerator();

    await generateOpenApi(project.rootDir, getDefaultConfig(), { git: NO_GIT, generator });

    expect(generator.requests).toHaveLength(1);
    const [request] = generator.requests;
    expect(request?.route).toBe('/widgets/{id}');
    expect(request?.handlerLines).toEqual(["router.get('/widgets/:id', handler);"]);
    expect(request?.contextBlocks.map(block => block[0])).toEqual([
      'function handler(req: any, res: any) {',
      'function loadWidget(id: string) {',
      'export const db = {',
    ]);
  });

  it('should remove the inventory cache afterwards', async () => {
    const config = getDefaultConfig();

    await generateOpenApi(project.rootDir, config, { git: NO_GIT });

    expect(fs.existsSync(project.getFilePath(config.cacheDirName))).toBe(false);
  });

  it('should default the title to the directory name', async () => {
    const document = await generateOpenApi(project.rootDir, getDefaultConfig(), { git: NO_GIT });

    expect(document.info.title).toBe(project.rootDir.split(/[\\/]/).pop());
  });

  it('should merge controller and router endpoints and report progress', async () => {
    project.addFile('src/users.controller.ts', SAMPLE_CONTROLLER);
    const progress: Array<[number, number]> = [];

    const document = await generateOpenApi(project.rootDir, { ...getDefaultConfig(), maxWorkers: 2 }, {
      git: NO_GIT,
      onProgress: (completed, total) => progress.push([completed, total]),
    });

    expect(Object.keys(document.paths).sort()).toEqual(['/users/', '/users/{id}', '/widgets/{id}']);
    expect(Object.keys(document.paths['/users/'] ?? {})).toEqual(['post']);
    expect(progress).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });

  it('should hand endpoints without a literal route to the generator', async () => {
    project.addFile('src/app.js', 'app.get(`/dyn/${name}`, handler);\n');
    const generator = new CapturingGenerator();

    const document = await generateOpenApi(project.rootDir, { ...getDefaultConfig(), maxWorkers: 1 }, {
      git: NO_GIT,
      generator,
    });

    expect(generator.requests.map(request => request.route)).toEqual([null, '/widgets/{id}']);
    expect(generator.requests[0]?.handlerLines).toEqual(['app.get(`/dyn/${name}`, handler);']);
    expect(Object.keys(document.paths)).toEqual(['/widgets/{id}']);
  });

  it('should keep going when a fragment fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const failing: FragmentGenerator = {
      generate: async () => {
        throw new Error('model unavailable');
      },
    };

    const document = await generateOpenApi(project.rootDir, getDefaultConfig(), { git: NO_GIT, generator: failing });

    expect(document.paths).toEqual({});
    expect(warn).toHaveBeenCalledWith(
      `Fragment generation failed for GET /widgets/{id} (${project.getFilePath('src/routes.ts')}:15): model unavailable`
    );
    expect(fs.existsSync(project.getFilePath('.routescribe-inventory'))).toBe(false);
  });

  it('should remove the inventory cache when the run fails', async () => {
    const onProgress = () => {
      throw new Error('progress sink closed');
    };

    await expect(
      generateOpenApi(project.rootDir, getDefaultConfig(), { git: NO_GIT, onProgress })
    ).rejects.toThrow('progress sink closed');

    expect(fs.existsSync(project.getFilePath('.routescribe-inventory'))).toBe(false);
  });

  it('should reject a missing root directory without creating it', async () => {
    const missing = project.getFilePath('services/none');

    await expect(generateOpenApi(missing, getDefaultConfig(), { git: NO_GIT })).rejects.toThrow(
      `Directory not found: ${missing}`
    );
    expect(fs.existsSync(missing)).toBe(false);
  });

  it('should return an empty document for a tree without endpoints', async () => {
    const empty = createTempProject({ 'lib/util.ts': 'export const add = (a: number, b: number) => a + b;\n' });
    try {
      const document = await generateOpenApi(empty.rootDir, getDefaultConfig(), { git: NO_GIT });

      expect(document.paths).toEqual({});
      expect(fs.existsSync(empty.getFilePath('.routescribe-inventory'))).toBe(false);
    } finally {
      empty.cleanup();
    }
  });
});
