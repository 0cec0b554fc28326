import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  detectEndpoints,
  detectEndpointsInSource,
  endpointKey,
  parseForDetection,
} from '../../../src/endpoints/detector.js';
import { detectTextEndpoints, findMatchingBrace, lineAt } from '../../../src/endpoints/text-tier.js';
import { combineRoutePaths } from '../../../src/endpoints/decorator-tier.js';
import { createTempProject, SAMPLE_CONTROLLER, type TempProjectResult } from '../../helpers/fixtures.js';

const EXPRESS_SOURCE = [
  'const app = express();',
  "app.get('/items', listItems);",
  'userRouter.post(`/users`, auth, createUser);',
  "cache.get('/items');",
  'app.delete(`/items/${id}`, removeItem);',
  '',
].join('\n');

describe('combineRoutePaths', () => {
  it('should join a prefix and a path with one slash', () => {
    expect(combineRoutePaths('/users', ':id')).toBe('/users/:id');
    expect(combineRoutePaths('users/', '/:id')).toBe('/users/:id');
    expect(combineRoutePaths('//users//', '//list')).toBe('/users/list');
  });

  it('should treat missing parts as the root', () => {
    expect(combineRoutePaths(null, 'health')).toBe('/health');
    expect(combineRoutePaths('', null)).toBe('/');
    expect(combineRoutePaths('/users', null)).toBe('/users/');
  });
});

describe('call tier', () => {
  it('should detect verb calls on route objects', () => {
    const endpoints = detectEndpointsInSource('/svc/app.js', EXPRESS_SOURCE);

    expect(endpoints).toEqual([
      {
        method: 'GET',
        route: '/items',
        filePath: '/svc/app.js',
        startLine: 2,
        endLine: 2,
        tier: 'call',
        handlerNames: ['listItems'],
      },
      {
        method: 'POST',
        route: '/users',
        filePath: '/svc/app.js',
        startLine: 3,
        endLine: 3,
        tier: 'call',
        handlerNames: ['auth', 'createUser'],
      },
      {
        method: 'DELETE',
        route: null,
        filePath: '/svc/app.js',
        startLine: 5,
        endLine: 5,
        tier: 'call',
        handlerNames: ['removeItem'],
      },
    ]);
  });

  it('should span multi-line registrations', () => {
    const source = ["router.put('/items/:id', (req, res) => {", '  res.end();', '});', ''].join('\n');

    const [endpoint] = detectEndpointsInSource('/svc/items.ts', source);

    expect(endpoint?.startLine).toBe(1);
    expect(endpoint?.endLine).toBe(3);
    expect(endpoint?.handlerNames).toEqual([]);
  });
});

describe('decorator tier', () => {
  it('should compose controller prefixes with verb decorators', () => {
    const endpoints = detectEndpointsInSource('/svc/users.controller.ts', SAMPLE_CONTROLLER);

    expect(endpoints).toEqual([
      {
        method: 'GET',
        route: '/users/:id',
        filePath: '/svc/users.controller.ts',
        startLine: 5,
        endLine: 8,
        tier: 'decorator',
        handlerNames: [],
      },
      {
        method: 'POST',
        route: '/users/',
        filePath: '/svc/users.controller.ts',
        startLine: 10,
        endLine: 13,
        tier: 'decorator',
        handlerNames: [],
      },
    ]);
  });

  it('should ignore decorators in plain script files', () => {
    expect(detectEndpointsInSource('/svc/users.controller.js', SAMPLE_CONTROLLER)).toEqual([]);
  });

  it('should ignore classes without a controller decorator', () => {
    const source = ['export class Jobs {', "  @Get('/run')", '  run() {}', '}', ''].join('\n');

    expect(detectEndpointsInSource('/svc/jobs.ts', source).filter(e => e.tier === 'decorator')).toEqual([]);
  });
});

describe('text tier', () => {
  it('should scan controller text when no tree is available', () => {
    const endpoints = detectTextEndpoints({
      filePath: '/svc/users.controller.ts',
      source: SAMPLE_CONTROLLER,
      dialect: 'typescript',
      root: null,
      parseFailed: false,
    });

    expect(endpoints).toEqual([
      {
        method: 'GET',
        route: '/users/:id',
        filePath: '/svc/users.controller.ts',
        startLine: 5,
        endLine: 5,
        tier: 'text',
        handlerNames: [],
      },
      {
        method: 'POST',
        route: '/users/',
        filePath: '/svc/users.controller.ts',
        startLine: 10,
        endLine: 10,
        tier: 'text',
        handlerNames: [],
      },
    ]);
  });

  it('should scan route calls when the file failed to parse', () => {
    const source = "// boot\nserver.patch( '/limits' ,update)\n";

    const endpoints = detectTextEndpoints({
      filePath: '/svc/boot.js',
      source,
      dialect: 'javascript',
      root: null,
      parseFailed: true,
    });

    expect(endpoints).toEqual([
      {
        method: 'PATCH',
        route: '/limits',
        filePath: '/svc/boot.js',
        startLine: 2,
        endLine: 2,
        tier: 'text',
        handlerNames: [],
      },
    ]);
  });

  it('should stay out of clean plain-script files', () => {
    expect(
      detectTextEndpoints({ filePath: '/a.js', source: "app.get('/x')", dialect: 'javascript', root: null, parseFailed: false })
    ).toBeNull();
  });

  it('should count lines and match braces', () => {
    expect(lineAt('a\nb\nc', 0)).toBe(1);
    expect(lineAt('a\nb\nc', 4)).toBe(3);
    expect(findMatchingBrace('{ a { b } }', 0)).toBe(10);
    expect(findMatchingBrace('{ open', 0)).toBe(-1);
  });
});

describe('detectEndpointsInSource', () => {
  it('should report a registration found by two tiers once', () => {
    const source = [
      'const router = express.Router();',
      "router.get('/health', (req, res) => res.send('ok'));",
      '} // stray',
      '',
    ].join('\n');

    const endpoints = detectEndpointsInSource('/svc/health.js', source);

    expect(endpoints.map(endpoint => endpointKey(endpoint))).toEqual(['["GET","/health",2]']);
  });

  it('should key endpoints by method, route and start line', () => {
    expect(endpointKey({ method: 'POST', route: '/a', startLine: 3 })).toBe('["POST","/a",3]');
    expect(endpointKey({ method: 'POST', route: null, startLine: 3 })).toBe('["POST",null,3]');
  });
});

describe('parseForDetection', () => {
  it('should report clean trees as parsed', () => {
    const result = parseForDetection('try { a(); } catch { b(); }\n', 'typescript');

    expect(result.parseFailed).toBe(false);
    expect(result.root).not.toBeNull();
  });

  it('should keep the degraded tree when parsing fails', () => {
    const result = parseForDetection('run();\n} // stray\n', 'javascript');

    expect(result.parseFailed).toBe(true);
    expect(result.root?.type).toBe('program');
  });
});

describe('detectEndpoints', () => {
  let project: TempProjectResult;

  beforeEach(() => {
    project = createTempProject({ 'src/app.js': EXPRESS_SOURCE });
  });

  afterEach(() => {
    project.cleanup();
    vi.restoreAllMocks();
  });

  it('should read and detect a file', async () => {
    const endpoints = await detectEndpoints(project.getFilePath('src/app.js'));

    expect(endpoints.map(endpoint => `${endpoint.method} ${endpoint.route}`)).toEqual([
      'GET /items',
      'POST /users',
      'DELETE null',
    ]);
  });

  it('should return nothing for an unreadable file', async () => {
    expect(await detectEndpoints(project.getFilePath('src/missing.js'))).toEqual([]);
  });
});
