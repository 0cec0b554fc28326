/**
 * routescribe - static endpoint discovery and OpenAPI generation
 *
 * Scans JavaScript/TypeScript source trees for HTTP route registrations,
 * slices the code each handler depends on and merges per-endpoint
 * fragments into one OpenAPI document.
 */

// Types
export * from './types/index.js';

// Indexer
export {
  Indexer,
  InventoryCache,
  ImportResolver,
  ParseError,
  buildInventoryQuery,
  cacheFileName,
  createSnapshot,
  extractInventory,
  extractInventoryFromSource,
  findSourceFiles,
  isIgnoredPath,
  resolveModuleOrigin,
  type IndexerConfig,
  type IndexResult,
} from './indexer/index.js';
export { selectDialect, isSupportedSourceFile, SUPPORTED_EXTENSIONS } from './indexer/parsers/grammar.js';

// Endpoints
export {
  combineRoutePaths,
  detectEndpoints,
  detectEndpointsInSource,
  findApiDefinitionFiles,
  isRouteObjectName,
  type DetectionContext,
  type DetectionStrategy,
} from './endpoints/index.js';

// Context bundling
export { sliceEndpoint, contextBlocks, chooseDefinition, formatContextBundle } from './context-bundler/index.js';

// OpenAPI
export {
  createDocument,
  mergeFragment,
  normalizeRoute,
  parseFragmentResponse,
  postProcessDocument,
  SkeletonFragmentGenerator,
  type FragmentGenerator,
  type FragmentRequest,
} from './openapi/index.js';

// Pipeline
export { generateOpenApi, discoverEndpoints, readGitMetadata, runPool, type GenerateOptions } from './pipeline/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
} from './config/index.js';
