/**
 * End-to-end generation: inventory, endpoint discovery, slicing, merging
 */

import fs from 'node:fs';
import path from 'node:path';

import type { Config } from '../config/index.js';
import { contextBlocks, sliceEndpoint } from '../context-bundler/index.js';
import { detectEndpoints, findApiDefinitionFiles } from '../endpoints/index.js';
import { Indexer } from '../indexer/index.js';
import {
  SkeletonFragmentGenerator,
  createDocument,
  mergeFragment,
  normalizeRoute,
  postProcessDocument,
  type FragmentGenerator,
} from '../openapi/index.js';
import type { EndpointRecord, OpenApiDocument, OpenApiFragment } from '../types/index.js';
import { readGitMetadata, type GitMetadata } from './git.js';
import { runPool } from './pool.js';

export interface GenerateOptions {
  generator?: FragmentGenerator;
  onProgress?: (completed: number, total: number, elapsedMs: number) => void;
  /** Skip the git lookup */
  git?: GitMetadata;
  generatedAt?: Date;
}

/**
 * Detect endpoints in every candidate file, routes normalized to `{param}`
 */
export async function discoverEndpoints(files: readonly string[]): Promise<EndpointRecord[]> {
  const endpoints: EndpointRecord[] = [];
  for (const file of await findApiDefinitionFiles(files)) {
    for (const endpoint of await detectEndpoints(file)) {
      endpoints.push({ ...endpoint, route: normalizeRoute(endpoint.route) });
    }
  }
  return endpoints;
}

function describeEndpoint(endpoint: EndpointRecord): string {
  return `${endpoint.method} ${endpoint.route ?? '(unknown route)'} (${endpoint.filePath}:${endpoint.startLine})`;
}

export async function generateOpenApi(
  rootDirectory: string,
  config: Config,
  options: GenerateOptions = {}
): Promise<OpenApiDocument> {
  const root = path.resolve(rootDirectory);
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new Error(`Directory not found: ${root}`);
  }

  const git = options.git ?? readGitMetadata(root);
  const document = createDocument({
    title: config.title ?? path.basename(root),
    version: config.version,
    description: config.description,
    host: config.host,
    commit: git.commit,
    repositoryUrl: git.repositoryUrl,
    generatedAt: options.generatedAt,
  });

  const indexer = new Indexer({
    rootDirectory: root,
    ignoredDirs: config.ignoredDirs,
    cacheDirName: config.cacheDirName,
    maxFileSize: config.maxFileSize,
  });

  try {
    await indexer.indexDirectory();
    const snapshot = await indexer.snapshot();

    const endpoints = await discoverEndpoints(indexer.files);
    if (endpoints.length === 0) return document;

    const generator = options.generator ?? new SkeletonFragmentGenerator();
    const startTime = Date.now();
    let completed = 0;

    await runPool(
      endpoints,
      config.maxWorkers,
      async (endpoint): Promise<OpenApiFragment> => {
        const bundle = await sliceEndpoint(endpoint, snapshot);
        return generator.generate({
          endpoint,
          route: endpoint.route,
          handlerLines: bundle.handlerLines,
          contextBlocks: contextBlocks(bundle),
        });
      },
      (outcome, endpoint) => {
        if (outcome.ok) {
          mergeFragment(document, outcome.value);
        } else {
          const message = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
          console.warn(`Fragment generation failed for ${describeEndpoint(endpoint)}: ${message}`);
        }
        completed++;
        options.onProgress?.(completed, endpoints.length, Date.now() - startTime);
      }
    );

    return postProcessDocument(document);
  } finally {
    indexer.close();
  }
}

export { runPool, type PoolOutcome } from './pool.js';
export { readGitMetadata, toBrowsableUrl, type GitMetadata } from './git.js';
