/**
 * Cleanup pass over the merged document
 */

import type { OpenApiDocument, OpenApiOperation } from '../types/index.js';
import { normalizeRoute } from './normalize.js';

type JsonObject = Record<string, unknown>;

const WILDCARD_PATHS = ['/*', '*'];

const DEFAULT_CREATED_SCHEMA = {
  type: 'object',
  properties: { id: { type: 'string' } },
  additionalProperties: true,
};

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getObject(parent: JsonObject, key: string): JsonObject | null {
  const value = parent[key];
  return isObject(value) ? value : null;
}

function operationAt(document: OpenApiDocument, pathKey: string, method: string): OpenApiOperation | null {
  const item = document.paths[pathKey];
  const operation = item?.[method];
  return operation ?? null;
}

function jsonSchemaOf(responses: JsonObject, code: string): unknown {
  const response = getObject(responses, code);
  const content = response ? getObject(response, 'content') : null;
  const json = content ? getObject(content, 'application/json') : null;
  return json?.schema ?? null;
}

function rekeyColonPaths(document: OpenApiDocument): void {
  for (const original of Object.keys(document.paths)) {
    const normalized = normalizeRoute(original);
    if (normalized === original) continue;

    const existing = document.paths[original] ?? {};
    delete document.paths[original];
    document.paths[normalized] = { ...document.paths[normalized], ...existing };
  }
}

function repairCollectionCreate(document: OpenApiDocument): void {
  const post = operationAt(document, '/{name}', 'post');
  if (!post) return;

  const requestBody = getObject(post, 'requestBody');
  if (requestBody) requestBody.required = false;

  const responses = getObject(post, 'responses') ?? {};
  const schema = jsonSchemaOf(responses, '201') ?? jsonSchemaOf(responses, '200') ?? DEFAULT_CREATED_SCHEMA;

  post.responses = {
    '201': {
      description: 'Resource created successfully.',
      content: { 'application/json': { schema } },
    },
    '404': { description: 'Collection not found.' },
  };
}

function repairCollectionRead(document: OpenApiDocument): void {
  const get = operationAt(document, '/{name}', 'get');
  const responses = get ? getObject(get, 'responses') : null;
  if (responses) delete responses['400'];
}

function repairDependentParameter(document: OpenApiDocument): void {
  const remove = operationAt(document, '/{name}/{id}', 'delete');
  const parameters = remove?.parameters;
  if (!Array.isArray(parameters)) return;

  const dependent = parameters.find((param): param is JsonObject => isObject(param) && param.name === '_dependent');
  if (dependent) {
    dependent.schema = {
      oneOf: [
        { type: 'string' },
        { type: 'array', items: { type: 'string' } },
      ],
    };
  }
}

/**
 * Drop wildcard paths, re-key colon-style paths and repair the response
 * shapes of the conventional `/{name}` and `/{name}/{id}` resources
 */
export function postProcessDocument(document: OpenApiDocument): OpenApiDocument {
  for (const wildcard of WILDCARD_PATHS) {
    delete document.paths[wildcard];
  }
  rekeyColonPaths(document);
  repairCollectionCreate(document);
  repairCollectionRead(document);
  repairDependentParameter(document);
  return document;
}
