/**
 * Fragment generation seam. The pipeline hands each endpoint's context to a
 * FragmentGenerator; a model-backed implementation lives outside this package.
 */

import { z } from 'zod';

import type { EndpointRecord, OpenApiFragment, OpenApiOperation, OpenApiPathItem } from '../types/index.js';
import { normalizeRoute, pathParameterNames } from './normalize.js';

export interface FragmentRequest {
  endpoint: EndpointRecord;
  /** Normalized route; null when the registration has no literal path */
  route: string | null;
  handlerLines: string[];
  contextBlocks: string[][];
}

export interface FragmentGenerator {
  generate(request: FragmentRequest): Promise<OpenApiFragment>;
}

const OPERATION_KEYS = new Set(['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace']);

const operationSchema = z.record(z.string(), z.unknown());

const fragmentSchema = z.object({
  paths: z.record(z.string(), z.record(z.string(), z.unknown())),
});

// Path-level fields (summary, parameters, servers) are not carried over
function operationsOf(pathItem: Record<string, unknown>): OpenApiPathItem {
  const operations: OpenApiPathItem = {};
  for (const [key, value] of Object.entries(pathItem)) {
    if (!OPERATION_KEYS.has(key)) continue;
    const operation = operationSchema.safeParse(value);
    if (operation.success) operations[key] = operation.data;
  }
  return operations;
}

/**
 * Read a fragment out of a generator's text reply: the outermost `{...}`
 * parsed as JSON. Anything unusable becomes an empty path item for `route`,
 * or no paths at all when the route is unknown.
 */
export function parseFragmentResponse(text: string, route: string | null): OpenApiFragment {
  const empty: OpenApiFragment = route === null ? { paths: {} } : { paths: { [route]: {} } };

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return empty;

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch {
    return empty;
  }

  const result = fragmentSchema.safeParse(raw);
  if (!result.success) return empty;

  const paths: OpenApiFragment['paths'] = {};
  for (const [pathKey, pathItem] of Object.entries(result.data.paths)) {
    paths[pathKey] = operationsOf(pathItem);
  }
  return { paths };
}

/**
 * Deterministic generator: one operation per endpoint with its path
 * parameters and a plain 200 response
 */
export class SkeletonFragmentGenerator implements FragmentGenerator {
  async generate(request: FragmentRequest): Promise<OpenApiFragment> {
    const route = normalizeRoute(request.route);
    if (route === null) return { paths: {} };

    const method = request.endpoint.method === 'ALL' ? 'get' : request.endpoint.method.toLowerCase();

    const operation: OpenApiOperation = {
      summary: `${request.endpoint.method} ${route}`,
      responses: {
        '200': { description: 'Successful response' },
      },
    };

    const parameters = pathParameterNames(route).map(name => ({
      name,
      in: 'path',
      required: true,
      schema: { type: 'string' },
    }));
    if (parameters.length > 0) {
      operation.parameters = parameters;
    }

    return { paths: { [route]: { [method]: operation } } };
  }
}
