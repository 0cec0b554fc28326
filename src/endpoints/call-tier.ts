import type { EndpointRecord } from '../types/index.js';
import {
  endLineOf,
  startLineOf,
  templateLiteralValue,
  unquote,
  walkTree,
  type SyntaxNode,
} from '../indexer/parsers/base.js';
import { isRouteObjectName, toHttpMethod } from './route-object.js';
import type { DetectionContext } from './types.js';

const VERB_PROPERTY_TYPES = new Set(['property_identifier', 'identifier']);

function routeArgument(args: SyntaxNode | null): string | null {
  for (const arg of args?.namedChildren ?? []) {
    if (arg.type === 'string') return unquote(arg.text);
    if (arg.type === 'template_string') return templateLiteralValue(arg.text);
  }
  return null;
}

function endpointFromCall(node: SyntaxNode, filePath: string): EndpointRecord | null {
  const callee = node.childForFieldName('function');
  if (!callee || callee.type !== 'member_expression') return null;

  const property = callee.childForFieldName('property');
  const object = callee.childForFieldName('object');
  if (!property || !object || !VERB_PROPERTY_TYPES.has(property.type)) return null;

  const method = toHttpMethod(property.text);
  if (!method || !isRouteObjectName(object.text)) return null;

  const args = node.childForFieldName('arguments');
  const handlerNames = (args?.namedChildren ?? [])
    .filter(arg => arg.type === 'identifier')
    .map(arg => arg.text);

  return {
    method,
    route: routeArgument(args),
    filePath,
    startLine: startLineOf(node),
    endLine: endLineOf(node),
    tier: 'call',
    handlerNames,
  };
}

/**
 * `router.get('/x', handler)` style registrations. Runs on degraded trees.
 */
export function detectCallEndpoints(context: DetectionContext): EndpointRecord[] | null {
  if (!context.root) return null;

  const endpoints: EndpointRecord[] = [];
  for (const node of walkTree(context.root)) {
    if (node.type !== 'call_expression') continue;
    const endpoint = endpointFromCall(node, context.filePath);
    if (endpoint) endpoints.push(endpoint);
  }
  return endpoints;
}
