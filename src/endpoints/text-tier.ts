/**
 * Permissive regex scans over raw source text
 */

import type { EndpointRecord, HttpMethod } from '../types/index.js';
import { isTypedDialect } from '../indexer/parsers/grammar.js';
import { unquote } from '../indexer/parsers/base.js';
import { combineRoutePaths, findControllerClasses } from './decorator-tier.js';
import { isRouteObjectName, toHttpMethod } from './route-object.js';
import type { DetectionContext } from './types.js';

const ROUTE_CALL_PATTERN =
  /(?<![\w$])([A-Za-z_$][\w$]*)\s*\.\s*(get|post|put|delete|patch|options|head|all)\s*\(\s*(?:(['"`])([\s\S]*?)\3)?/gi;

const CONTROLLER_PATTERN = /@Controller\s*\(\s*((?:`[^`]*`|"[^"]*"|'[^']*'|[^)]*)?)\s*\)/g;
const CLASS_HEADER_PATTERN = /class\s+[A-Za-z_$][\w$]*\s*[^{]*\{/g;
const VERB_DECORATOR_PATTERN =
  /@(Get|Post|Put|Delete|Patch|Options|Head|All)\s*\(\s*((?:`[^`]*`|"[^"]*"|'[^']*'|[^)]*)?)\s*\)/gi;

export interface TextRouteCall {
  objectName: string;
  method: HttpMethod;
  route: string | null;
  index: number;
  endIndex: number;
}

/**
 * `object.METHOD(` occurrences whose object passes the route-object check
 */
export function* findRouteCallsInText(source: string): Generator<TextRouteCall> {
  for (const match of source.matchAll(ROUTE_CALL_PATTERN)) {
    const objectName = match[1] ?? '';
    const method = toHttpMethod(match[2] ?? '');
    if (!method || !isRouteObjectName(objectName)) continue;

    const quote = match[3];
    const body = match[4];
    let route: string | null = null;
    if (quote !== undefined && body !== undefined) {
      route = quote === '`' && body.includes('${') ? null : body;
    }

    const index = match.index ?? 0;
    yield { objectName, method, route, index, endIndex: index + match[0].length };
  }
}

export function lineAt(source: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index && i < source.length; i++) {
    if (source.charCodeAt(i) === 10) line++;
  }
  return line;
}

/**
 * Index of the brace closing the one at `openIndex`, or -1
 */
export function findMatchingBrace(source: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < source.length; i++) {
    const ch = source[i];
    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function cleanPathLiteral(raw: string | undefined): string {
  const cleaned = unquote(raw ?? '');
  return cleaned || '/';
}

function scanRouteCalls(context: DetectionContext): EndpointRecord[] {
  const endpoints: EndpointRecord[] = [];
  for (const call of findRouteCallsInText(context.source)) {
    endpoints.push({
      method: call.method,
      route: call.route,
      filePath: context.filePath,
      startLine: lineAt(context.source, call.index),
      endLine: lineAt(context.source, call.endIndex),
      tier: 'text',
      handlerNames: [],
    });
  }
  return endpoints;
}

function scanControllers(context: DetectionContext): EndpointRecord[] {
  const { source } = context;
  const endpoints: EndpointRecord[] = [];

  for (const controller of source.matchAll(CONTROLLER_PATTERN)) {
    const prefix = cleanPathLiteral(controller[1]);
    const classHeader = new RegExp(CLASS_HEADER_PATTERN.source, 'g');
    classHeader.lastIndex = (controller.index ?? 0) + controller[0].length;
    const classMatch = classHeader.exec(source);
    if (!classMatch) continue;

    const braceStart = source.indexOf('{', classMatch.index);
    const braceEnd = braceStart === -1 ? -1 : findMatchingBrace(source, braceStart);
    if (braceEnd === -1) continue;

    const body = source.slice(braceStart, braceEnd);
    const baseLine = lineAt(source, braceStart);
    for (const verb of body.matchAll(VERB_DECORATOR_PATTERN)) {
      const method = toHttpMethod(verb[1] ?? '');
      if (!method) continue;
      const startLine = baseLine + lineAt(body, verb.index ?? 0) - 1;
      endpoints.push({
        method,
        route: combineRoutePaths(prefix, cleanPathLiteral(verb[2])),
        filePath: context.filePath,
        startLine,
        endLine: startLine,
        tier: 'text',
        handlerNames: [],
      });
    }
  }
  return endpoints;
}

/**
 * Route calls when the file failed to parse; controller patterns on typed
 * files where no controller class was found structurally.
 */
export function detectTextEndpoints(context: DetectionContext): EndpointRecord[] | null {
  const scanCalls = context.parseFailed;
  const scanControllerText =
    isTypedDialect(context.dialect) &&
    (context.root === null || findControllerClasses(context.root).length === 0);

  if (!scanCalls && !scanControllerText) return null;

  return [
    ...(scanCalls ? scanRouteCalls(context) : []),
    ...(scanControllerText ? scanControllers(context) : []),
  ];
}
