/**
 * Controller/verb decorator composition for typed dialects
 */

import type { EndpointRecord, HttpMethod } from '../types/index.js';
import {
  endLineOf,
  startLineOf,
  templateLiteralValue,
  unquote,
  walkTree,
  type SyntaxNode,
} from '../indexer/parsers/base.js';
import { isTypedDialect } from '../indexer/parsers/grammar.js';
import { toHttpMethod } from './route-object.js';
import type { DetectionContext } from './types.js';

const CLASS_TYPES = new Set(['class_declaration', 'abstract_class_declaration']);
const MEMBER_TYPES = new Set(['method_definition', 'public_field_definition']);

export interface ControllerClass {
  node: SyntaxNode;
  prefix: string;
}

interface ParsedDecorator {
  name: string;
  argument: string | null;
}

/**
 * Join a controller prefix and a handler path into one route.
 * Missing parts count as `/`; slash runs collapse to one.
 *
 * @example combineRoutePaths('/users', ':id') // '/users/:id'
 */
export function combineRoutePaths(prefix: string | null, routePath: string | null): string {
  let prefixPart = prefix || '/';
  let pathPart = routePath ?? '/';
  if (!prefixPart.startsWith('/')) prefixPart = `/${prefixPart}`;
  if (!pathPart.startsWith('/')) pathPart = `/${pathPart}`;

  const combined = (prefixPart.replace(/\/+$/, '') + pathPart).replace(/\/{2,}/g, '/');
  return combined.startsWith('/') ? combined : `/${combined}`;
}

/**
 * Decorators on a class or member: its own decorator children, those on a
 * wrapping `export` statement, and decorator siblings directly before it.
 */
export function collectDecorators(node: SyntaxNode): SyntaxNode[] {
  const decorators = node.children.filter(child => child.type === 'decorator');

  const parent = node.parent;
  if (parent?.type === 'export_statement') {
    decorators.push(...parent.children.filter(child => child.type === 'decorator'));
  }

  const preceding: SyntaxNode[] = [];
  let sibling = node.previousNamedSibling;
  while (sibling?.type === 'decorator') {
    preceding.unshift(sibling);
    sibling = sibling.previousNamedSibling;
  }
  return [...preceding, ...decorators];
}

function parseDecorator(decorator: SyntaxNode): ParsedDecorator | null {
  const expression = decorator.namedChildren[0];
  if (!expression) return null;

  if (expression.type === 'identifier' || expression.type === 'property_identifier') {
    return { name: expression.text, argument: null };
  }
  if (expression.type !== 'call_expression') return null;

  const callee = expression.childForFieldName('function');
  if (!callee) return null;

  let argument: string | null = null;
  const args = expression.childForFieldName('arguments');
  for (const arg of args?.namedChildren ?? []) {
    if (arg.type === 'string') {
      argument = unquote(arg.text);
      break;
    }
    if (arg.type === 'template_string') {
      argument = templateLiteralValue(arg.text);
      break;
    }
  }
  return { name: callee.text, argument };
}

/**
 * Classes carrying a `@Controller(prefix?)` decorator
 */
export function findControllerClasses(root: SyntaxNode): ControllerClass[] {
  const controllers: ControllerClass[] = [];
  for (const node of walkTree(root)) {
    if (!CLASS_TYPES.has(node.type)) continue;
    for (const decorator of collectDecorators(node)) {
      const parsed = parseDecorator(decorator);
      if (parsed?.name.toLowerCase() === 'controller') {
        controllers.push({ node, prefix: parsed.argument || '/' });
        break;
      }
    }
  }
  return controllers;
}

function verbDecorator(decorators: readonly SyntaxNode[]): { method: HttpMethod; path: string } | null {
  for (const decorator of decorators) {
    const parsed = parseDecorator(decorator);
    const method = parsed ? toHttpMethod(parsed.name) : null;
    if (parsed && method) {
      return { method, path: parsed.argument ?? '/' };
    }
  }
  return null;
}

export function detectDecoratorEndpoints(context: DetectionContext): EndpointRecord[] | null {
  if (!isTypedDialect(context.dialect) || !context.root) return null;

  const endpoints: EndpointRecord[] = [];
  for (const controller of findControllerClasses(context.root)) {
    const body = controller.node.childForFieldName('body');
    for (const member of body?.namedChildren ?? []) {
      if (!MEMBER_TYPES.has(member.type)) continue;
      const decorators = collectDecorators(member);
      const verb = verbDecorator(decorators);
      if (!verb) continue;

      // Span starts at the first decorator
      endpoints.push({
        method: verb.method,
        route: combineRoutePaths(controller.prefix, verb.path),
        filePath: context.filePath,
        startLine: Math.min(startLineOf(member), ...decorators.map(startLineOf)),
        endLine: endLineOf(member),
        tier: 'decorator',
        handlerNames: [],
      });
    }
  }
  return endpoints;
}
