/**
 * Shared tree-sitter helpers and the parse error type
 */

import type Parser from 'tree-sitter';

import type { Dialect, SymbolSpan } from '../../types/index.js';

export type SyntaxNode = Parser.SyntaxNode;

/**
 * Raised when no dialect could produce a structural inventory for a file
 */
export class ParseError extends Error {
  readonly filePath: string;
  readonly dialect: Dialect;

  constructor(filePath: string, dialect: Dialect, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to parse ${filePath} as ${dialect}: ${reason}`);
    this.name = 'ParseError';
    this.filePath = filePath;
    this.dialect = dialect;
  }
}

/**
 * Depth-first, document-order walk over every node (named or not)
 */
export function* walkTree(root: SyntaxNode): Generator<SyntaxNode> {
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    yield node;
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push(child);
    }
  }
}

export function hasSyntaxErrors(root: SyntaxNode): boolean {
  for (const node of walkTree(root)) {
    if (node.type === 'ERROR') return true;
  }
  return false;
}

export function startLineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

export function endLineOf(node: SyntaxNode): number {
  return node.endPosition.row + 1;
}

export function spanOf(name: string, node: SyntaxNode): SymbolSpan {
  return { name, startLine: startLineOf(node), endLine: endLineOf(node) };
}

/**
 * Strip the quotes from a `string` node's text
 */
export function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    const last = trimmed[trimmed.length - 1];
    if (first === last && (first === '"' || first === "'" || first === '`')) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

/**
 * Template literal text without backticks, or null when it interpolates
 */
export function templateLiteralValue(value: string): string | null {
  if (value.includes('${')) return null;
  return unquote(value);
}
