/**
 * Grammar selection and parser caching for the three ECMAScript dialects
 */

import Parser from 'tree-sitter';
import JavaScript from 'tree-sitter-javascript';
import TypeScript from 'tree-sitter-typescript';

import type { Dialect } from '../../types/index.js';

export const SUPPORTED_EXTENSIONS = ['.js', '.cjs', '.mjs', '.ts', '.tsx', '.cts', '.mts'] as const;

const SUPPORTED_EXTENSION_SET = new Set<string>(SUPPORTED_EXTENSIONS);
const TSX_EXTENSIONS = new Set(['.tsx']);
const TYPESCRIPT_EXTENSIONS = new Set(['.ts', '.cts', '.mts']);

// Large inputs are fed to the native parser in chunks
const PARSE_CHUNK_SIZE = 8192;

const parserCache = new Map<Dialect, Parser>();

/**
 * Lower-cased extension including the dot, or '' when there is none
 */
export function getExtension(filePath: string): string {
  const match = filePath.match(/(\.[^./\\]+)$/);
  return match?.[1]?.toLowerCase() ?? '';
}

/**
 * Pick the dialect for a file. `.tsx` wins over the typed-script set;
 * everything else is parsed as plain script.
 */
export function selectDialect(filePath: string): Dialect {
  const ext = getExtension(filePath);
  if (TSX_EXTENSIONS.has(ext)) return 'tsx';
  if (TYPESCRIPT_EXTENSIONS.has(ext)) return 'typescript';
  return 'javascript';
}

export function isTypedDialect(dialect: Dialect): boolean {
  return dialect !== 'javascript';
}

export function isSupportedSourceFile(filePath: string): boolean {
  return SUPPORTED_EXTENSION_SET.has(getExtension(filePath));
}

/**
 * Grammar module for `dialect`, as taken by `setLanguage` and `Parser.Query`
 */
export function getLanguage(dialect: Dialect): unknown {
  switch (dialect) {
    case 'tsx':
      return TypeScript.tsx;
    case 'typescript':
      return TypeScript.typescript;
    default:
      return JavaScript;
  }
}

export function getParser(dialect: Dialect): Parser {
  const cached = parserCache.get(dialect);
  if (cached) return cached;

  const parser = new Parser();
  parser.setLanguage(getLanguage(dialect));
  parserCache.set(dialect, parser);
  return parser;
}

/**
 * Parse source text with the parser for `dialect`
 */
export function parseSource(source: string, dialect: Dialect): Parser.Tree {
  const parser = getParser(dialect);
  return parser.parse((index: number) =>
    index < source.length ? source.slice(index, index + PARSE_CHUNK_SIZE) : null
  );
}

/**
 * Clear cached parsers (useful for testing)
 */
export function resetParserCache(): void {
  parserCache.clear();
}
