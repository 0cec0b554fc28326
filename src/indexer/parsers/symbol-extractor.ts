/**
 * Symbol inventory extraction using tree-sitter structural queries
 */

import fs from 'node:fs';
import path from 'node:path';
import Parser from 'tree-sitter';

import {
  NAMESPACE_IMPORT,
  type CallSite,
  type Dialect,
  type FileInventory,
  type ImportKind,
  type ImportRecord,
  type SymbolSpan,
} from '../../types/index.js';
import { ImportResolver } from '../import-resolver.js';
import { getLanguage, isTypedDialect, parseSource, selectDialect } from './grammar.js';
import {
  ParseError,
  endLineOf,
  spanOf,
  startLineOf,
  unquote,
  type SyntaxNode,
} from './base.js';

export interface ExtractOptions {
  /** Shared resolver so one run reuses its exists-cache */
  resolver?: ImportResolver;
  /** Upper bound when searching ancestor directories for installed packages */
  rootDirectory?: string;
  /** Replace the built-in query for a dialect */
  queries?: Partial<Record<Dialect, string>>;
}

// Values that make a variable declarator a function definition
const FUNCTION_VALUE_TYPES = new Set([
  'arrow_function',
  'function',
  'function_expression',
  'generator_function',
]);

/**
 * Build the inventory query for a dialect. Class names are `type_identifier`
 * nodes in the typed grammars, so the name capture is left open.
 */
export function buildInventoryQuery(dialect: Dialect): string {
  const typed = isTypedDialect(dialect);
  const patterns = [
    '(class_declaration name: (_) @class.name) @class',
    typed ? '(abstract_class_declaration name: (_) @class.name) @class' : null,
    '(function_declaration name: (identifier) @function.name) @function',
    '(generator_function_declaration name: (identifier) @function.name) @function',
    '(variable_declarator name: (_) @declarator.name) @declarator',
    '(call_expression function: (identifier) @call.name) @call',
    '(call_expression function: (member_expression property: (_) @method.name)) @method',
    '(import_statement source: (string) @import.source) @import',
    typed ? '(import_require_clause) @import_require' : null,
    '(identifier) @reference',
    '(shorthand_property_identifier) @reference',
    typed ? '(type_identifier) @reference' : null,
  ];
  return patterns.filter((p): p is string => p !== null).join('\n');
}

const queryCache = new Map<Dialect, Parser.Query>();

function getInventoryQuery(dialect: Dialect, override?: string): Parser.Query {
  if (override !== undefined) {
    return new Parser.Query(getLanguage(dialect), override);
  }
  const cached = queryCache.get(dialect);
  if (cached) return cached;

  const query = new Parser.Query(getLanguage(dialect), buildInventoryQuery(dialect));
  queryCache.set(dialect, query);
  return query;
}

interface ImportBinding {
  importedName: string;
  localName: string | null;
}

interface PendingImport extends ImportBinding {
  source: string;
  kind: ImportKind;
  startLine: number;
  endLine: number;
}

/**
 * Read a file and extract its inventory
 */
export async function extractInventory(
  filePath: string,
  baseDirectory?: string,
  options: ExtractOptions = {}
): Promise<FileInventory> {
  const source = await fs.promises.readFile(filePath, 'utf-8');
  return extractInventoryFromSource(filePath, source, baseDirectory, options);
}

/**
 * Extract an inventory from source text. Typed files whose query fails are
 * retried with the plain-script grammar; anything else raises ParseError.
 */
export function extractInventoryFromSource(
  filePath: string,
  source: string,
  baseDirectory: string = path.dirname(filePath),
  options: ExtractOptions = {}
): FileInventory {
  const dialect = selectDialect(filePath);

  try {
    return collectInventory(filePath, source, dialect, baseDirectory, options);
  } catch (error) {
    if (!isTypedDialect(dialect)) {
      throw new ParseError(filePath, dialect, error);
    }
  }

  try {
    return collectInventory(filePath, source, 'javascript', baseDirectory, options);
  } catch (error) {
    throw new ParseError(filePath, 'javascript', error);
  }
}

function collectInventory(
  filePath: string,
  source: string,
  dialect: Dialect,
  baseDirectory: string,
  options: ExtractOptions
): FileInventory {
  const tree = parseSource(source, dialect);
  const query = getInventoryQuery(dialect, options.queries?.[dialect]);
  const matches = query.matches(tree.rootNode);

  const classes: SymbolSpan[] = [];
  const functions: SymbolSpan[] = [];
  const variables: SymbolSpan[] = [];
  const functionCalls: CallSite[] = [];
  const pending: PendingImport[] = [];
  const references: Array<{ name: string; line: number }> = [];

  for (const match of matches) {
    const captures = new Map<string, SyntaxNode>();
    for (const capture of match.captures) {
      captures.set(capture.name, capture.node);
    }

    const classNode = captures.get('class');
    const className = captures.get('class.name');
    if (classNode && className) {
      classes.push(spanOf(className.text, classNode));
      continue;
    }

    const functionNode = captures.get('function');
    const functionName = captures.get('function.name');
    if (functionNode && functionName) {
      functions.push(spanOf(functionName.text, functionNode));
      continue;
    }

    const declarator = captures.get('declarator');
    const declaratorName = captures.get('declarator.name');
    if (declarator && declaratorName) {
      collectDeclarator(declarator, declaratorName, variables, functions, pending);
      continue;
    }

    const callNode = captures.get('call');
    const callName = captures.get('call.name');
    if (callNode && callName) {
      functionCalls.push({ ...spanOf(callName.text, callNode), kind: 'function_call' });
      continue;
    }

    const methodNode = captures.get('method');
    const methodName = captures.get('method.name');
    if (methodNode && methodName) {
      functionCalls.push({ ...spanOf(methodName.text, methodNode), kind: 'method_call' });
      continue;
    }

    const importNode = captures.get('import');
    const importSource = captures.get('import.source');
    if (importNode && importSource) {
      for (const binding of importStatementBindings(importNode)) {
        pending.push({
          ...binding,
          source: unquote(importSource.text),
          kind: 'import',
          startLine: startLineOf(importNode),
          endLine: endLineOf(importNode),
        });
      }
      continue;
    }

    const requireClause = captures.get('import_require');
    const requireName = requireClause?.namedChildren.find(n => n.type === 'identifier');
    const requireSource = requireClause?.namedChildren.find(n => n.type === 'string');
    if (requireClause && requireName && requireSource) {
      const statement = requireClause.parent ?? requireClause;
      pending.push({
        importedName: requireName.text,
        localName: requireName.text,
        source: unquote(requireSource.text),
        kind: 'require',
        startLine: startLineOf(statement),
        endLine: endLineOf(statement),
      });
      continue;
    }

    const reference = captures.get('reference');
    if (reference) {
      references.push({ name: reference.text, line: startLineOf(reference) });
    }
  }

  const resolver = options.resolver ?? new ImportResolver();
  const imports = pending.map((entry): ImportRecord => {
    const origin = resolver.resolve(entry.source, baseDirectory, options.rootDirectory);
    return {
      importedName: entry.importedName,
      localName: entry.localName,
      source: entry.source,
      kind: entry.kind,
      origin,
      line: entry.startLine,
      pathExists: resolver.originExists(origin),
      usageLines: usageLinesFor(entry, references),
    };
  });

  return { filePath, dialect, classes, functions, variables, functionCalls, imports };
}

function collectDeclarator(
  declarator: SyntaxNode,
  nameNode: SyntaxNode,
  variables: SymbolSpan[],
  functions: SymbolSpan[],
  pending: PendingImport[]
): void {
  const value = declarator.childForFieldName('value');

  if (nameNode.type === 'identifier') {
    variables.push(spanOf(nameNode.text, declarator));
    if (value && FUNCTION_VALUE_TYPES.has(value.type)) {
      functions.push(spanOf(nameNode.text, declarator));
    }
  }

  const specifier = value ? requireSpecifier(value) : null;
  if (specifier === null) return;

  const statement = declarator.parent ?? declarator;
  for (const binding of requireBindings(nameNode)) {
    pending.push({
      ...binding,
      source: specifier,
      kind: 'require',
      startLine: startLineOf(statement),
      endLine: endLineOf(statement),
    });
  }
}

/**
 * `require('x')` → 'x', anything else → null
 */
function requireSpecifier(value: SyntaxNode): string | null {
  if (value.type !== 'call_expression') return null;
  const callee = value.childForFieldName('function');
  if (!callee || callee.type !== 'identifier' || callee.text !== 'require') return null;

  const args = value.childForFieldName('arguments');
  const first = args?.namedChildren[0];
  if (!first || first.type !== 'string') return null;
  return unquote(first.text);
}

function requireBindings(nameNode: SyntaxNode): ImportBinding[] {
  if (nameNode.type === 'identifier') {
    return [{ importedName: nameNode.text, localName: nameNode.text }];
  }

  if (nameNode.type !== 'object_pattern') return [];

  const bindings: ImportBinding[] = [];
  for (const child of nameNode.namedChildren) {
    if (child.type === 'shorthand_property_identifier_pattern') {
      bindings.push({ importedName: child.text, localName: child.text });
    } else if (child.type === 'pair_pattern') {
      const key = child.childForFieldName('key');
      const value = child.childForFieldName('value');
      if (key && value?.type === 'identifier') {
        bindings.push({ importedName: key.text, localName: value.text });
      }
    }
  }
  return bindings;
}

function importStatementBindings(statement: SyntaxNode): ImportBinding[] {
  const clause = statement.namedChildren.find(child => child.type === 'import_clause');
  if (!clause) {
    return [{ importedName: NAMESPACE_IMPORT, localName: null }];
  }

  const bindings: ImportBinding[] = [];
  for (const child of clause.namedChildren) {
    if (child.type === 'identifier') {
      bindings.push({ importedName: child.text, localName: child.text });
    } else if (child.type === 'namespace_import') {
      const alias = child.namedChildren.find(n => n.type === 'identifier');
      bindings.push({ importedName: NAMESPACE_IMPORT, localName: alias?.text ?? null });
    } else if (child.type === 'named_imports') {
      for (const specifier of child.namedChildren) {
        if (specifier.type !== 'import_specifier') continue;
        const name = specifier.childForFieldName('name');
        const alias = specifier.childForFieldName('alias');
        if (!name) continue;
        bindings.push({ importedName: unquote(name.text), localName: (alias ?? name).text });
      }
    }
  }
  return bindings;
}

function usageLinesFor(
  entry: PendingImport,
  references: Array<{ name: string; line: number }>
): number[] {
  if (entry.localName === null) return [];

  const lines = new Set<number>();
  for (const reference of references) {
    if (reference.name !== entry.localName) continue;
    if (reference.line >= entry.startLine && reference.line <= entry.endLine) continue;
    lines.add(reference.line);
  }
  return Array.from(lines).sort((a, b) => a - b);
}
