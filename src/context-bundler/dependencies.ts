/**
 * In-file dependency discovery and relevant-import selection
 */

import type { EndpointRecord, FileInventory, ImportRecord, SymbolSpan } from '../types/index.js';

// Route registration verbs are never user functions
const VERB_FUNCTION_NAMES = new Set(['get', 'post', 'put', 'delete', 'patch']);

export interface DependencyRef {
  name: string;
  filePath: string;
  callStartLine: number;
  callEndLine: number;
  startLine: number;
  endLine: number;
}

interface PendingCall {
  name: string;
  startLine: number;
  endLine: number;
}

/**
 * Pick the declaration a call on `callLine` refers to when a name is
 * declared more than once:
 *
 * 1. the first declaration (by start line) whose span contains the call line
 * 2. otherwise the nearest declaration starting at or before the call line
 * 3. otherwise the first declaration
 *
 * A declaration after the call is chosen only when nothing starts at or
 * before it.
 */
export function chooseDefinition(candidates: readonly SymbolSpan[], callLine: number): SymbolSpan | null {
  const sorted = [...candidates].sort((a, b) => a.startLine - b.startLine);

  const containing = sorted.find(c => c.startLine <= callLine && callLine <= c.endLine);
  if (containing) return containing;

  let preceding: SymbolSpan | null = null;
  for (const candidate of sorted) {
    if (candidate.startLine <= callLine) preceding = candidate;
  }
  return preceding ?? sorted[0] ?? null;
}

function within(line: number, startLine: number, endLine: number): boolean {
  return line >= startLine && line <= endLine;
}

/**
 * Functions declared in the endpoint's file that the handler calls,
 * followed transitively through each chosen definition. Only bare
 * identifier calls count; method calls are not matched to declarations.
 */
export function findInFileDependencies(inventory: FileInventory, endpoint: EndpointRecord): DependencyRef[] {
  const declarations = new Map<string, SymbolSpan[]>();
  for (const fn of inventory.functions) {
    if (VERB_FUNCTION_NAMES.has(fn.name)) continue;
    const list = declarations.get(fn.name) ?? [];
    list.push(fn);
    declarations.set(fn.name, list);
  }

  const callsWithin = (startLine: number, endLine: number): PendingCall[] =>
    inventory.functionCalls.filter(call =>
      call.kind === 'function_call' &&
      declarations.has(call.name) &&
      call.startLine >= startLine &&
      call.endLine <= endLine
    );

  const queue: PendingCall[] = [
    ...endpoint.handlerNames
      .filter(name => declarations.has(name))
      .map(name => ({ name, startLine: endpoint.startLine, endLine: endpoint.startLine })),
    ...callsWithin(endpoint.startLine, endpoint.endLine),
  ];

  const visited = new Set<string>();
  const dependencies: DependencyRef[] = [];

  for (let call = queue.shift(); call; call = queue.shift()) {
    const definition = chooseDefinition(declarations.get(call.name) ?? [], call.startLine);
    const startLine = definition?.startLine ?? call.startLine;
    const endLine = definition?.endLine ?? call.endLine;

    const key = `${call.name}:${startLine}:${endLine}`;
    if (visited.has(key)) continue;
    visited.add(key);

    dependencies.push({
      name: call.name,
      filePath: inventory.filePath,
      callStartLine: call.startLine,
      callEndLine: call.endLine,
      startLine,
      endLine,
    });

    if (definition) {
      queue.push(...callsWithin(definition.startLine, definition.endLine));
    }
  }

  return dependencies;
}

/**
 * Imports with an on-disk origin that are used inside the endpoint, a
 * dependency's call site or a dependency's definition
 */
export function findRelevantImports(
  inventory: FileInventory,
  endpoint: EndpointRecord,
  dependencies: readonly DependencyRef[]
): ImportRecord[] {
  const ranges: Array<[number, number]> = [[endpoint.startLine, endpoint.endLine]];
  for (const dep of dependencies) {
    ranges.push([dep.callStartLine, dep.callEndLine], [dep.startLine, dep.endLine]);
  }

  return inventory.imports.filter(record =>
    record.pathExists &&
    record.usageLines.some(line => ranges.some(([start, end]) => within(line, start, end)))
  );
}
