/**
 * Context bundling: the handler plus the code it depends on
 */

import {
  NAMESPACE_IMPORT,
  type ContextBundle,
  type DependencyBlock,
  type EndpointRecord,
  type FileInventory,
  type ImportBlock,
  type ImportRecord,
  type InventorySnapshot,
  type SymbolSpan,
} from '../types/index.js';
import { findInFileDependencies, findRelevantImports, type DependencyRef } from './dependencies.js';
import { findResponderBlock } from './responder.js';
import { SourceReader } from './source-reader.js';

async function materializeDependencies(
  dependencies: readonly DependencyRef[],
  endpoint: EndpointRecord,
  reader: SourceReader
): Promise<DependencyBlock[]> {
  const blocks: DependencyBlock[] = [];
  const seen = new Set<string>();

  for (const dep of dependencies) {
    // Already part of the handler lines
    if (dep.filePath === endpoint.filePath && dep.startLine >= endpoint.startLine && dep.endLine <= endpoint.endLine) {
      continue;
    }
    const key = `${dep.filePath}:${dep.startLine}:${dep.endLine}`;
    if (seen.has(key)) continue;
    seen.add(key);

    const lines = await reader.slice(dep.filePath, dep.startLine, dep.endLine);
    if (lines) blocks.push({ ...dep, lines });
  }
  return blocks;
}

function findDeclaration(
  inventory: FileInventory,
  name: string
): { kind: ImportBlock['kind']; span: SymbolSpan } | null {
  const categories: Array<[ImportBlock['kind'], SymbolSpan[]]> = [
    ['class', inventory.classes],
    ['function', inventory.functions],
    ['variable', inventory.variables],
  ];
  for (const [kind, spans] of categories) {
    const span = spans.find(s => s.name === name);
    if (span) return { kind, span };
  }
  return null;
}

async function materializeImports(
  imports: readonly ImportRecord[],
  snapshot: InventorySnapshot,
  reader: SourceReader
): Promise<ImportBlock[]> {
  const blocks: ImportBlock[] = [];

  for (const record of imports) {
    if (record.importedName === NAMESPACE_IMPORT || record.origin === null) continue;

    const originInventory = snapshot.get(record.origin);
    if (!originInventory) continue;

    const declaration = findDeclaration(originInventory, record.importedName);
    if (!declaration) continue;

    const lines = await reader.slice(record.origin, declaration.span.startLine, declaration.span.endLine);
    if (!lines) continue;

    blocks.push({
      importedName: record.importedName,
      source: record.source,
      origin: record.origin,
      kind: declaration.kind,
      startLine: declaration.span.startLine,
      endLine: declaration.span.endLine,
      lines,
    });
  }
  return blocks;
}

/**
 * Build the context bundle for one endpoint. Missing files and spans are
 * skipped; the bundle may hold only the handler lines.
 */
export async function sliceEndpoint(endpoint: EndpointRecord, snapshot: InventorySnapshot): Promise<ContextBundle> {
  const reader = new SourceReader();
  const fileLines = (await reader.lines(endpoint.filePath)) ?? [];
  const handlerLines = fileLines.slice(endpoint.startLine - 1, endpoint.endLine);
  const responderBlock = findResponderBlock(fileLines);

  const inventory = snapshot.get(endpoint.filePath);
  if (!inventory) {
    return { endpoint, handlerLines, dependencyBlocks: [], importBlocks: [], responderBlock };
  }

  const dependencies = findInFileDependencies(inventory, endpoint);
  const imports = findRelevantImports(inventory, endpoint, dependencies);

  return {
    endpoint,
    handlerLines,
    dependencyBlocks: await materializeDependencies(dependencies, endpoint, reader),
    importBlocks: await materializeImports(imports, snapshot, reader),
    responderBlock,
  };
}

/**
 * Context blocks in prompt order: dependencies, imports, responder
 */
export function contextBlocks(bundle: ContextBundle): string[][] {
  const blocks = [
    ...bundle.dependencyBlocks.map(block => block.lines),
    ...bundle.importBlocks.map(block => block.lines),
  ];
  if (bundle.responderBlock) blocks.push(bundle.responderBlock);
  return blocks;
}

export { chooseDefinition, findInFileDependencies, findRelevantImports, type DependencyRef } from './dependencies.js';
export { extractBraceBlock, findResponderBlock } from './responder.js';
export { SourceReader } from './source-reader.js';
export { formatContextBundle } from './formatter.js';
