/**
 * Markdown rendering of a context bundle
 */

import path from 'node:path';

import type { ContextBundle, Dialect } from '../types/index.js';
import { selectDialect } from '../indexer/parsers/grammar.js';

const FENCE_LABELS: Record<Dialect, string> = {
  javascript: 'javascript',
  typescript: 'typescript',
  tsx: 'tsx',
};

function displayPath(filePath: string, rootDir?: string): string {
  return rootDir ? path.relative(rootDir, filePath) : filePath;
}

function codeBlock(filePath: string, lines: readonly string[]): string {
  return ['```' + FENCE_LABELS[selectDialect(filePath)], ...lines, '```'].join('\n');
}

export function formatContextBundle(bundle: ContextBundle, rootDir?: string): string {
  const { endpoint } = bundle;
  const file = displayPath(endpoint.filePath, rootDir);
  const sections: string[] = [];

  sections.push(`# Context for \`${endpoint.method} ${endpoint.route ?? '(unknown route)'}\`\n`);
  sections.push(`## Handler (${file}:${endpoint.startLine}-${endpoint.endLine})\n`);
  sections.push(codeBlock(endpoint.filePath, bundle.handlerLines));

  if (bundle.dependencyBlocks.length > 0) {
    sections.push('\n## In-file dependencies\n');
    for (const block of bundle.dependencyBlocks) {
      sections.push(`### ${block.name} (${displayPath(block.filePath, rootDir)}:${block.startLine}-${block.endLine})\n`);
      sections.push(codeBlock(block.filePath, block.lines));
    }
  }

  if (bundle.importBlocks.length > 0) {
    sections.push('\n## Imported declarations\n');
    for (const block of bundle.importBlocks) {
      sections.push(
        `### ${block.importedName} from '${block.source}' (${block.kind}, ${displayPath(block.origin, rootDir)}:${block.startLine}-${block.endLine})\n`
      );
      sections.push(codeBlock(block.origin, block.lines));
    }
  }

  if (bundle.responderBlock) {
    sections.push('\n## Catch-all responder\n');
    sections.push(codeBlock(endpoint.filePath, bundle.responderBlock));
  }

  return sections.join('\n');
}
