/**
 * Tiered endpoint detection
 */

import fs from 'node:fs';

import type { Dialect, EndpointRecord } from '../types/index.js';
import { hasSyntaxErrors, type SyntaxNode } from '../indexer/parsers/base.js';
import { parseSource, selectDialect } from '../indexer/parsers/grammar.js';
import { bindOptionalCatchClauses } from './catch-repair.js';
import { detectCallEndpoints } from './call-tier.js';
import { detectDecoratorEndpoints } from './decorator-tier.js';
import { detectTextEndpoints } from './text-tier.js';
import type { DetectionContext, DetectionStrategy } from './types.js';

/**
 * Applied in order; later tiers only add records with a new identity key
 */
export const DETECTION_TIERS: readonly DetectionStrategy[] = [
  detectDecoratorEndpoints,
  detectCallEndpoints,
  detectTextEndpoints,
];

export function endpointKey(endpoint: Pick<EndpointRecord, 'method' | 'route' | 'startLine'>): string {
  return JSON.stringify([endpoint.method, endpoint.route, endpoint.startLine]);
}

function tryParse(source: string, dialect: Dialect): SyntaxNode | null {
  try {
    return parseSource(source, dialect).rootNode;
  } catch (error) {
    console.warn(`Parser failed: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

/**
 * Parse for detection. A tree with ERROR nodes gets one retry after
 * binding parameterless catch clauses; the file counts as failed when the
 * final tree is still not clean.
 */
export function parseForDetection(
  source: string,
  dialect: Dialect
): Pick<DetectionContext, 'root' | 'parseFailed'> {
  const root = tryParse(source, dialect);
  if (root && !hasSyntaxErrors(root)) {
    return { root, parseFailed: false };
  }

  const repair = bindOptionalCatchClauses(source);
  if (repair.replaced > 0) {
    const repaired = tryParse(repair.source, dialect);
    if (repaired && !hasSyntaxErrors(repaired)) {
      return { root: repaired, parseFailed: false };
    }
  }

  return { root, parseFailed: true };
}

export function detectEndpointsInSource(filePath: string, source: string): EndpointRecord[] {
  const dialect = selectDialect(filePath);
  const context: DetectionContext = {
    filePath,
    source,
    dialect,
    ...parseForDetection(source, dialect),
  };

  const seen = new Set<string>();
  const endpoints: EndpointRecord[] = [];
  for (const strategy of DETECTION_TIERS) {
    let found: EndpointRecord[] | null;
    try {
      found = strategy(context);
    } catch (error) {
      console.warn(`Endpoint tier failed for ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
      continue;
    }
    for (const endpoint of found ?? []) {
      const key = endpointKey(endpoint);
      if (seen.has(key)) continue;
      seen.add(key);
      endpoints.push(endpoint);
    }
  }
  return endpoints;
}

/**
 * Detect endpoints in a file; unreadable files yield nothing
 */
export async function detectEndpoints(filePath: string): Promise<EndpointRecord[]> {
  let source: string;
  try {
    source = await fs.promises.readFile(filePath, 'utf-8');
  } catch {
    return [];
  }
  return detectEndpointsInSource(filePath, source);
}
