import fs from 'node:fs';

import { findRouteCallsInText } from './text-tier.js';

const API_DECORATOR_PATTERN =
  /@\s*(route|get|post|put|delete|patch|options|head|all|api|endpoint|router|controller|module|middleware|rest)\b/i;

/**
 * Cheap text check: a route-object verb call or an API-ish decorator
 */
export function containsApiDefinitions(source: string): boolean {
  if (!findRouteCallsInText(source).next().done) return true;
  return API_DECORATOR_PATTERN.test(source);
}

/**
 * Files worth handing to the endpoint detector, in input order
 */
export async function findApiDefinitionFiles(files: readonly string[]): Promise<string[]> {
  const candidates: string[] = [];
  for (const file of files) {
    let source: string;
    try {
      source = await fs.promises.readFile(file, 'utf-8');
    } catch {
      continue;
    }
    if (containsApiDefinitions(source)) candidates.push(file);
  }
  return candidates;
}
