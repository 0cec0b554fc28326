import type { OpenApiDocument, OpenApiFragment } from '../types/index.js';
import { normalizeRoute } from './normalize.js';

/**
 * Fold one fragment into the document in place. The last fragment to set a
 * (path, method) pair wins.
 */
export function mergeFragment(document: OpenApiDocument, fragment: OpenApiFragment): OpenApiDocument {
  for (const [pathKey, methods] of Object.entries(fragment.paths)) {
    const normalized = normalizeRoute(pathKey);
    const target = document.paths[normalized] ?? {};
    document.paths[normalized] = target;
    for (const [method, operation] of Object.entries(methods)) {
      target[method] = operation;
    }
  }
  return document;
}
