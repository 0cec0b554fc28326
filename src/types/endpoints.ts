/**
 * Endpoint detection and context bundle types
 */

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS', 'HEAD', 'ALL'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type DetectionTier = 'decorator' | 'call' | 'text';

export interface EndpointRecord {
  method: HttpMethod;
  route: string | null;
  filePath: string;
  startLine: number;
  endLine: number;
  tier: DetectionTier;
  /** Bare identifiers passed as handlers, e.g. `router.get('/x', auth, handler)` */
  handlerNames: string[];
}

export interface DependencyBlock {
  name: string;
  filePath: string;
  callStartLine: number;
  callEndLine: number;
  startLine: number;
  endLine: number;
  lines: string[];
}

export interface ImportBlock {
  importedName: string;
  source: string;
  origin: string;
  kind: 'class' | 'function' | 'variable';
  startLine: number;
  endLine: number;
  lines: string[];
}

export interface ContextBundle {
  endpoint: EndpointRecord;
  handlerLines: string[];
  dependencyBlocks: DependencyBlock[];
  importBlocks: ImportBlock[];
  responderBlock: string[] | null;
}
