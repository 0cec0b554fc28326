import type { Dialect, EndpointRecord } from '../types/index.js';
import type { SyntaxNode } from '../indexer/parsers/base.js';

/**
 * Everything a detection tier may look at for one file
 */
export interface DetectionContext {
  filePath: string;
  source: string;
  dialect: Dialect;
  /** Root of the (possibly degraded) tree; null when the parser threw */
  root: SyntaxNode | null;
  /** True when the final tree still contains ERROR nodes */
  parseFailed: boolean;
}

/**
 * A tier returns null when it does not apply to the file
 */
export type DetectionStrategy = (context: DetectionContext) => EndpointRecord[] | null;
