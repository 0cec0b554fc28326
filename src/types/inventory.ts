/**
 * Per-file symbol inventory types
 */

export type Dialect = 'javascript' | 'typescript' | 'tsx';

/**
 * Sentinel origin for Node.js builtins and installed packages we do not introspect
 */
export const EXTERNAL_MODULE = '<node_builtin_or_external>';

/**
 * Imported name recorded for namespace (`import * as x`) and side-effect imports
 */
export const NAMESPACE_IMPORT = '*';

/**
 * Absolute path, `null` for an unresolved relative specifier, or EXTERNAL_MODULE
 */
export type ModuleOrigin = string | null;

export interface SymbolSpan {
  name: string;
  startLine: number;
  endLine: number;
}

export type CallKind = 'function_call' | 'method_call';

export interface CallSite extends SymbolSpan {
  kind: CallKind;
}

export type ImportKind = 'import' | 'require';

export interface ImportRecord {
  importedName: string;
  localName: string | null;
  source: string;
  kind: ImportKind;
  origin: ModuleOrigin;
  line: number;
  pathExists: boolean;
  usageLines: number[];
}

export interface FileInventory {
  filePath: string;
  dialect: Dialect;
  classes: SymbolSpan[];
  functions: SymbolSpan[];
  variables: SymbolSpan[];
  functionCalls: CallSite[];
  imports: ImportRecord[];
}

/**
 * Lookup over cached inventories, keyed by absolute file path
 */
export interface InventorySnapshot {
  get(filePath: string): FileInventory | undefined;
  readonly size: number;
}
