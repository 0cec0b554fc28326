/**
 * Import path resolution for JavaScript/TypeScript files
 */

import path from 'node:path';
import fs from 'node:fs';
import { builtinModules } from 'node:module';

import { EXTERNAL_MODULE, type ModuleOrigin } from '../types/index.js';

/**
 * Probe order for relative specifiers: direct suffixes, then directory index files
 */
export const RELATIVE_PROBE_SUFFIXES = [
  '.ts', '.tsx', '.cts', '.mts', '.js', '.mjs', '.cjs', '.d.ts',
  '/index.ts', '/index.tsx', '/index.cts', '/index.mts', '/index.js', '/index.mjs', '/index.cjs',
] as const;

// `./db.js` written against a `db.ts` source (NodeNext style)
const EMITTED_TO_SOURCE: Record<string, string[]> = {
  '.js': ['.ts', '.tsx'],
  '.mjs': ['.mts'],
  '.cjs': ['.cts'],
};

const NODE_BUILTINS = new Set(builtinModules);

const NODE_MODULES_DIR = 'node_modules';

export class ImportResolver {
  /**
   * Resolve a specifier as seen from `importingDirectory`.
   *
   * Bare specifiers are looked up in the installed-package directory of
   * `importingDirectory`, then of each ancestor up to `rootDirectory` when
   * one is given.
   */
  resolve(specifier: string, importingDirectory: string, rootDirectory?: string): ModuleOrigin {
    if (specifier.startsWith('.')) {
      return this.resolveRelative(specifier, importingDirectory);
    }

    if (this.isBuiltIn(specifier)) {
      return EXTERNAL_MODULE;
    }

    for (const dir of this.packageSearchDirs(importingDirectory, rootDirectory)) {
      const installed = path.join(dir, NODE_MODULES_DIR, specifier);
      if (this.pathExists(installed)) {
        return path.resolve(installed);
      }
    }

    return EXTERNAL_MODULE;
  }

  /**
   * True when the origin names something on disk (not a sentinel, not a miss)
   */
  originExists(origin: ModuleOrigin): boolean {
    if (origin === null || origin === EXTERNAL_MODULE) return false;
    return this.pathExists(origin);
  }

  private resolveRelative(specifier: string, importingDirectory: string): string | null {
    const joined = path.normalize(path.join(importingDirectory, specifier));

    for (const suffix of RELATIVE_PROBE_SUFFIXES) {
      const candidate = joined + suffix;
      if (this.fileExists(candidate)) {
        return path.resolve(candidate);
      }
    }

    const ext = path.extname(joined);
    const sourceExts = EMITTED_TO_SOURCE[ext];
    if (sourceExts) {
      const stem = joined.slice(0, -ext.length);
      for (const sourceExt of sourceExts) {
        if (this.fileExists(stem + sourceExt)) {
          return path.resolve(stem + sourceExt);
        }
      }
    }

    if (this.fileExists(joined)) {
      return path.resolve(joined);
    }

    return null;
  }

  private packageSearchDirs(importingDirectory: string, rootDirectory?: string): string[] {
    const start = path.resolve(importingDirectory);
    if (!rootDirectory) return [start];

    const root = path.resolve(rootDirectory);
    const relative = path.relative(root, start);
    if (relative.startsWith('..') || path.isAbsolute(relative)) return [start];

    const dirs: string[] = [];
    let current = start;
    for (;;) {
      dirs.push(current);
      if (current === root) break;
      const parent = path.dirname(current);
      if (parent === current) break;
      current = parent;
    }
    return dirs;
  }

  private isBuiltIn(specifier: string): boolean {
    if (specifier.startsWith('node:')) {
      return true;
    }
    return NODE_BUILTINS.has(specifier.split('/')[0] ?? specifier);
  }

  /**
   * Check if a regular file exists (with caching)
   */
  private existsCache = new Map<string, boolean>();
  private fileExists(filePath: string): boolean {
    const cached = this.existsCache.get(filePath);
    if (cached !== undefined) return cached;

    let exists = false;
    try {
      exists = fs.statSync(filePath).isFile();
    } catch {
      exists = false;
    }
    this.existsCache.set(filePath, exists);
    return exists;
  }

  private pathExists(target: string): boolean {
    return fs.existsSync(target);
  }

  /**
   * Clear the file exists cache
   */
  clearCache(): void {
    this.existsCache.clear();
  }
}

/**
 * Resolve a single specifier. Never throws.
 */
export function resolveModuleOrigin(
  specifier: string,
  importingDirectory: string,
  rootDirectory?: string
): ModuleOrigin {
  return new ImportResolver().resolve(specifier, importingDirectory, rootDirectory);
}
