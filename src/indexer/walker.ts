/**
 * Source file discovery
 */

import path from 'node:path';
import fg from 'fast-glob';

import { SUPPORTED_EXTENSIONS } from './parsers/grammar.js';

const SOURCE_PATTERN = `**/*.{${SUPPORTED_EXTENSIONS.map(ext => ext.slice(1)).join(',')}}`;

/**
 * True when any segment of `relativePath` is an ignored directory name
 */
export function isIgnoredPath(relativePath: string, ignoredDirs: readonly string[]): boolean {
  const ignored = new Set(ignoredDirs);
  return relativePath.split(/[\\/]/).some(segment => ignored.has(segment));
}

/**
 * All supported source files under `rootDirectory`, sorted
 */
export async function findSourceFiles(
  rootDirectory: string,
  ignoredDirs: readonly string[]
): Promise<string[]> {
  const root = path.resolve(rootDirectory);
  const files = await fg(SOURCE_PATTERN, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: true,
    caseSensitiveMatch: false,
    followSymbolicLinks: false,
    ignore: ignoredDirs.map(dir => `**/${dir}/**`),
  });

  return files
    .map(file => path.resolve(file))
    .filter(file => !isIgnoredPath(path.relative(root, file), ignoredDirs))
    .sort();
}
