/**
 * Inventory pass: walk the tree, extract one inventory per file, cache it
 */

import fs from 'node:fs';
import path from 'node:path';

import type { InventorySnapshot } from '../types/index.js';
import { InventoryCache } from './cache.js';
import { ImportResolver } from './import-resolver.js';
import { extractInventory } from './parsers/symbol-extractor.js';
import { findSourceFiles } from './walker.js';

export interface IndexerConfig {
  rootDirectory: string;
  ignoredDirs: string[];
  cacheDirName: string;
  /** Bytes; 0 disables the limit */
  maxFileSize: number;
}

export interface IndexResult {
  totalFiles: number;
  indexedFiles: number;
  skippedFiles: number;
  errors: Array<{ file: string; error: string }>;
  durationMs: number;
}

export class Indexer {
  private config: IndexerConfig;
  private cache: InventoryCache;
  private importResolver: ImportResolver | null = null;
  private sourceFiles: string[] = [];

  constructor(config: IndexerConfig) {
    const rootDirectory = path.resolve(config.rootDirectory);
    this.config = {
      ...config,
      rootDirectory,
      ignoredDirs: [...config.ignoredDirs, config.cacheDirName],
    };
    this.cache = new InventoryCache(rootDirectory, config.cacheDirName);
  }

  get cacheDirectory(): string {
    return this.cache.directory;
  }

  /**
   * Files seen by the last `indexDirectory` call
   */
  get files(): readonly string[] {
    return this.sourceFiles;
  }

  async indexDirectory(): Promise<IndexResult> {
    const startTime = Date.now();
    const errors: Array<{ file: string; error: string }> = [];
    let indexedFiles = 0;
    let skippedFiles = 0;

    await this.cache.prepare();
    this.sourceFiles = await findSourceFiles(this.config.rootDirectory, this.config.ignoredDirs);

    for (const filePath of this.sourceFiles) {
      try {
        const wasIndexed = await this.indexFile(filePath);
        if (wasIndexed) {
          indexedFiles++;
        } else {
          skippedFiles++;
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`Skipping inventory for ${filePath}: ${message}`);
        errors.push({ file: filePath, error: message });
      }
    }

    return {
      totalFiles: this.sourceFiles.length,
      indexedFiles,
      skippedFiles,
      errors,
      durationMs: Date.now() - startTime,
    };
  }

  async indexFile(filePath: string): Promise<boolean> {
    if (this.config.maxFileSize > 0) {
      const stats = await fs.promises.stat(filePath);
      if (stats.size > this.config.maxFileSize) {
        return false;
      }
    }

    if (!this.importResolver) {
      this.importResolver = new ImportResolver();
    }

    const inventory = await extractInventory(filePath, path.dirname(filePath), {
      resolver: this.importResolver,
      rootDirectory: this.config.rootDirectory,
    });
    await this.cache.write(inventory);
    return true;
  }

  snapshot(): Promise<InventorySnapshot> {
    return this.cache.snapshot();
  }

  close(): void {
    this.importResolver?.clearCache();
    this.cache.dispose();
  }
}

export { InventoryCache, cacheFileName, createSnapshot } from './cache.js';
export { findSourceFiles, isIgnoredPath } from './walker.js';
export { ImportResolver, resolveModuleOrigin } from './import-resolver.js';
export { extractInventory, extractInventoryFromSource, buildInventoryQuery } from './parsers/symbol-extractor.js';
export { ParseError } from './parsers/base.js';
