/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string) => string;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary project directory with files
 */
export function createTempProject(files: Record<string, string> = {}): TempProjectResult {
  const rootDir = path.join(os.tmpdir(), `routescribe-project-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(rootDir, { recursive: true });

  const addFile = (relativePath: string, content: string): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const getFilePath = (relativePath: string): string => {
    return path.join(rootDir, relativePath);
  };

  return { rootDir, cleanup, addFile, getFilePath };
}

/**
 * Express-style routes with an in-file helper and an imported store
 */
export const SAMPLE_ROUTES = [
  "import { Router } from 'express';",
  "import { db } from './db';",
  '',
  'export const router = Router();',
  '',
  'function loadWidget(id: string) {',
  '  return db.widgets[id];',
  '}',
  '',
  'function handler(req: any, res: any) {',
  '  const widget = loadWidget(req.params.id);',
  '  res.json(widget);',
  '}',
  '',
  "router.get('/widgets/:id', handler);",
  '',
].join('\n');

export const SAMPLE_DB = [
  'export const db = {',
  '  widgets: {} as Record<string, unknown>,',
  '};',
  '',
].join('\n');

/**
 * NestJS-style controller
 */
export const SAMPLE_CONTROLLER = [
  "import { Controller, Get, Post } from '@nestjs/common';",
  '',
  "@Controller('/users')",
  'export class UsersController {',
  "  @Get(':id')",
  '  findOne() {',
  '    return {};',
  '  }',
  '',
  '  @Post()',
  '  create() {',
  '    return {};',
  '  }',
  '}',
  '',
].join('\n');

export const VALID_CONFIG = {
  host: 'https://api.example.test',
  title: 'Widgets',
  version: '2.0.0',
  maxWorkers: 3,
  ignoredDirs: ['node_modules', 'fixtures'],
};

export const MINIMAL_CONFIG = {};

export const INVALID_SCHEMA_CONFIG = {
  ignoredDirs: 'not-an-array',
  maxWorkers: 12,
};
