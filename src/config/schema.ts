/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const DEFAULT_IGNORED_DIRS = [
  'node_modules',
  'dist',
  'build',
  '.git',
  'coverage',
  '.next',
  '.nuxt',
  'vendor',
  'out',
];

export const MAX_WORKERS_LIMIT = 5;

export const configSchema = z.object({
  // Directory names; any matching path segment excludes a file
  ignoredDirs: z.array(z.string().min(1)).default(DEFAULT_IGNORED_DIRS),
  host: z.string().url().default('https://api.example.com'),
  title: z.string().min(1).optional(),
  version: z.string().min(1).default('1.0.0'),
  description: z.string().default('Generated from static analysis of the source tree.'),
  cacheDirName: z.string().min(1).regex(/^[^\\/]+$/, 'must be a single directory name').default('.routescribe-inventory'),
  maxWorkers: z.number().int().min(1).max(MAX_WORKERS_LIMIT).default(MAX_WORKERS_LIMIT),
  maxFileSize: z.number().int().min(0).default(1024 * 1024), // 1MB default, 0 = unlimited
});

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;
