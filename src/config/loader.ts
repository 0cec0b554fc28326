/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import * as TOML from '@iarna/toml';
import * as YAML from 'yaml';
import { configSchema, type Config } from './schema.js';

export const CONFIG_FILE_NAMES = [
  'routescribe.config.json',
  'routescribe.config.yaml',
  'routescribe.config.yml',
  'routescribe.config.toml',
  '.routescriberc.json',
  '.routescriberc',
];

export const PACKAGE_JSON_KEY = 'routescribe';

type ConfigFormat = 'JSON' | 'YAML' | 'TOML';

function formatFor(configPath: string): ConfigFormat {
  const ext = path.extname(configPath).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'YAML';
  if (ext === '.toml') return 'TOML';
  return 'JSON';
}

function parseContent(content: string, format: ConfigFormat): unknown {
  switch (format) {
    case 'YAML':
      return YAML.parse(content);
    case 'TOML':
      return TOML.parse(content);
    default:
      return JSON.parse(content);
  }
}

export function validateConfig(rawConfig: unknown): Config {
  const result = configSchema.safeParse(rawConfig ?? {});

  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');
  const format = formatFor(absolutePath);

  let rawConfig: unknown;
  try {
    rawConfig = parseContent(content, format);
  } catch {
    throw new Error(`Invalid ${format} in config file: ${absolutePath}`);
  }

  return validateConfig(rawConfig);
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

async function readPackageConfig(packagePath: string): Promise<unknown> {
  let packageContent: unknown;
  try {
    packageContent = JSON.parse(await fs.promises.readFile(packagePath, 'utf-8'));
  } catch {
    console.warn(`Ignoring unreadable ${packagePath}`);
    return undefined;
  }
  if (typeof packageContent !== 'object' || packageContent === null) return undefined;
  return Object.entries(packageContent).find(([key]) => key === PACKAGE_JSON_KEY)?.[1];
}

/**
 * Walk up from `startDir` to the first config file, or a `routescribe` key
 * in a package.json
 */
export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  for (;;) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const packageConfig = await readPackageConfig(packagePath);
      if (packageConfig !== undefined) {
        return validateConfig(packageConfig);
      }
    }

    if (currentDir === root) break;
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

export { configSchema, type Config } from './schema.js';
