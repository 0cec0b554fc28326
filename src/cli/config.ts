import { loadConfig, loadConfigOrDefault, validateConfig, type Config } from '../config/index.js';

/**
 * Explicit config file, else the nearest one above `rootDirectory`, else defaults
 */
export async function resolveConfig(rootDirectory: string, configPath?: string): Promise<Config> {
  return configPath ? loadConfig(configPath) : loadConfigOrDefault(rootDirectory);
}

/**
 * Apply command-line overrides and validate the result again
 */
export function withOverrides(config: Config, overrides: Partial<Record<keyof Config, unknown>>): Config {
  const defined = Object.entries(overrides).filter(([, value]) => value !== undefined);
  return validateConfig({ ...config, ...Object.fromEntries(defined) });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
