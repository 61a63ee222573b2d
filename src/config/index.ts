import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

import { ConfigSchema, type Config } from './schema.js';
import { ConfigMissingError, ConfigParseError, ConfigInvalidError } from '../errors/index.js';

export type { Config, DistributionConfig, LoggingConfig, SourcesConfig } from './schema.js';
export { ConfigSchema, DEFAULT_CLASSIFIERS } from './schema.js';

export const PROJECT_CONFIG_FILE = 'distmeta.config.json';

export function loadConfig(configPath: string): Config {
  // Check file exists
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  // Read and parse JSON
  let rawConfig: unknown;
  try {
    const fileContent = readFileSync(configPath, 'utf-8');
    rawConfig = JSON.parse(fileContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }

  return parseConfig(rawConfig);
}

/**
 * Load `distmeta.config.json` from the project root, or fall back to defaults
 * when the project carries none.
 */
export function loadProjectConfig(root: string): Config {
  const configPath = join(root, PROJECT_CONFIG_FILE);
  if (!existsSync(configPath)) {
    return parseConfig({});
  }
  return loadConfig(configPath);
}

export function parseConfig(rawConfig: unknown): Config {
  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(errors);
  }

  return result.data;
}
