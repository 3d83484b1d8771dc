import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.pymodgraph.yaml';

// A YAML file with no documents parses to null.
const EmptyAsDefaults = ConfigSchema.nullish().transform((value) => value ?? getDefaultConfig());

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist. An empty file also
 * yields the defaults.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  return loadYamlWithSchema(fullPath, EmptyAsDefaults);
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}
