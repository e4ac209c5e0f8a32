/**
 * Configuration loader using cosmiconfig for file discovery and Zod for validation.
 *
 * @module config/loader
 */

import { cosmiconfig } from 'cosmiconfig';
import { errorMessage, logger } from '@kprint/core';
import { parseConfig, type Config, type ConfigOverrides } from './schema.js';

/**
 * Search places for cosmiconfig to look for configuration files.
 */
const SEARCH_PLACES = [
  '.kprintrc',
  '.kprintrc.json',
  '.kprintrc.yaml',
  '.kprintrc.yml',
  '.config/kprint/config.yaml',
  '.config/kprint/config.yml',
  '.config/kprint/config.json',
];

function createExplorer() {
  return cosmiconfig('kprint', {
    searchPlaces: SEARCH_PLACES,
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two records, with source taking precedence. Undefined source
 * values leave the target value in place.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }
    const targetValue = result[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

/**
 * Load configuration from file or defaults.
 *
 * @param configPath - Explicit config file path (optional)
 * @param searchFrom - Directory to search from (optional, defaults to cwd)
 * @returns Validated configuration
 */
export async function loadConfig(configPath?: string, searchFrom?: string): Promise<Config> {
  const explorer = createExplorer();
  logger.debug(`Loading config${configPath ? ` from: ${configPath}` : '...'}`);

  try {
    const result = configPath ? await explorer.load(configPath) : await explorer.search(searchFrom);

    if (result && !result.isEmpty) {
      logger.debug(`Config loaded from: ${result.filepath}`);
      return parseConfig(result.config);
    }

    logger.debug('No config file found, using defaults');
    return parseConfig({});
  } catch (error) {
    logger.error(`Failed to load config: ${errorMessage(error)}`);
    throw error;
  }
}

/**
 * Get the path to the active configuration file, if any.
 *
 * @param configPath - Explicit config file path (optional)
 * @param searchFrom - Directory to search from (optional)
 * @returns Path to config file, or null if none found
 */
export async function getConfigPath(configPath?: string, searchFrom?: string): Promise<string | null> {
  if (configPath) {
    return configPath;
  }

  const explorer = createExplorer();
  try {
    const result = await explorer.search(searchFrom);
    return result && !result.isEmpty ? result.filepath : null;
  } catch (error) {
    logger.debug(`Config search failed: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Merge file configuration with CLI flag overrides.
 *
 * CLI flags take precedence over file configuration.
 * Missing values are filled with defaults from the schema.
 *
 * @param fileConfig - Configuration loaded from file
 * @param cliFlags - Configuration from CLI flags
 * @returns Merged and validated configuration
 * @throws ConfigError if the merged values are invalid
 */
export function mergeConfig(fileConfig: ConfigOverrides, cliFlags: ConfigOverrides): Config {
  logger.debug('Merging file config with CLI flags');

  const merged = deepMerge(deepMerge({}, fileConfig), cliFlags);
  const result = parseConfig(merged);

  logger.debug(`Merged config: apiVersion=${result.apiVersion}, format=${result.output.format || 'table'}`);
  return result;
}
