/**
 * Configuration module for the kprint CLI.
 *
 * @module config
 */

export {
  ConfigSchema,
  OutputConfigSchema,
  OutputFormatSchema,
  ConfigError,
  parseConfig,
  toConfigError,
  type Config,
  type ConfigOverrides,
  type OutputConfig,
  type OutputFormat,
} from './schema.js';
export { loadConfig, mergeConfig, getConfigPath } from './loader.js';
