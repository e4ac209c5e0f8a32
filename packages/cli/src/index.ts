/**
 * @fileoverview Public API for @kprint/cli package.
 *
 * Exports the CLI entry point, the command builders and the configuration
 * loader, and re-exports the shared logger from @kprint/core.
 *
 * @module @kprint/cli
 *
 * @example
 * ```typescript
 * import { createCLI, setLogLevel } from '@kprint/cli';
 *
 * setLogLevel('debug');
 * await createCLI().parseAsync(process.argv);
 * ```
 */

import { logger, setLogLevel, getLogLevel, type LogLevel } from '@kprint/core';

export { logger, setLogLevel, getLogLevel, type LogLevel };

export { createCLI, createGetCommand, createConfigCommand, runGet } from './commands/index.js';

export {
  ConfigSchema,
  ConfigError,
  parseConfig,
  loadConfig,
  mergeConfig,
  getConfigPath,
  type Config,
  type ConfigOverrides,
  type OutputConfig,
  type OutputFormat,
} from './config/index.js';

export { readResources, parseResources } from './input/index.js';

/**
 * Main CLI entry point.
 *
 * @param args - Command-line arguments (typically process.argv.slice(2))
 *
 * @example
 * ```typescript
 * main(process.argv.slice(2)).catch(console.error);
 * ```
 */
export async function main(args: string[]): Promise<void> {
  const { createCLI } = await import('./commands/index.js');
  logger.debug('CLI main() called', { args });

  const cli = createCLI();
  await cli.parseAsync(['node', 'kprint', ...args]);
}
