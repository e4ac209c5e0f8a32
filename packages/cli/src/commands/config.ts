/**
 * @fileoverview Config command for the kprint CLI.
 *
 * Provides subcommands for viewing the resolved configuration and where it
 * was loaded from.
 *
 * @module commands/config
 */

import { Command } from 'commander';
import { stringify as yamlStringify } from 'yaml';
import { loadConfig, getConfigPath } from '../config/index.js';
import { formatError } from '../output/index.js';

/**
 * Create the config command with show and path subcommands.
 *
 * @returns Command instance for config inspection
 */
export function createConfigCommand(): Command {
  const config = new Command('config').description(
    'View kprint configuration\n\n' +
      'Configuration is loaded from .kprintrc, .kprintrc.json, .kprintrc.yaml\n' +
      'or .config/kprint/config.yaml in the current directory or its parents.\n\n' +
      'Examples:\n' +
      '  $ kprint config show\n' +
      '  $ kprint config path'
  );

  config
    .command('show')
    .description('Show resolved configuration as YAML\n\nDisplays the full configuration with all defaults merged.')
    .option('-c, --config <path>', 'Path to a specific config file to load')
    .action(async (options: { config?: string }) => {
      try {
        const loadedConfig = await loadConfig(options.config);
        console.log(yamlStringify(loadedConfig));
      } catch (error) {
        console.error(formatError(error));
        process.exit(1);
      }
    });

  config
    .command('path')
    .description('Show config file path\n\nDisplays the path to the discovered config file, or indicates if none found.')
    .option('-c, --config <path>', 'Path to a specific config file to check')
    .action(async (options: { config?: string }) => {
      const configPath = await getConfigPath(options.config);
      console.log(configPath ?? 'no config file found');
    });

  return config;
}
