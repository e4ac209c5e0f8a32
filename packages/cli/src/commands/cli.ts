/**
 * @fileoverview CLI router for kprint.
 *
 * Creates the main Commander program with all subcommands registered.
 *
 * @module commands/cli
 */

import { Command } from 'commander';
import { createGetCommand } from './get.js';
import { createConfigCommand } from './config.js';

/**
 * Create the main CLI program with all subcommands.
 *
 * @example
 * ```typescript
 * const cli = createCLI();
 * await cli.parseAsync(process.argv);
 * ```
 */
export function createCLI(): Command {
  const program = new Command()
    .name('kprint')
    .description('kprint - print cluster resources as tables, JSON, YAML or templates')
    .version('0.1.0');

  program.addCommand(createGetCommand());
  program.addCommand(createConfigCommand());

  return program;
}
