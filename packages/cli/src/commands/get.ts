/**
 * @fileoverview Get command for the kprint CLI.
 *
 * Reads resource documents and prints them with the printer chosen by the
 * output flags and configuration.
 *
 * @module commands/get
 */

import { Command } from 'commander';
import { HumanReadablePrinter, getPrinter, logger, setLogLevel, type Writer } from '@kprint/core';
import { loadConfig, mergeConfig } from '../config/index.js';
import { readResources } from '../input/index.js';
import { formatError } from '../output/index.js';
import { isDebugMode } from '../utils/index.js';

/**
 * Options for the get command.
 */
interface GetOptions {
  output?: string;
  template?: string;
  outputVersion?: string;
  headers: boolean;
  config?: string;
}

/**
 * Print every resource in the given files through one printer, so the
 * table printer repeats its header only when the kind changes.
 *
 * @param files - File paths, `-` for stdin
 * @param options - Parsed command options
 * @param out - Destination for printed resources
 */
export async function runGet(files: string[], options: GetOptions, out: Writer = process.stdout): Promise<void> {
  const fileConfig = await loadConfig(options.config);
  const config = mergeConfig(fileConfig, {
    apiVersion: options.outputVersion,
    output: {
      format: options.output,
      template: options.template,
      noHeaders: options.headers ? undefined : true,
    },
  });

  if (!isDebugMode()) {
    setLogLevel(config.logLevel);
  }

  const printer = getPrinter(
    config.apiVersion,
    config.output.format,
    config.output.template ?? '',
    new HumanReadablePrinter(config.output.noHeaders)
  );

  for (const file of files) {
    const objects = await readResources(file);
    logger.debug(`Printing ${objects.length} object(s) from ${file}`);
    for (const obj of objects) {
      printer.printObj(obj, out);
    }
  }
}

/**
 * Create the get command for printing resources.
 *
 * @returns Command instance for printing resources
 *
 * @example
 * ```typescript
 * const program = new Command();
 * program.addCommand(createGetCommand());
 * program.parse(['get', 'pods.yaml', '-o', 'json']);
 * ```
 */
export function createGetCommand(): Command {
  return new Command('get')
    .description(
      'Print resources from JSON or YAML files\n\n' +
        'Without an output format, resources are printed as an aligned table.\n' +
        'Use - to read from standard input.\n\n' +
        'Examples:\n' +
        '  $ kprint get pods.yaml\n' +
        '  $ kprint get services.json -o yaml --output-version v1beta1\n' +
        '  $ kprint get pods.yaml -o template -t "{{ metadata.name }}\\n"\n' +
        '  $ cat pods.yaml | kprint get - --no-headers'
    )
    .argument('<files...>', 'Files holding resource documents')
    .option('-o, --output <format>', 'Output format: json, yaml, template or templatefile')
    .option('-t, --template <template>', 'Template text for -o template, template file path for -o templatefile')
    .option('--output-version <version>', 'API version for json, yaml and template output')
    .option('--no-headers', 'Do not print table headers')
    .option('-c, --config <file>', 'Path to custom config file (.kprintrc.yaml)')
    .action(async (files: string[], options: GetOptions) => {
      try {
        await runGet(files, options);
      } catch (error) {
        console.error(formatError(error));
        if (isDebugMode() && error instanceof Error) {
          logger.debug('Stack trace:', error.stack);
        }
        process.exit(1);
      }
    });
}
