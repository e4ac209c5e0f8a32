/**
 * Configuration schema for the kprint CLI using Zod validation.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { LATEST_VERSION, LOG_LEVELS, SUPPORTED_VERSIONS, logger } from '@kprint/core';

/**
 * Output format selectors. The empty string selects the table printer.
 */
export const OutputFormatSchema = z.enum(['', 'json', 'yaml', 'template', 'templatefile']);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const APIVersionSchema = z.enum(SUPPORTED_VERSIONS);

export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Output configuration schema.
 */
export const OutputConfigSchema = z
  .object({
    /** Output format; empty for the table printer */
    format: OutputFormatSchema.default(''),
    /** Template text for 'template', template file path for 'templatefile' */
    template: z.string().optional(),
    /** Suppress table headers */
    noHeaders: z.boolean().default(false),
  })
  .default({});

export type OutputConfig = z.infer<typeof OutputConfigSchema>;

/**
 * Complete kprint configuration schema.
 *
 * @example
 * ```yaml
 * apiVersion: v1beta1
 * logLevel: warn
 * output:
 *   format: template
 *   template: "{{ metadata.name }}\n"
 * ```
 */
export const ConfigSchema = z
  .object({
    /** API version used by json, yaml and template output */
    apiVersion: APIVersionSchema.default(LATEST_VERSION),
    /** Diagnostics log level */
    logLevel: LogLevelSchema.default('info'),
    /** Output settings */
    output: OutputConfigSchema,
  })
  .default({});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Unvalidated configuration as read from a file or assembled from flags.
 * Every field is optional; values are checked when merged.
 */
export type ConfigOverrides = {
  apiVersion?: string;
  logLevel?: string;
  output?: {
    format?: string;
    template?: string;
    noHeaders?: boolean;
  };
};

/**
 * Thrown when configuration does not match the schema.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Turn a Zod failure into a one-line ConfigError naming each bad field.
 */
export function toConfigError(error: z.ZodError): ConfigError {
  const details = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return new ConfigError(`invalid configuration: ${details}`, error.issues);
}

/**
 * Parse and validate configuration, logging any validation errors.
 *
 * @param data - Raw configuration data
 * @returns Validated configuration with defaults applied
 * @throws ConfigError if validation fails
 */
export function parseConfig(data: unknown): Config {
  logger.debug('Parsing configuration...');

  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    const error = toConfigError(result.error);
    logger.error(`Config validation failed: ${error.message}`);
    throw error;
  }

  logger.debug(`Config parsed: apiVersion=${result.data.apiVersion}, format=${result.data.output.format || 'table'}`);
  return result.data;
}
