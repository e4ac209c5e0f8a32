/**
 * @fileoverview Command exports for the kprint CLI.
 *
 * @module commands
 */

export { createCLI } from './cli.js';
export { createGetCommand, runGet } from './get.js';
export { createConfigCommand } from './config.js';
