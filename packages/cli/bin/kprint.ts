#!/usr/bin/env node
/**
 * @fileoverview CLI entry point for kprint.
 *
 * Respects the DEBUG environment variable to enable debug-level logging and stack traces.
 *
 * @example
 * ```bash
 * kprint get pods.yaml
 * DEBUG=1 kprint get pods.yaml -o json
 * ```
 */

import { main, logger, setLogLevel } from '../src/index.js';
import { formatError } from '../src/output/index.js';
import { isDebugMode } from '../src/utils/index.js';

(() => {
  const debug = isDebugMode();
  if (debug) {
    setLogLevel('debug');
  }

  logger.debug('CLI startup', {
    args: process.argv.slice(2),
    nodeVersion: process.version,
  });

  main(process.argv.slice(2)).catch((error: unknown) => {
    console.error(formatError(error));
    if (debug && error instanceof Error) {
      logger.debug('Stack trace:', error.stack);
    }
    process.exit(1);
  });
})();
