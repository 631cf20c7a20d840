/**
 * Error handling for CLI entry points.
 */

import { logger } from '../../utils/logger.js';
import type { CliCommandResult } from '../types.js';

/**
 * Runs a command and returns the exit code for the process.
 *
 * A thrown error is printed as `Error: <message>` and yields 1; its stack
 * goes to the debug log when `TIERCONF_DEBUG=1`.
 */
export function withErrorHandling(fn: () => CliCommandResult): number {
  try {
    return fn().exitCode;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    if (error instanceof Error) {
      logger.debug('command_failed', { name: error.name, stack: error.stack });
    }
    return 1;
  }
}
