/**
 * Console output helpers shared by CLI commands.
 */

import type { Config } from '../../config/index.js';
import { classifyToken, type Diagnostic } from '../../resolution/index.js';

/**
 * Formats a diagnostic as one line of console output.
 *
 * @example
 * ```typescript
 * formatDiagnostic({ severity: 'warning', subject: '-q', message: "Unrecognized shortflag '-q'" });
 * // "warning: Unrecognized shortflag '-q'"
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${diagnostic.severity}: ${diagnostic.message}`;
}

/**
 * Prints every recorded diagnostic of a parsed config to stderr.
 */
export function reportDiagnostics(config: Config): void {
  for (const diagnostic of config.log) {
    console.error(formatDiagnostic(diagnostic));
  }
}

/**
 * Output sink printing rendered text through `console.log`.
 */
export function printText(text: string): void {
  console.log(text.trimEnd());
}

/**
 * Splits a leading positional document path off the command arguments.
 *
 * @returns The path, when the first argument classifies as a value, and the remaining arguments.
 */
export function splitInput(args: readonly string[]): [string | undefined, readonly string[]] {
  const [first, ...rest] = args;
  if (first === undefined || classifyToken(first).kind !== 'value') {
    return [undefined, args];
  }
  return [first, rest];
}
