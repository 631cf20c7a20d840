/**
 * CLI types.
 */

/**
 * Result of a CLI command.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;
}

/**
 * A command handler taking the arguments that follow the command name.
 */
export type CliCommandHandler = (args: readonly string[]) => CliCommandResult;
