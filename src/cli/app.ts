/**
 * Command dispatch for the tierconf CLI.
 */

import { handleConvertCommand } from './commands/convert.js';
import { handleFlattenCommand } from './commands/flatten.js';
import { handleHelpCommand } from './commands/help.js';
import { handleVersionCommand } from './commands/version.js';
import type { CliCommandHandler, CliCommandResult } from './types.js';

const COMMANDS: ReadonlyMap<string, CliCommandHandler> = new Map([
  ['flatten', handleFlattenCommand],
  ['convert', handleConvertCommand],
]);

function unknownCommand(command: string): CliCommandResult {
  console.error(`Error: Unknown command: ${command}`);
  console.error('\nRun "tierconf help" for usage information.');
  return { exitCode: 1 };
}

/**
 * Runs one CLI invocation.
 *
 * @param args - Arguments without the node executable and script path.
 * @returns The command result; errors thrown by commands propagate.
 */
export function runCli(args: readonly string[]): CliCommandResult {
  const [command = '', ...commandArgs] = args;

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h': {
      const [topic] = commandArgs;
      if (topic === undefined) {
        return handleHelpCommand();
      }
      const handler = COMMANDS.get(topic);
      return handler === undefined ? unknownCommand(topic) : handler(['--help']);
    }

    case 'version':
    case '--version':
    case '-v':
      return handleVersionCommand();

    default: {
      const handler = COMMANDS.get(command);
      return handler === undefined ? unknownCommand(command) : handler(commandArgs);
    }
  }
}
